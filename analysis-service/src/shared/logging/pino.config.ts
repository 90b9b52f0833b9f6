import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { destination, multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';

const serviceName = process.env.SERVICE_NAME || 'analysis-service';
const logDir = process.env.LOG_DIR || join(process.cwd(), 'logs');
const isProduction = process.env.NODE_ENV === 'production';

function header(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' ? value : undefined;
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '1.0.0',
    },

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-key"]',
        'apiKey',
        'password',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage & { id?: unknown }) => ({
        id: req.id,
        method: req.method,
        url: req.url,
        headers: isProduction ? undefined : req.headers,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => (req.url || '') === '/health',
    },

    genReqId: (req: IncomingMessage) =>
      header(req, 'x-request-id') ?? `req-${uuidv4()}`,

    customProps: (req: IncomingMessage) => ({
      requestId: header(req, 'x-request-id'),
      traceId: header(req, 'x-trace-id'),
    }),

    // Console (pretty outside production) plus a JSON file for log shipping
    stream: multistream([
      {
        level: 'info',
        stream: isProduction
          ? process.stdout
          : pinoPretty({
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
              singleLine: false,
            }),
      },
      {
        level: 'debug',
        stream: destination({
          dest: join(logDir, `${serviceName}.log`),
          mkdir: true,
          sync: false,
        }),
      },
    ]),
  },
};
