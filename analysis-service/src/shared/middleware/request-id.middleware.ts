import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

/**
 * Echo the request id back as X-Request-ID. Reuses the id pino-http assigned
 * so log lines and the response header agree.
 */
@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const header = req.headers['x-request-id'];
    const requestId =
      typeof header === 'string' && header
        ? header
        : 'id' in req && typeof req.id === 'string'
          ? req.id
          : `req-${uuidv4()}`;

    res.locals.requestId = requestId;
    res.setHeader('X-Request-ID', requestId);
    next();
  }
}
