import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Transport, MicroserviceOptions } from '@nestjs/microservices';
import { ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { initTracer, shutdownTracer } from './shared/tracing/tracer';
import { AppModule } from './app.module';
import { AnalysisExceptionFilter } from './analysis/analysis-exception.filter';
import { createValidationPipe } from './common/validation/validation.utils';
import { getInteger } from './common/config/config.utils';

const serviceName = process.env.SERVICE_NAME || 'analysis-service';
const tracer = initTracer(serviceName);

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);

  const configService = app.get(ConfigService);

  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new AnalysisExceptionFilter());

  // TCP microservice for inter-service communication
  const tcpPort = getInteger(configService, 'TCP_PORT', 4004);
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.TCP,
    options: {
      host: configService.get<string>('TCP_HOST', '0.0.0.0'),
      port: tcpPort,
    },
  });

  await app.startAllMicroservices();
  logger.log(`TCP microservice is running on port ${tcpPort}`);

  const port = getInteger(configService, 'PORT', 50054);
  await app.listen(port);
  logger.log(`Analysis service is running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start analysis service:', error);
  process.exit(1);
});

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    void (async () => {
      await shutdownTracer(tracer);
      process.exit(0);
    })();
  });
}
