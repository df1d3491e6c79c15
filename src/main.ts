import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap the usage report HTTP service
 */
async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), {
    bufferLogs: true,
  });

  // Get services (the logger is transient, so it has to be resolved)
  const configService = app.get(ConfigService<AppConfig>);
  const logger = await app.resolve(PinoLoggerService);

  // Use custom logger
  app.useLogger(logger);
  logger.setContext('Bootstrap');

  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const port = configService.getOrThrow('port', { infer: true });
  const host = configService.getOrThrow('host', { infer: true });
  const corsOrigin = configService.getOrThrow('corsOrigin', { infer: true });
  const sessionsApi = configService.getOrThrow('sessionsApi', { infer: true });

  app.enableCors({ origin: corsOrigin === '*' ? true : corsOrigin.split(',') });

  // Enable graceful shutdown (closes the upstream connection pools)
  app.enableShutdownHooks();

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  await app.listen(port, host);

  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      port,
      host,
      sessionsApi: sessionsApi.url,
    },
    'Usage report service started',
  );
}

bootstrap().catch((error) => {
  console.error('Failed to start usage report service:', error);
  process.exit(1);
});
