import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { resolveLogLevels } from './config/app.config';

/**
 * Worker process: no HTTP listener. The application context starts the
 * SQLite store, the Redis report cache and the BullMQ ingestion worker.
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  app.enableShutdownHooks();

  Logger.log('Ingestion worker started', 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(
    `Ingestion worker failed to start: ${err instanceof Error ? err.message : String(err)}`,
    err instanceof Error ? err.stack : undefined,
    'Bootstrap',
  );
  process.exitCode = 1;
});
