import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { resolveLogLevels } from './config/log-levels';

async function bootstrap(): Promise<void> {
  // No HTTP listener: the worker only talks to SQS and S3
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  app.enableShutdownHooks();
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : 'Unknown error';
  new Logger('Bootstrap').error(`Worker failed to start: ${message}`);
  process.exit(1);
});
