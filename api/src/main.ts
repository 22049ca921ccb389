import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { LogLevel } from '@nestjs/common';
import { AppModule } from './app.module';

async function bootstrap() {
  const isDebug = process.env.DEBUG === 'true';
  const logLevels: LogLevel[] = isDebug
    ? ['error', 'warn', 'log', 'debug', 'verbose']
    : ['error', 'warn', 'log'];

  // No HTTP surface: everything arrives through the Discord bot
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevels,
  });
  app.enableShutdownHooks();
}
void bootstrap();
