/**
 * Trendlens API
 * Search-interest timelines, region maps and trending searches
 */

import 'reflect-metadata';
import * as dotenv from 'dotenv';
dotenv.config(); // Load .env file

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app/app.module';
import { environment } from './environments/environment';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  // Set global API prefix
  const globalPrefix = 'api';
  app.setGlobalPrefix(globalPrefix);

  app.enableCors({
    origin: environment.frontendUrl,
    methods: ['GET'],
    allowedHeaders: ['Content-Type'],
  });

  // Get port from environment
  const port = environment.port;

  await app.listen(port);

  Logger.log(`🚀 Trendlens API is running on: http://localhost:${port}/${globalPrefix}`);
  Logger.log(`📊 Environment: ${environment.production ? 'production' : 'development'}`);
  Logger.log(
    `🌐 Upstream: hl=${environment.trends.language}, tz=${environment.trends.tzOffsetMinutes}, ` +
      `${environment.trends.requestDelayMs}ms between requests`
  );
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.message : String(error), 'Bootstrap');
  process.exit(1);
});
