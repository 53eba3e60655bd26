// src/main.ts
import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/http-exception.filter';
import { RequestLoggingInterceptor } from './common/request-logging.interceptor';
import { readNumber, readOptionalString } from './config/env';

function corsOrigins(raw: string | null): string[] | boolean {
  if (!raw) return true;
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService);

  app.setGlobalPrefix('api');
  app.enableCors({
    origin: corsOrigins(readOptionalString(config, 'CORS_ORIGINS')),
    credentials: true,
  });
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new RequestLoggingInterceptor());
  app.enableShutdownHooks();

  const port = readNumber(config, 'PORT', 3000);
  await app.listen(port);

  new Logger('Bootstrap').log(
    `MoodFlix API running on http://localhost:${port}/api`,
  );
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err);
  process.exitCode = 1;
});
