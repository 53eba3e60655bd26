// src/common/http-exception.filter.ts
import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';

import { isArray, isRecord, isString } from './safe';

export type ErrorBody = {
  statusCode: number;
  error: string;
  message: string;
  path: string;
  timestamp: string;
  [extra: string]: unknown;
};

function toMessage(v: unknown, fallback: string): string {
  if (isString(v)) return v;
  if (isArray(v)) return v.filter(isString).join('; ') || fallback;
  return fallback;
}

/**
 * HttpException → { statusCode, error, message, path, timestamp }
 * - 예외 응답 객체의 다른 필드(currentCount/limit 등)는 그대로 붙임
 * - 그 외 예외는 500 + 로그
 */
export function toErrorBody(
  exception: unknown,
  path: string,
  now = new Date(),
): ErrorBody {
  const timestamp = now.toISOString();

  if (!(exception instanceof HttpException)) {
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'Internal server error',
      message: 'An unexpected error occurred. Please try again later.',
      path,
      timestamp,
    };
  }

  const statusCode = exception.getStatus();
  const res = exception.getResponse();

  if (!isRecord(res)) {
    return {
      statusCode,
      error: exception.name,
      message: toMessage(res, exception.message),
      path,
      timestamp,
    };
  }

  const { statusCode: _ignored, error, message, ...extra } = res;
  return {
    ...extra,
    statusCode,
    error: isString(error) ? error : exception.name,
    message: toMessage(message, exception.message),
    path,
    timestamp,
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();

    const body = toErrorBody(exception, req.url);

    if (body.statusCode >= 500) {
      this.logger.error(
        `${req.method} ${req.url} → ${body.statusCode}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    res.status(body.statusCode).json(body);
  }
}
