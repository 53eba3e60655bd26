// src/limits/rate-limit.guard.ts
import {
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';

import { readBool, readNumber } from '../config/env';
import { RATE_LIMIT_KEY, type RateLimitOptions } from './rate-limit.decorator';
import { RateLimitStore } from './rate-limit.store';

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

type Window = {
  limit: number;
  ms: number;
  label: string;
  error: string;
  message: (limit: number) => string;
};

/** x-forwarded-for 첫 항목 → req.ip */
export function clientId(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)
    ?.split(',')[0]
    ?.trim();
  return first || req.ip || 'unknown';
}

@Injectable()
export class RateLimitGuard implements CanActivate {
  private readonly logger = new Logger(RateLimitGuard.name);

  constructor(
    private readonly reflector: Reflector,
    private readonly config: ConfigService,
    private readonly store: RateLimitStore,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const options = this.reflector.getAllAndOverride<
      RateLimitOptions | undefined
    >(RATE_LIMIT_KEY, [context.getHandler(), context.getClass()]);
    if (!options) return true;

    if (readBool(this.config, 'EMERGENCY_STOP', false)) {
      throw new ServiceUnavailableException({
        error: 'Service temporarily unavailable',
        message: 'The service is currently under maintenance.',
      });
    }

    if (!readBool(this.config, 'RATE_LIMIT_ENABLED', true)) return true;

    const req = context.switchToHttp().getRequest<Request>();
    const client = clientId(req);
    const route = `${context.getClass().name}.${context.getHandler().name}`;

    for (const w of this.windows(options)) {
      const count = this.store.hit(`${route}:${client}:${w.ms}`, w.ms);
      if (count <= w.limit) continue;

      this.logger.warn(`rate limit exceeded: ${client} ${route} (${w.label})`);
      throw new HttpException(
        {
          error: w.error,
          message: w.message(w.limit),
          currentCount: count,
          limit: w.limit,
          window: w.label,
        },
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }
    return true;
  }

  private windows(options: RateLimitOptions): Window[] {
    return [
      {
        limit:
          options.perMinute ??
          readNumber(this.config, 'RATE_LIMIT_PER_MINUTE', 3),
        ms: MINUTE_MS,
        label: '1 minute',
        error: 'Rate limit exceeded',
        message: (limit) => `Too many requests. Limit: ${limit} per minute.`,
      },
      {
        limit:
          options.perDay ?? readNumber(this.config, 'RATE_LIMIT_PER_DAY', 100),
        ms: DAY_MS,
        label: '24 hours',
        error: 'Daily limit exceeded',
        message: (limit) =>
          `Daily request limit exceeded. Limit: ${limit} per day.`,
      },
    ];
  }
}
