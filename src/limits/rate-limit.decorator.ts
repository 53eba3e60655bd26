// src/limits/rate-limit.decorator.ts
import { SetMetadata } from '@nestjs/common';

export const RATE_LIMIT_KEY = 'rate-limit';

export type RateLimitOptions = {
  /** 생략하면 RATE_LIMIT_PER_MINUTE */
  perMinute?: number;
  /** 생략하면 RATE_LIMIT_PER_DAY */
  perDay?: number;
};

/**
 * ✅ 라우트별 요청 제한 (RateLimitGuard 가 읽음)
 * @example @RateLimit({ perMinute: 10, perDay: 200 })
 */
export const RateLimit = (options: RateLimitOptions = {}) =>
  SetMetadata(RATE_LIMIT_KEY, options);
