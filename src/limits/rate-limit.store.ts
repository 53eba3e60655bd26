// src/limits/rate-limit.store.ts
import { Injectable, Logger } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';

const SWEEP_INTERVAL_MS = 60 * 1000;

type Bucket = {
  windowMs: number;
  times: number[];
};

/**
 * 메모리 슬라이딩 윈도우
 * - 거절된 요청도 기록에 남음
 * - 윈도우가 다 지난 키는 주기적으로 정리
 */
@Injectable()
export class RateLimitStore {
  private readonly logger = new Logger(RateLimitStore.name);
  private readonly buckets = new Map<string, Bucket>();

  /** 이번 요청을 기록하고 윈도우 안의 요청 수를 반환 */
  hit(key: string, windowMs: number, now = Date.now()): number {
    const since = now - windowMs;
    const times = (this.buckets.get(key)?.times ?? []).filter(
      (t) => t > since,
    );
    times.push(now);
    this.buckets.set(key, { windowMs, times });
    return times.length;
  }

  /** 윈도우 안에 남은 요청이 없는 키 삭제, 삭제한 개수 반환 */
  @Interval(SWEEP_INTERVAL_MS)
  sweep(now = Date.now()): number {
    let removed = 0;
    for (const [key, bucket] of this.buckets) {
      const since = now - bucket.windowMs;
      const times = bucket.times.filter((t) => t > since);
      if (times.length === 0) {
        this.buckets.delete(key);
        removed += 1;
      } else {
        bucket.times = times;
      }
    }

    if (removed > 0) this.logger.debug(`rate limit keys swept: ${removed}`);
    return removed;
  }
}
