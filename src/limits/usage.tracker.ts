// src/limits/usage.tracker.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { readNumber } from '../config/env';

export type MonthlyUsage = {
  /** "YYYY-MM" */
  month: string;
  totalTokens: number;
  totalCost: number;
  requests: number;
};

export type BudgetStatus = {
  withinLimit: boolean;
  currentCost: number;
  limit: number;
};

function monthKey(now: Date): string {
  const m = String(now.getMonth() + 1).padStart(2, '0');
  return `${now.getFullYear()}-${m}`;
}

/**
 * 언어모델 사용량(토큰/비용/요청 수)을 월 단위로 메모리에 집계
 */
@Injectable()
export class UsageTracker {
  private readonly logger = new Logger(UsageTracker.name);
  private readonly months = new Map<string, MonthlyUsage>();

  private readonly costPer1kTokens: number;
  private readonly monthlyLimit: number;

  constructor(config: ConfigService) {
    this.costPer1kTokens = readNumber(
      config,
      'OPENAI_COST_PER_1K_TOKENS',
      0.002,
    );
    this.monthlyLimit = readNumber(config, 'OPENAI_MONTHLY_LIMIT', 7);
  }

  estimateCost(tokens: number): number {
    return (Math.max(0, tokens) / 1000) * this.costPer1kTokens;
  }

  record(tokens: number, now = new Date()): MonthlyUsage {
    const key = monthKey(now);
    const prev = this.months.get(key) ?? {
      month: key,
      totalTokens: 0,
      totalCost: 0,
      requests: 0,
    };

    const next: MonthlyUsage = {
      month: key,
      totalTokens: prev.totalTokens + Math.max(0, Math.trunc(tokens)),
      totalCost: prev.totalCost + this.estimateCost(tokens),
      requests: prev.requests + 1,
    };
    this.months.set(key, next);

    if (next.totalCost >= this.monthlyLimit) {
      this.logger.warn(
        `LLM monthly budget reached: $${next.totalCost.toFixed(4)} / $${this.monthlyLimit}`,
      );
    }
    return next;
  }

  current(now = new Date()): MonthlyUsage {
    const key = monthKey(now);
    return (
      this.months.get(key) ?? {
        month: key,
        totalTokens: 0,
        totalCost: 0,
        requests: 0,
      }
    );
  }

  budget(now = new Date()): BudgetStatus {
    const currentCost = this.current(now).totalCost;
    return {
      withinLimit: currentCost < this.monthlyLimit,
      currentCost,
      limit: this.monthlyLimit,
    };
  }
}
