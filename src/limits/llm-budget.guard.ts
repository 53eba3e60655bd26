// src/limits/llm-budget.guard.ts
import {
  CanActivate,
  HttpException,
  HttpStatus,
  Injectable,
} from '@nestjs/common';

import { UsageTracker } from './usage.tracker';

/** 이번 달 언어모델 비용이 한도에 닿으면 429 */
@Injectable()
export class LlmBudgetGuard implements CanActivate {
  constructor(private readonly usage: UsageTracker) {}

  canActivate(): boolean {
    const { withinLimit, currentCost, limit } = this.usage.budget();
    if (withinLimit) return true;

    throw new HttpException(
      {
        error: 'Monthly LLM limit exceeded',
        message: `Monthly spending limit of $${limit} exceeded.`,
        currentCost,
        limit,
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}
