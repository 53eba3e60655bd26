// src/limits/limits.module.ts
import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { LlmBudgetGuard } from './llm-budget.guard';
import { RateLimitGuard } from './rate-limit.guard';
import { RateLimitStore } from './rate-limit.store';
import { UsageTracker } from './usage.tracker';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [UsageTracker, RateLimitStore, RateLimitGuard, LlmBudgetGuard],
  exports: [UsageTracker, RateLimitStore, RateLimitGuard, LlmBudgetGuard],
})
export class LimitsModule {}
