// src/system/system.service.ts
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { AiService } from '../ai/ai.service';
import { readBool, readNumber } from '../config/env';
import { UsageTracker } from '../limits/usage.tracker';
import { TmdbService } from '../tmdb/tmdb.service';

export const APP_VERSION = '2.0.0';

type ServiceState = 'healthy' | 'unhealthy';

export type HealthReport = {
  status: 'healthy' | 'degraded';
  timestamp: string;
  services: { tmdb: ServiceState; llm: ServiceState };
  version: string;
};

export type WindowLimit = { perMinute: number; perDay: number };

export type StatusReport = {
  system: {
    status: 'operational';
    emergencyStop: boolean;
    rateLimiting: boolean;
    version: string;
  };
  usage: {
    llm: {
      monthlyCost: number;
      monthlyLimit: number;
      withinLimit: boolean;
      requestsThisMonth: number;
      tokensThisMonth: number;
    };
  };
  limits: {
    recommend: WindowLimit;
    movieDetails: WindowLimit;
    popular: WindowLimit;
  };
  timestamp: string;
};

const state = (ok: boolean): ServiceState => (ok ? 'healthy' : 'unhealthy');

@Injectable()
export class SystemService {
  constructor(
    private readonly tmdb: TmdbService,
    private readonly ai: AiService,
    private readonly usage: UsageTracker,
    private readonly config: ConfigService,
  ) {}

  async health(): Promise<HealthReport> {
    const tmdbOk = await this.tmdb.healthCheck();
    // 언어모델은 키 유무만 확인 (호출 비용 없이)
    const llmOk = this.ai.hasApiKey();

    return {
      status: tmdbOk && llmOk ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      services: { tmdb: state(tmdbOk), llm: state(llmOk) },
      version: APP_VERSION,
    };
  }

  status(): StatusReport {
    const month = this.usage.current();
    const budget = this.usage.budget();

    return {
      system: {
        status: 'operational',
        emergencyStop: readBool(this.config, 'EMERGENCY_STOP', false),
        rateLimiting: readBool(this.config, 'RATE_LIMIT_ENABLED', true),
        version: APP_VERSION,
      },
      usage: {
        llm: {
          monthlyCost: Math.round(budget.currentCost * 10_000) / 10_000,
          monthlyLimit: budget.limit,
          withinLimit: budget.withinLimit,
          requestsThisMonth: month.requests,
          tokensThisMonth: month.totalTokens,
        },
      },
      limits: {
        recommend: {
          perMinute: readNumber(this.config, 'RATE_LIMIT_PER_MINUTE', 3),
          perDay: readNumber(this.config, 'RATE_LIMIT_PER_DAY', 100),
        },
        movieDetails: { perMinute: 10, perDay: 200 },
        popular: { perMinute: 5, perDay: 50 },
      },
      timestamp: new Date().toISOString(),
    };
  }
}
