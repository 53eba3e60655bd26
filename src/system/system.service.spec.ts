import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';

import { AiService } from '../ai/ai.service';
import { UsageTracker } from '../limits/usage.tracker';
import { TmdbService } from '../tmdb/tmdb.service';
import { SystemService } from './system.service';

async function setup(env: Record<string, unknown> = {}) {
  const tmdb = { healthCheck: jest.fn() };
  const ai = { hasApiKey: jest.fn() };

  const moduleRef = await Test.createTestingModule({
    providers: [
      SystemService,
      UsageTracker,
      { provide: TmdbService, useValue: tmdb },
      { provide: AiService, useValue: ai },
      { provide: ConfigService, useValue: new ConfigService(env) },
    ],
  }).compile();

  return {
    system: moduleRef.get(SystemService),
    usage: moduleRef.get(UsageTracker),
    tmdb,
    ai,
  };
}

describe('SystemService', () => {
  it('health: 모두 정상이면 healthy', async () => {
    const { system, tmdb, ai } = await setup();
    tmdb.healthCheck.mockResolvedValue(true);
    ai.hasApiKey.mockReturnValue(true);

    await expect(system.health()).resolves.toMatchObject({
      status: 'healthy',
      services: { tmdb: 'healthy', llm: 'healthy' },
      version: '2.0.0',
    });
  });

  it('health: 하나라도 비정상이면 degraded', async () => {
    const { system, tmdb, ai } = await setup();
    tmdb.healthCheck.mockResolvedValue(false);
    ai.hasApiKey.mockReturnValue(true);

    await expect(system.health()).resolves.toMatchObject({
      status: 'degraded',
      services: { tmdb: 'unhealthy', llm: 'healthy' },
    });
  });

  it('status: 설정과 이번 달 사용량', async () => {
    const { system, usage } = await setup({
      EMERGENCY_STOP: 'true',
      RATE_LIMIT_PER_MINUTE: '5',
    });
    usage.record(1234);

    const report = system.status();

    expect(report.system).toEqual({
      status: 'operational',
      emergencyStop: true,
      rateLimiting: true,
      version: '2.0.0',
    });
    expect(report.usage.llm).toEqual({
      monthlyCost: 0.0025,
      monthlyLimit: 7,
      withinLimit: true,
      requestsThisMonth: 1,
      tokensThisMonth: 1234,
    });
    expect(report.limits).toEqual({
      recommend: { perMinute: 5, perDay: 100 },
      movieDetails: { perMinute: 10, perDay: 200 },
      popular: { perMinute: 5, perDay: 50 },
    });
  });
});
