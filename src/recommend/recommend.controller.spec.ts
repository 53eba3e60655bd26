import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';

import { DEFAULT_CONTEXT } from '../ai/ai.fallback';
import { LlmBudgetGuard } from '../limits/llm-budget.guard';
import { RateLimitGuard } from '../limits/rate-limit.guard';
import { makeMovie } from '../testing/movie.fixture';
import { RecommendDto } from './dto/recommend.dto';
import { RecommendController } from './recommend.controller';
import { RecommendService } from './recommend.service';
import type { RankedCandidate } from './recommend.types';

const candidate: RankedCandidate = {
  movie: makeMovie({ id: 42, title: 'Heat', posterPath: '/heat.jpg' }),
  score: 0.848,
  matchReasons: ['Great action film'],
  moodMatches: { action: 0.8 },
  emotionMatches: { excitement: 0.72 },
};

const dto = (over: Partial<RecommendDto>): RecommendDto =>
  Object.assign(new RecommendDto(), { text: 'heat', ...over });

async function setup() {
  const recommend = {
    recommendByMoodText: jest.fn(),
    recommendByText: jest.fn(),
  };
  const allow = { canActivate: () => true };

  const moduleRef = await Test.createTestingModule({
    controllers: [RecommendController],
    providers: [
      { provide: RecommendService, useValue: recommend },
      { provide: ConfigService, useValue: new ConfigService({}) },
    ],
  })
    .overrideGuard(RateLimitGuard)
    .useValue(allow)
    .overrideGuard(LlmBudgetGuard)
    .useValue(allow)
    .compile();

  return { controller: moduleRef.get(RecommendController), recommend };
}

async function validationMessages(body: unknown): Promise<unknown> {
  const pipe = new ValidationPipe({ transform: true, whitelist: true });
  try {
    await pipe.transform(body, { type: 'body', metatype: RecommendDto });
  } catch (e: unknown) {
    if (e instanceof BadRequestException) return e.getResponse();
    throw e;
  }
  return null;
}

describe('RecommendController', () => {
  it('POST mood: 분석 + 추천 + 메타데이터', async () => {
    const { controller, recommend } = await setup();
    const analysis = {
      moods: { action: 0.9 },
      emotions: { excitement: 0.8 },
      context: { ...DEFAULT_CONTEXT },
      reasoning: 'wants thrills',
      confidence: 0.85,
      method: 'llm',
    };
    recommend.recommendByMoodText.mockResolvedValue({
      analysis,
      results: [candidate],
    });

    const res = await controller.byMood(dto({ text: 'thrills please' }));

    expect(recommend.recommendByMoodText).toHaveBeenCalledWith(
      'thrills please',
      8,
      { diversify: undefined },
    );
    expect(res.analysis).toBe(analysis);
    expect(res.recommendations).toHaveLength(1);
    expect(res.recommendations[0]).toMatchObject({
      score: 85,
      movie: {
        id: 42,
        posterUrl: 'https://image.tmdb.org/t/p/w500/heat.jpg',
      },
      matchReasons: ['Great action film'],
    });
    expect(res.metadata).toMatchObject({
      totalFound: 1,
      method: 'mood_analysis',
    });
  });

  it('POST search: 요청 개수는 20 으로 제한', async () => {
    const { controller, recommend } = await setup();
    recommend.recommendByText.mockResolvedValue([]);

    const res = await controller.bySearch(
      dto({ numRecommendations: 50, diversify: true }),
    );

    expect(recommend.recommendByText).toHaveBeenCalledWith('heat', 20, {
      diversify: true,
    });
    expect(res.searchQuery).toBe('heat');
    expect(res.recommendations).toEqual([]);
    expect(res.metadata).toMatchObject({ totalFound: 0, method: 'text_search' });
  });

  it('RecommendDto: 공백뿐인 텍스트는 거부', async () => {
    await expect(validationMessages({ text: '   ' })).resolves.toMatchObject({
      statusCode: 400,
      message: ['Text cannot be empty'],
    });
  });

  it('RecommendDto: 앞뒤 공백을 자르고 통과', async () => {
    const pipe = new ValidationPipe({ transform: true, whitelist: true });

    const value: unknown = await pipe.transform(
      { text: '  sad day  ', numRecommendations: 3, extra: 'dropped' },
      { type: 'body', metatype: RecommendDto },
    );

    expect(value).toBeInstanceOf(RecommendDto);
    expect(value).toEqual(
      Object.assign(new RecommendDto(), {
        text: 'sad day',
        numRecommendations: 3,
      }),
    );
  });
});
