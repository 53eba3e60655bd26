// src/recommend/recommend.controller.ts
import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { EmotionAnalysis } from '../ai/ai.types';
import { readString } from '../config/env';
import { LlmBudgetGuard } from '../limits/llm-budget.guard';
import { RateLimit } from '../limits/rate-limit.decorator';
import { RateLimitGuard } from '../limits/rate-limit.guard';
import { DEFAULT_IMAGE_BASE_URL } from '../tmdb/tmdb.mapper';
import { RecommendDto } from './dto/recommend.dto';
import {
  buildMetadata,
  resolveCount,
  toRecommendationItem,
  type RecommendationItem,
  type RecommendMetadata,
} from './recommend.presenter';
import { RecommendService } from './recommend.service';

export type MoodRecommendResponse = {
  analysis: EmotionAnalysis;
  recommendations: RecommendationItem[];
  metadata: RecommendMetadata;
};

export type SearchRecommendResponse = {
  searchQuery: string;
  recommendations: RecommendationItem[];
  metadata: RecommendMetadata;
};

@Controller('recommend')
@UseGuards(RateLimitGuard, LlmBudgetGuard)
export class RecommendController {
  private readonly imageBaseUrl: string;

  constructor(
    private readonly recommend: RecommendService,
    config: ConfigService,
  ) {
    this.imageBaseUrl = readString(
      config,
      'TMDB_IMAGE_BASE_URL',
      DEFAULT_IMAGE_BASE_URL,
    );
  }

  // POST /api/recommend/mood
  @Post('mood')
  @HttpCode(HttpStatus.OK)
  @RateLimit()
  async byMood(@Body() dto: RecommendDto): Promise<MoodRecommendResponse> {
    const { analysis, results } = await this.recommend.recommendByMoodText(
      dto.text,
      resolveCount(dto.numRecommendations),
      { diversify: dto.diversify },
    );

    return {
      analysis,
      recommendations: results.map((r) =>
        toRecommendationItem(r, this.imageBaseUrl),
      ),
      metadata: buildMetadata(results.length, 'mood_analysis'),
    };
  }

  // POST /api/recommend/search
  @Post('search')
  @HttpCode(HttpStatus.OK)
  @RateLimit()
  async bySearch(@Body() dto: RecommendDto): Promise<SearchRecommendResponse> {
    const results = await this.recommend.recommendByText(
      dto.text,
      resolveCount(dto.numRecommendations),
      { diversify: dto.diversify },
    );

    return {
      searchQuery: dto.text,
      recommendations: results.map((r) =>
        toRecommendationItem(r, this.imageBaseUrl),
      ),
      metadata: buildMetadata(results.length, 'text_search'),
    };
  }
}
