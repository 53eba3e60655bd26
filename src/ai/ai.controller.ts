// src/ai/ai.controller.ts
import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';

import { LlmBudgetGuard } from '../limits/llm-budget.guard';
import { RateLimit } from '../limits/rate-limit.decorator';
import { RateLimitGuard } from '../limits/rate-limit.guard';
import { AiService } from './ai.service';
import type { EmotionAnalysis } from './ai.types';
import { AnalyzeDto } from './dto/analyze.dto';

@Controller('ai')
@UseGuards(RateLimitGuard, LlmBudgetGuard)
export class AiController {
  constructor(private readonly aiService: AiService) {}

  @Post('analyze')
  @HttpCode(HttpStatus.OK)
  @RateLimit()
  analyze(@Body() dto: AnalyzeDto): Promise<EmotionAnalysis> {
    return this.aiService.analyze(dto.text);
  }
}
