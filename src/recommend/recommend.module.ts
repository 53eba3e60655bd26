// src/recommend/recommend.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AiModule } from '../ai/ai.module';
import { TmdbModule } from '../tmdb/tmdb.module';
import { CandidateAggregator } from './recommend.aggregator';
import { RecommendController } from './recommend.controller';
import { RecommendService } from './recommend.service';

@Module({
  imports: [ConfigModule, TmdbModule, AiModule],
  controllers: [RecommendController],
  providers: [CandidateAggregator, RecommendService],
})
export class RecommendModule {}
