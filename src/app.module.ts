// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';

import { AiModule } from './ai/ai.module';
import { validateEnv } from './config/env.validation';
import { LimitsModule } from './limits/limits.module';
import { MoviesModule } from './movies/movies.module';
import { RecommendModule } from './recommend/recommend.module';
import { SystemModule } from './system/system.module';
import { TmdbModule } from './tmdb/tmdb.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    ScheduleModule.forRoot(),

    LimitsModule,
    TmdbModule,
    AiModule,
    RecommendModule,
    MoviesModule,
    SystemModule,
  ],
})
export class AppModule {}
