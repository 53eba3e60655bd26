// src/movies/movies.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { TmdbModule } from '../tmdb/tmdb.module';
import { MoviesController } from './movies.controller';
import { MoviesService } from './movies.service';

@Module({
  imports: [ConfigModule, TmdbModule],
  controllers: [MoviesController],
  providers: [MoviesService],
})
export class MoviesModule {}
