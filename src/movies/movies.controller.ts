// src/movies/movies.controller.ts
import {
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Query,
  UseGuards,
} from '@nestjs/common';

import { RateLimit } from '../limits/rate-limit.decorator';
import { RateLimitGuard } from '../limits/rate-limit.guard';
import {
  MoviesService,
  resolvePage,
  type MovieDetailsResponse,
  type MovieListResponse,
} from './movies.service';

@Controller('movies')
@UseGuards(RateLimitGuard)
export class MoviesController {
  constructor(private readonly movies: MoviesService) {}

  @Get('popular')
  @RateLimit({ perMinute: 5, perDay: 50 })
  getPopular(@Query('page') page?: string): Promise<MovieListResponse> {
    return this.movies.getPopular(resolvePage(page));
  }

  @Get('top-rated')
  @RateLimit({ perMinute: 5, perDay: 50 })
  getTopRated(@Query('page') page?: string): Promise<MovieListResponse> {
    return this.movies.getTopRated(resolvePage(page));
  }

  // ✅ 맨 마지막에 두기 (popular/top-rated 잡아먹는 문제 방지)
  @Get(':id')
  @RateLimit({ perMinute: 10, perDay: 200 })
  getDetails(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<MovieDetailsResponse> {
    return this.movies.getDetails(id);
  }
}
