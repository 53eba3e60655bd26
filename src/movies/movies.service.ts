// src/movies/movies.service.ts
import { Injectable, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { clamp } from '../common/safe';
import { readString } from '../config/env';
import {
  DEFAULT_IMAGE_BASE_URL,
  withImageUrls,
  type MovieResponse,
} from '../tmdb/tmdb.mapper';
import { TmdbService } from '../tmdb/tmdb.service';
import type { MovieRecord } from '../tmdb/tmdb.types';

export const MAX_LIST_PAGE = 10;

export type MovieListResponse = {
  movies: MovieResponse[];
  page: number;
  timestamp: string;
};

export type MovieDetailsResponse = {
  movie: MovieResponse;
  timestamp: string;
};

/** 쿼리 page → 1~10 (숫자가 아니면 1) */
export function resolvePage(raw?: string): number {
  const n = raw ? Number(raw) : 1;
  return Number.isFinite(n) ? clamp(Math.trunc(n), 1, MAX_LIST_PAGE) : 1;
}

@Injectable()
export class MoviesService {
  private readonly imageBaseUrl: string;

  constructor(
    private readonly tmdb: TmdbService,
    config: ConfigService,
  ) {
    this.imageBaseUrl = readString(
      config,
      'TMDB_IMAGE_BASE_URL',
      DEFAULT_IMAGE_BASE_URL,
    );
  }

  async getPopular(page = 1): Promise<MovieListResponse> {
    const movies = await this.tmdb.getPopularMovies(page);
    return this.toList(movies, page);
  }

  async getTopRated(page = 1): Promise<MovieListResponse> {
    const movies = await this.tmdb.getTopRatedMovies(page);
    return this.toList(movies, page);
  }

  async getDetails(id: number): Promise<MovieDetailsResponse> {
    const movie = await this.tmdb.getMovieDetails(id);
    if (!movie) {
      throw new NotFoundException(`Movie with ID ${id} not found`);
    }
    return {
      movie: withImageUrls(movie, this.imageBaseUrl),
      timestamp: new Date().toISOString(),
    };
  }

  private toList(movies: MovieRecord[], page: number): MovieListResponse {
    return {
      movies: movies.map((m) => withImageUrls(m, this.imageBaseUrl)),
      page,
      timestamp: new Date().toISOString(),
    };
  }
}
