// src/tmdb/tmdb.service.ts
import {
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  OnModuleInit,
  ServiceUnavailableException,
} from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import type { AxiosResponse } from 'axios';
import type { Cache } from 'cache-manager';
import { firstValueFrom } from 'rxjs';

import {
  errMessage,
  isArray,
  isNumber,
  isRecord,
  isString,
} from '../common/safe';
import {
  HOUR_MS,
  readNumber,
  readOptionalString,
  readString,
} from '../config/env';
import {
  FALLBACK_GENRES,
  toMovieRecord,
  toMovieRecords,
  unknownGenre,
} from './tmdb.mapper';
import type {
  DiscoverFilters,
  MovieRecord,
  SearchFilters,
  TmdbQuery,
} from './tmdb.types';

const SEARCH_TTL_MS = HOUR_MS;
const MAX_RETRIES = 2;
const DEFAULT_RETRY_AFTER_SEC = 1;
const MAX_RETRY_WAIT_MS = 10_000;
const REQUEST_TIMEOUT_MS = 10_000;

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** Retry-After(초) → 대기 ms, 최대 10초 */
export function retryAfterMs(header: unknown): number {
  const sec =
    isString(header) && header.trim() !== ''
      ? Number(header)
      : isNumber(header)
        ? header
        : DEFAULT_RETRY_AFTER_SEC;
  const ms =
    Number.isFinite(sec) && sec >= 0
      ? sec * 1000
      : DEFAULT_RETRY_AFTER_SEC * 1000;
  return Math.min(ms, MAX_RETRY_WAIT_MS);
}

function cacheKey(prefix: string, params: TmdbQuery): string {
  const parts = Object.keys(params)
    .sort()
    .filter((k) => params[k] !== undefined)
    .map((k) => `${k}=${String(params[k])}`);
  return [prefix, ...parts].join(':');
}

@Injectable()
export class TmdbService implements OnModuleInit {
  private readonly logger = new Logger(TmdbService.name);

  private readonly baseUrl: string;
  private readonly language: string;
  private readonly minIntervalMs: number;
  private readonly detailsTtlMs: number;

  private lastRequestAt = 0;
  private gate: Promise<void> = Promise.resolve();
  private genres = new Map<number, string>(FALLBACK_GENRES);

  constructor(
    private readonly http: HttpService,
    private readonly config: ConfigService,
    @Inject(CACHE_MANAGER) private readonly cache: Cache,
  ) {
    this.baseUrl = readString(
      config,
      'TMDB_BASE_URL',
      'https://api.themoviedb.org/3',
    ).replace(/\/+$/, '');
    this.language = readString(config, 'TMDB_LANGUAGE', 'en-US');
    this.minIntervalMs = readNumber(config, 'TMDB_MIN_INTERVAL_MS', 50);
    this.detailsTtlMs = readNumber(config, 'CACHE_TTL_HOURS', 24) * HOUR_MS;
  }

  async onModuleInit(): Promise<void> {
    if (!this.hasApiKey()) {
      this.logger.warn(
        'TMDB_API_KEY not set. Movie lookups will return empty results.',
      );
      return;
    }
    await this.refreshGenres();
  }

  hasApiKey(): boolean {
    return readOptionalString(this.config, 'TMDB_API_KEY') !== null;
  }

  private apiKey(): string {
    const key = readOptionalString(this.config, 'TMDB_API_KEY');
    if (!key) {
      throw new InternalServerErrorException(
        'TMDB_API_KEY 가 설정되어 있지 않습니다.',
      );
    }
    return key;
  }

  private toUrl(path: string): string {
    const p = path.startsWith('/') ? path : `/${path}`;
    return `${this.baseUrl}${p}`;
  }

  /**
   * 요청 사이 최소 간격 유지
   * - 동시 호출도 gate 에 줄을 세워서 하나씩 슬롯을 받음
   */
  private throttle(): Promise<void> {
    const turn = this.gate.then(async () => {
      const wait = this.lastRequestAt + this.minIntervalMs - Date.now();
      if (wait > 0) await sleep(wait);
      this.lastRequestAt = Date.now();
    });
    this.gate = turn;
    return turn;
  }

  private async send(
    path: string,
    params: TmdbQuery,
  ): Promise<AxiosResponse<unknown>> {
    try {
      return await firstValueFrom(
        this.http.get<unknown>(this.toUrl(path), {
          params,
          timeout: REQUEST_TIMEOUT_MS,
          validateStatus: () => true,
        }),
      );
    } catch (e: unknown) {
      throw new ServiceUnavailableException(errMessage(e));
    }
  }

  /**
   * GET 요청 (실패 시 throw)
   * - 429 는 Retry-After 만큼 기다렸다가 최대 2회 재시도
   */
  private async get(path: string, params: TmdbQuery): Promise<unknown> {
    const api_key = this.apiKey();

    for (let attempt = 0; ; attempt++) {
      await this.throttle();
      const res = await this.send(path, { ...params, api_key });

      if (res.status === 429 && attempt < MAX_RETRIES) {
        const waitMs = retryAfterMs(res.headers['retry-after']);
        this.logger.warn(
          `TMDB rate limited on ${path}, retrying in ${waitMs}ms`,
        );
        await sleep(waitMs);
        continue;
      }

      if (res.status < 200 || res.status >= 300) {
        throw new ServiceUnavailableException(
          `TMDB ${path} failed with status ${res.status}`,
        );
      }
      return res.data;
    }
  }

  private async cacheGet<T>(key: string): Promise<T | undefined> {
    try {
      return await this.cache.get<T>(key);
    } catch (e: unknown) {
      this.logger.warn(`cache get failed (${key}): ${errMessage(e)}`);
      return undefined;
    }
  }

  private async cacheSet(
    key: string,
    value: unknown,
    ttlMs: number,
  ): Promise<void> {
    try {
      await this.cache.set(key, value, ttlMs);
    } catch (e: unknown) {
      this.logger.warn(`cache set failed (${key}): ${errMessage(e)}`);
    }
  }

  private async cached<T>(
    key: string,
    ttlMs: number,
    load: () => Promise<T>,
  ): Promise<T> {
    const hit = await this.cacheGet<T>(key);
    if (hit !== undefined) return hit;

    const value = await load();
    await this.cacheSet(key, value, ttlMs);
    return value;
  }

  private genreName = (id: number): string =>
    this.genres.get(id) ?? unknownGenre(id);

  /** 목록 요청 공통: 실패하면 로그 후 빈 배열 */
  private async list(
    prefix: string,
    path: string,
    params: TmdbQuery,
  ): Promise<MovieRecord[]> {
    const query: TmdbQuery = {
      language: this.language,
      include_adult: false,
      page: 1,
      ...params,
    };

    try {
      return await this.cached(
        cacheKey(prefix, query),
        SEARCH_TTL_MS,
        async () => toMovieRecords(await this.get(path, query), this.genreName),
      );
    } catch (e: unknown) {
      this.logger.error(`TMDB ${prefix} failed: ${errMessage(e)}`);
      return [];
    }
  }

  // ---------- 검색/디스커버 ----------
  async searchMovies(
    query: string,
    filters: SearchFilters = {},
  ): Promise<MovieRecord[]> {
    const q = query.trim();
    if (!q) return [];

    return await this.list('search', '/search/movie', {
      query: q,
      year: filters.year,
      page: filters.page ?? 1,
    });
  }

  discoverMovies(filters: DiscoverFilters = {}): Promise<MovieRecord[]> {
    return this.list('discover', '/discover/movie', {
      sort_by: 'popularity.desc',
      ...filters,
    });
  }

  // ---------- 기본 리스트 ----------
  getPopularMovies(page = 1): Promise<MovieRecord[]> {
    return this.discoverMovies({ sort_by: 'popularity.desc', page });
  }

  getTopRatedMovies(page = 1): Promise<MovieRecord[]> {
    return this.discoverMovies({
      sort_by: 'vote_average.desc',
      'vote_count.gte': 1000,
      page,
    });
  }

  // ---------- 상세 ----------
  async getMovieDetails(id: number): Promise<MovieRecord | null> {
    const query: TmdbQuery = {
      language: this.language,
      append_to_response: 'credits',
    };

    try {
      return await this.cached(
        cacheKey(`movie:${id}`, query),
        this.detailsTtlMs,
        async () =>
          toMovieRecord(await this.get(`/movie/${id}`, query), this.genreName),
      );
    } catch (e: unknown) {
      this.logger.error(`TMDB details ${id} failed: ${errMessage(e)}`);
      return null;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.get('/configuration', {});
      return true;
    } catch (e: unknown) {
      this.logger.warn(`TMDB health check failed: ${errMessage(e)}`);
      return false;
    }
  }

  // ---------- 장르 ----------
  genreVocabulary(): ReadonlyMap<number, string> {
    return this.genres;
  }

  /** ✅ 매주 장르 목록 갱신 (실패하면 기존 표 유지) */
  @Cron(CronExpression.EVERY_WEEK)
  async refreshGenres(): Promise<void> {
    try {
      const data = await this.get('/genre/movie/list', {
        language: this.language,
      });
      if (!isRecord(data) || !isArray(data.genres)) {
        this.logger.warn('TMDB genre list malformed, keeping current table');
        return;
      }

      const next = new Map<number, string>(FALLBACK_GENRES);
      for (const g of data.genres) {
        if (isRecord(g) && isNumber(g.id) && isString(g.name)) {
          next.set(Math.trunc(g.id), g.name);
        }
      }
      this.genres = next;
      this.logger.log(`TMDB genres loaded: ${next.size}`);
    } catch (e: unknown) {
      this.logger.warn(`TMDB genre refresh failed: ${errMessage(e)}`);
    }
  }
}
