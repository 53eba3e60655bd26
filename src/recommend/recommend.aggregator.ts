// src/recommend/recommend.aggregator.ts
import { Injectable, Logger } from '@nestjs/common';

import { errMessage } from '../common/safe';
import { TmdbService } from '../tmdb/tmdb.service';
import type { MovieRecord } from '../tmdb/tmdb.types';
import { moodToSearchTerms } from './recommend.lexicon';
import {
  isMoodLabel,
  type MoodLabel,
  type MoodVector,
  type SearchCriteria,
} from './recommend.types';

const TOP_MOODS = 3;
const MOOD_WEIGHT_MIN = 0.3;
const PER_TERM = 10;
const POPULAR_MIN_POOL = 20;
const POPULAR_TAKE = 20;
const DIRECT_SEARCH_TAKE = 15;
const PER_LOOKUP = 10;

/** id 기준 중복 제거 (처음 본 것 유지, 순서 유지) */
export function dedupeById(movies: readonly MovieRecord[]): MovieRecord[] {
  const seen = new Set<number>();
  const out: MovieRecord[] = [];
  for (const m of movies) {
    if (seen.has(m.id)) continue;
    seen.add(m.id);
    out.push(m);
  }
  return out;
}

/** 가중치 내림차순 상위 무드 (동점이면 입력 순서) */
export function topMoods(
  moods: Readonly<MoodVector>,
  limit = TOP_MOODS,
): Array<[MoodLabel, number]> {
  const out: Array<[MoodLabel, number]> = [];
  for (const [k, w] of Object.entries(moods)) {
    if (isMoodLabel(k) && w !== undefined) out.push([k, w]);
  }
  return out.sort((a, b) => b[1] - a[1]).slice(0, limit);
}

/**
 * 후보 영화 수집
 * - 조회는 순서대로 하나씩
 * - 실패한 조회는 경고만 남기고 0건 취급
 */
@Injectable()
export class CandidateAggregator {
  private readonly logger = new Logger(CandidateAggregator.name);

  constructor(private readonly tmdb: TmdbService) {}

  private async lookup(
    label: string,
    run: () => Promise<MovieRecord[]>,
    take: number,
  ): Promise<MovieRecord[]> {
    try {
      return (await run()).slice(0, take);
    } catch (e: unknown) {
      this.logger.warn(`candidate lookup failed (${label}): ${errMessage(e)}`);
      return [];
    }
  }

  async collectForMood(moods: Readonly<MoodVector>): Promise<MovieRecord[]> {
    const pool: MovieRecord[] = [];

    for (const [mood, weight] of topMoods(moods)) {
      if (weight <= MOOD_WEIGHT_MIN) continue;
      for (const term of moodToSearchTerms(mood)) {
        pool.push(
          ...(await this.lookup(
            `search "${term}"`,
            () => this.tmdb.searchMovies(term),
            PER_TERM,
          )),
        );
      }
    }

    if (pool.length < POPULAR_MIN_POOL) {
      pool.push(
        ...(await this.lookup(
          'popular',
          () => this.tmdb.getPopularMovies(),
          POPULAR_TAKE,
        )),
      );
    }

    return dedupeById(pool);
  }

  async collectForText(
    text: string,
    criteria: SearchCriteria,
  ): Promise<MovieRecord[]> {
    const pool: MovieRecord[] = [];
    const add = async (
      label: string,
      run: () => Promise<MovieRecord[]>,
      take = PER_LOOKUP,
    ): Promise<void> => {
      pool.push(...(await this.lookup(label, run, take)));
    };

    await add(
      'direct search',
      () => this.tmdb.searchMovies(text),
      DIRECT_SEARCH_TAKE,
    );

    for (const keyword of criteria.keywords) {
      await add(`keyword "${keyword}"`, () => this.tmdb.searchMovies(keyword));
    }

    for (const genreId of criteria.genreIds) {
      await add(`genre ${genreId}`, () =>
        this.tmdb.discoverMovies({ with_genres: genreId }),
      );
    }

    const { year, runtime } = criteria;
    if (year !== null) {
      await add(`year ${year}`, () =>
        this.tmdb.discoverMovies({ primary_release_year: year }),
      );
    }

    if (runtime !== null) {
      await add(`runtime ${runtime.min}-${runtime.max}`, () =>
        this.tmdb.discoverMovies({
          'with_runtime.gte': runtime.min,
          'with_runtime.lte': runtime.max,
        }),
      );
    }

    if (pool.length === 0) {
      // 아무것도 못 찾으면 인기작으로 대체
      await add('popular', () => this.tmdb.getPopularMovies(), POPULAR_TAKE);
    }

    return dedupeById(pool);
  }
}
