// src/tmdb/tmdb.types.ts
export type TmdbQuery = Record<string, string | number | boolean | undefined>;

/** discover 필터 (TMDB 파라미터 이름 그대로) */
export type DiscoverFilters = {
  with_genres?: number | string;
  primary_release_year?: number;
  'with_runtime.gte'?: number;
  'with_runtime.lte'?: number;
  'vote_count.gte'?: number;
  sort_by?: string;
  page?: number;
};

export type SearchFilters = {
  year?: number;
  page?: number;
};

/**
 * 추천 코어가 다루는 영화 레코드 (요청 단위로만 살아있음)
 */
export type MovieRecord = {
  id: number;
  title: string;
  originalTitle: string;
  overview: string;
  releaseDate: string | null;

  posterPath: string | null;
  backdropPath: string | null;

  genreIds: number[];
  genres: string[];

  voteAverage: number;
  voteCount: number;
  popularity: number;

  runtime: number | null;
  originalLanguage: string;
  adult: boolean;

  director: string | null;
};
