// src/tmdb/tmdb.mapper.ts
import {
  isArray,
  isBoolean,
  isNumber,
  isRecord,
  isString,
  toNumberOr,
  toStringOr,
  toStringOrNull,
} from '../common/safe';
import type { MovieRecord } from './tmdb.types';

/**
 * TMDB 영어 장르명 (genre/movie/list 로딩 실패 시 사용)
 */
export const FALLBACK_GENRES: ReadonlyMap<number, string> = new Map([
  [28, 'Action'],
  [12, 'Adventure'],
  [16, 'Animation'],
  [35, 'Comedy'],
  [80, 'Crime'],
  [99, 'Documentary'],
  [18, 'Drama'],
  [10751, 'Family'],
  [14, 'Fantasy'],
  [36, 'History'],
  [27, 'Horror'],
  [10402, 'Music'],
  [9648, 'Mystery'],
  [10749, 'Romance'],
  [878, 'Science Fiction'],
  [10770, 'TV Movie'],
  [53, 'Thriller'],
  [10752, 'War'],
  [37, 'Western'],
]);

export type GenreLookup = (id: number) => string;

export const unknownGenre = (id: number): string => `Unknown(${id})`;

function normalizeIds(v: unknown): number[] {
  if (!isArray(v)) return [];
  const out: number[] = [];
  for (const it of v) if (isNumber(it)) out.push(Math.trunc(it));
  return out;
}

function detailsGenres(v: unknown): { ids: number[]; names: string[] } {
  const ids: number[] = [];
  const names: string[] = [];
  if (!isArray(v)) return { ids, names };

  for (const g of v) {
    if (!isRecord(g) || !isNumber(g.id) || !isString(g.name)) continue;
    ids.push(Math.trunc(g.id));
    names.push(g.name);
  }
  return { ids, names };
}

function findDirector(credits: unknown): string | null {
  if (!isRecord(credits) || !isArray(credits.crew)) return null;
  for (const c of credits.crew) {
    if (isRecord(c) && c.job === 'Director' && isString(c.name)) return c.name;
  }
  return null;
}

/**
 * search/discover 결과 한 건 또는 movie details 응답 → MovieRecord
 * - id 가 숫자가 아니면 null (배치에서 제외)
 */
export function toMovieRecord(
  raw: unknown,
  genreName: GenreLookup,
): MovieRecord | null {
  if (!isRecord(raw) || !isNumber(raw.id)) return null;

  // details 응답은 genres: [{id,name}], 목록 응답은 genre_ids: number[]
  const fromDetails = isArray(raw.genres) ? detailsGenres(raw.genres) : null;
  const genreIds = fromDetails?.ids ?? normalizeIds(raw.genre_ids);
  const genres = fromDetails?.names ?? genreIds.map(genreName);

  const title = toStringOr(raw.title, '');

  return {
    id: Math.trunc(raw.id),
    title,
    originalTitle: toStringOr(raw.original_title, title),
    overview: toStringOr(raw.overview, ''),
    releaseDate: toStringOrNull(raw.release_date),
    posterPath: toStringOrNull(raw.poster_path),
    backdropPath: toStringOrNull(raw.backdrop_path),
    genreIds,
    genres,
    voteAverage: toNumberOr(raw.vote_average, 0),
    voteCount: toNumberOr(raw.vote_count, 0),
    popularity: toNumberOr(raw.popularity, 0),
    runtime: isNumber(raw.runtime) ? Math.trunc(raw.runtime) : null,
    originalLanguage: toStringOr(raw.original_language, ''),
    adult: isBoolean(raw.adult) ? raw.adult : false,
    director: findDirector(raw.credits),
  };
}

export function toMovieRecords(
  data: unknown,
  genreName: GenreLookup,
): MovieRecord[] {
  if (!isRecord(data) || !isArray(data.results)) return [];
  const out: MovieRecord[] = [];
  for (const it of data.results) {
    const movie = toMovieRecord(it, genreName);
    if (movie) out.push(movie);
  }
  return out;
}

export function imageUrl(
  baseUrl: string,
  path: string | null,
  size: 'w500' | 'w1280',
): string | null {
  if (!path) return null;
  return `${baseUrl.replace(/\/+$/, '')}/${size}${path}`;
}

export type MovieResponse = MovieRecord & {
  posterUrl: string | null;
  backdropUrl: string | null;
};

export const DEFAULT_IMAGE_BASE_URL = 'https://image.tmdb.org/t/p';

export function withImageUrls(
  movie: MovieRecord,
  baseUrl: string = DEFAULT_IMAGE_BASE_URL,
): MovieResponse {
  return {
    ...movie,
    posterUrl: imageUrl(baseUrl, movie.posterPath, 'w500'),
    backdropUrl: imageUrl(baseUrl, movie.backdropPath, 'w1280'),
  };
}
