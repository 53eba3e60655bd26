// src/testing/movie.fixture.ts
import type { MovieRecord } from '../tmdb/tmdb.types';

export function makeMovie(overrides: Partial<MovieRecord> = {}): MovieRecord {
  return {
    id: 1,
    title: 'Untitled',
    originalTitle: 'Untitled',
    overview: '',
    releaseDate: null,
    posterPath: null,
    backdropPath: null,
    genreIds: [],
    genres: [],
    voteAverage: 0,
    voteCount: 0,
    popularity: 0,
    runtime: null,
    originalLanguage: 'en',
    adult: false,
    director: null,
    ...overrides,
  };
}
