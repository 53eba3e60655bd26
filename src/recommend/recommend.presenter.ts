// src/recommend/recommend.presenter.ts
import { clamp } from '../common/safe';
import { withImageUrls, type MovieResponse } from '../tmdb/tmdb.mapper';
import type {
  EmotionVector,
  MoodVector,
  RankedCandidate,
} from './recommend.types';

export const DEFAULT_RECOMMENDATIONS = 8;
export const MAX_RECOMMENDATIONS = 20;

export type RecommendationItem = {
  movie: MovieResponse;
  /** 0~100 (반올림) */
  score: number;
  matchReasons: string[];
  moodMatches: MoodVector;
  emotionMatches: EmotionVector;
};

export type RecommendMetadata = {
  totalFound: number;
  timestamp: string;
  method: 'mood_analysis' | 'text_search';
};

export function resolveCount(n: number | undefined): number {
  const count = Math.trunc(n ?? DEFAULT_RECOMMENDATIONS);
  return clamp(count, 1, MAX_RECOMMENDATIONS);
}

export function toRecommendationItem(
  c: RankedCandidate,
  imageBaseUrl: string,
): RecommendationItem {
  return {
    movie: withImageUrls(c.movie, imageBaseUrl),
    score: Math.round(c.score * 100),
    matchReasons: c.matchReasons,
    moodMatches: c.moodMatches,
    emotionMatches: c.emotionMatches,
  };
}

export function buildMetadata(
  totalFound: number,
  method: RecommendMetadata['method'],
  now = new Date(),
): RecommendMetadata {
  return { totalFound, timestamp: now.toISOString(), method };
}
