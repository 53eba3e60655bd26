// src/recommend/recommend.scorer.ts
import { clamp, toYear } from '../common/safe';
import type { MovieRecord } from '../tmdb/tmdb.types';
import {
  EMOTION_MOOD_TABLE,
  genreToMoods,
  inferMovieMoods,
} from './recommend.lexicon';
import {
  isEmotionLabel,
  isMoodLabel,
  type EmotionVector,
  type MoodVector,
  type RankedCandidate,
  type SearchCriteria,
} from './recommend.types';

export const MOOD_PATH_WEIGHTS = { mood: 0.4, emotion: 0.4, quality: 0.2 };
export const TEXT_PATH_WEIGHTS = { relevance: 0.7, quality: 0.3 };

const REASON_THRESHOLD = 0.3;
const MAX_REASONS = 4;

type Scored<V> = { score: number; matches: V };

function sumWeights(v: Readonly<Partial<Record<string, number>>>): number {
  let total = 0;
  for (const w of Object.values(v)) total += w ?? 0;
  return total;
}

/** 값 내림차순 (동점이면 원래 순서 유지) */
function topEntries(
  v: Readonly<Partial<Record<string, number>>>,
  limit: number,
): Array<[string, number]> {
  return Object.entries(v)
    .map(([k, w]): [string, number] => [k, w ?? 0])
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);
}

/**
 * 무드 일치도
 * - label별 matchValue = min(target, movieMood)
 * - Σ(matchValue × target) / Σtarget
 */
export function scoreMood(
  movie: MovieRecord,
  target: Readonly<MoodVector>,
): Scored<MoodVector> {
  const movieMoods = inferMovieMoods(movie.genres);
  const matches: MoodVector = {};
  let total = 0;

  for (const [label, t] of Object.entries(target)) {
    if (!isMoodLabel(label) || t === undefined) continue;
    const value = Math.min(t, movieMoods[label] ?? 0);
    matches[label] = value;
    total += value * t;
  }

  const targetSum = sumWeights(target);
  return { score: targetSum > 0 ? total / targetSum : 0, matches };
}

/**
 * 감정 일치도
 * - 감정이 함축하는 무드마다, 영화 장르들 중 (장르무드 × 감정무드) 최댓값
 * - 테이블에 없는 감정은 0점이지만 분모에는 들어감
 */
export function scoreEmotion(
  movie: MovieRecord,
  target: Readonly<EmotionVector>,
): Scored<EmotionVector> {
  const matches: EmotionVector = {};
  let total = 0;

  for (const [label, t] of Object.entries(target)) {
    if (!isEmotionLabel(label) || t === undefined) continue;
    const emotionMoods = EMOTION_MOOD_TABLE.get(label);
    if (!emotionMoods) continue;

    let best = 0;
    for (const [mood, emotionWeight] of Object.entries(emotionMoods)) {
      if (!isMoodLabel(mood) || emotionWeight === undefined) continue;
      for (const genre of movie.genres) {
        const genreWeight = genreToMoods(genre)[mood] ?? 0;
        best = Math.max(best, genreWeight * emotionWeight);
      }
    }

    matches[label] = best;
    total += best * t;
  }

  const targetSum = sumWeights(target);
  return { score: targetSum > 0 ? total / targetSum : 0, matches };
}

/** 평점 위주 + 인기도/투표수 보너스(상한 있음). 합계는 1을 넘을 수 있음 */
export function scoreQuality(movie: MovieRecord): number {
  const rating = Math.min(movie.voteAverage / 10, 1);
  const popularity = Math.min(movie.popularity / 100, 0.3);
  const reliability = Math.min(movie.voteCount / 1000, 0.2);
  return rating + popularity + reliability;
}

function keywordGenreHits(
  movie: MovieRecord,
  keywords: readonly string[],
): Array<{ keyword: string; genre: string }> {
  const hits: Array<{ keyword: string; genre: string }> = [];
  for (const keyword of keywords) {
    const k = keyword.toLowerCase();
    for (const genre of movie.genres) {
      if (genre.toLowerCase().includes(k)) hits.push({ keyword, genre });
    }
  }
  return hits;
}

export function scoreTextRelevance(
  movie: MovieRecord,
  searchText: string,
  criteria: SearchCriteria,
): number {
  const search = searchText.toLowerCase();
  let score = 0;

  if (movie.title.toLowerCase().includes(search)) score += 0.8;
  if (movie.originalTitle.toLowerCase().includes(search)) score += 0.6;

  const overviewWords = new Set(movie.overview.toLowerCase().split(/\s+/));
  const searchWords = search.split(/\s+/).filter(Boolean);
  if (searchWords.length > 0) {
    const hits = searchWords.filter((w) => overviewWords.has(w)).length;
    score += (hits / searchWords.length) * 0.4;
  }

  score += keywordGenreHits(movie, criteria.keywords).length * 0.3;

  const year = toYear(movie.releaseDate);
  if (criteria.year !== null && year !== null) {
    if (year === criteria.year) score += 0.5;
    else if (Math.abs(year - criteria.year) <= 2) score += 0.2;
  }

  return clamp(score, 0, 1);
}

function qualityReasons(movie: MovieRecord): string[] {
  const reasons: string[] = [];
  if (movie.voteAverage >= 7.5) reasons.push('Highly rated film');
  else if (movie.voteAverage >= 6.5) reasons.push('Well-reviewed movie');
  if (movie.popularity > 50) reasons.push('Popular choice');
  return reasons;
}

export function buildMatchReasons(
  movie: MovieRecord,
  moodMatches: Readonly<MoodVector>,
  emotionMatches: Readonly<EmotionVector>,
  targetMoods: Readonly<MoodVector>,
  targetEmotions: Readonly<EmotionVector>,
): string[] {
  const reasons: string[] = [];

  for (const [mood, value] of topEntries(moodMatches, 3)) {
    if (value > REASON_THRESHOLD && mood in targetMoods) {
      reasons.push(`Matches your ${mood.replace(/-/g, ' ')} mood`);
    }
  }

  for (const [emotion, value] of topEntries(emotionMatches, 2)) {
    if (value > REASON_THRESHOLD && emotion in targetEmotions) {
      reasons.push(`Suits your ${emotion} feeling`);
    }
  }

  const primaryGenre = movie.genres[0];
  if (primaryGenre) reasons.push(`Great ${primaryGenre.toLowerCase()} film`);

  reasons.push(...qualityReasons(movie));

  if (reasons.length === 0) reasons.push('Recommended for you');
  return reasons.slice(0, MAX_REASONS);
}

export function buildTextMatchReasons(
  movie: MovieRecord,
  searchText: string,
  criteria: SearchCriteria,
): string[] {
  const reasons: string[] = [];

  if (movie.title.toLowerCase().includes(searchText.toLowerCase())) {
    reasons.push('Title matches your search');
  }

  const matchedGenres = new Set<string>();
  for (const keyword of criteria.keywords) {
    const k = keyword.toLowerCase();
    const genre = movie.genres.find((g) => g.toLowerCase().includes(k));
    if (genre && !matchedGenres.has(genre)) {
      matchedGenres.add(genre);
      reasons.push(`Matches ${genre} genre`);
    }
  }

  const year = toYear(movie.releaseDate);
  if (criteria.year !== null && year === criteria.year) {
    reasons.push(`From ${year}`);
  }

  if (movie.voteAverage >= 7.5) reasons.push('Highly rated');

  if (reasons.length === 0) reasons.push('Recommended based on your search');
  return reasons.slice(0, MAX_REASONS);
}

/** 무드 경로: 0.4·mood + 0.4·emotion + 0.2·quality */
export function scoreForMood(
  movie: MovieRecord,
  targetMoods: Readonly<MoodVector>,
  targetEmotions: Readonly<EmotionVector>,
): RankedCandidate {
  const mood = scoreMood(movie, targetMoods);
  const emotion = scoreEmotion(movie, targetEmotions);
  const quality = scoreQuality(movie);

  const score =
    mood.score * MOOD_PATH_WEIGHTS.mood +
    emotion.score * MOOD_PATH_WEIGHTS.emotion +
    quality * MOOD_PATH_WEIGHTS.quality;

  return {
    movie,
    score,
    matchReasons: buildMatchReasons(
      movie,
      mood.matches,
      emotion.matches,
      targetMoods,
      targetEmotions,
    ),
    moodMatches: mood.matches,
    emotionMatches: emotion.matches,
  };
}

/** 텍스트 경로: 0.7·relevance + 0.3·quality */
export function scoreForText(
  movie: MovieRecord,
  searchText: string,
  criteria: SearchCriteria,
): RankedCandidate {
  const relevance = scoreTextRelevance(movie, searchText, criteria);
  const quality = scoreQuality(movie);

  return {
    movie,
    score:
      relevance * TEXT_PATH_WEIGHTS.relevance +
      quality * TEXT_PATH_WEIGHTS.quality,
    matchReasons: buildTextMatchReasons(movie, searchText, criteria),
    moodMatches: {},
    emotionMatches: {},
  };
}

/** 점수 내림차순 안정 정렬 */
export function sortByScore(items: RankedCandidate[]): RankedCandidate[] {
  return [...items].sort((a, b) => b.score - a.score);
}
