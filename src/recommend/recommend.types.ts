// src/recommend/recommend.types.ts
import type { MovieRecord } from '../tmdb/tmdb.types';

export const MOOD_LABELS = [
  'action',
  'adventure',
  'calming',
  'comedy',
  'documentary',
  'drama',
  'educational',
  'emotional',
  'energetic',
  'fantasy',
  'feel-good',
  'heartwarming',
  'horror',
  'intense',
  'magical',
  'melancholic',
  'nostalgic',
  'peaceful',
  'romance',
  'sci-fi',
  'scary',
  'thoughtful',
  'thriller',
  'uplifting',
] as const;

export const EMOTION_LABELS = [
  'joy',
  'sadness',
  'anger',
  'fear',
  'surprise',
  'excitement',
  'calmness',
  'nostalgia',
] as const;

export type MoodLabel = (typeof MOOD_LABELS)[number];
export type EmotionLabel = (typeof EMOTION_LABELS)[number];

/** label → 0~1 가중치 (희소 맵) */
export type MoodVector = Partial<Record<MoodLabel, number>>;
export type EmotionVector = Partial<Record<EmotionLabel, number>>;

const MOOD_SET: ReadonlySet<string> = new Set<string>(MOOD_LABELS);
const EMOTION_SET: ReadonlySet<string> = new Set<string>(EMOTION_LABELS);

export function isMoodLabel(v: string): v is MoodLabel {
  return MOOD_SET.has(v);
}

export function isEmotionLabel(v: string): v is EmotionLabel {
  return EMOTION_SET.has(v);
}

export type RuntimeWindow = { min: number; max: number };

export type SearchCriteria = {
  keywords: string[];
  genreIds: number[];
  year: number | null;
  runtime: RuntimeWindow | null;
};

export type RankedCandidate = {
  movie: MovieRecord;
  score: number;
  matchReasons: string[];
  moodMatches: MoodVector;
  emotionMatches: EmotionVector;
};

export type RecommendOptions = {
  /** 미지정이면 엔트리포인트별 설정값(RECOMMEND_DIVERSIFY_*)을 따름 */
  diversify?: boolean;
};
