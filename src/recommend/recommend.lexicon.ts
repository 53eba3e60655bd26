// src/recommend/recommend.lexicon.ts
import lexiconData from './data/mood-lexicon.json';
import {
  isArray,
  isNumber,
  isRecord,
  isString,
  pickWeights,
} from '../common/safe';
import {
  isEmotionLabel,
  isMoodLabel,
  type EmotionLabel,
  type MoodLabel,
  type MoodVector,
} from './recommend.types';

export type GenreSynonymEntry = {
  /** criteria.keywords 에 들어가는 장르 라벨 */
  label: string;
  /** TMDB 영화 장르 ID (discover with_genres) */
  genreId: number;
  synonyms: readonly string[];
};

const freezeVector = (v: MoodVector): Readonly<MoodVector> =>
  Object.freeze({ ...v });

function buildMoodTable(
  raw: unknown,
): ReadonlyMap<string, Readonly<MoodVector>> {
  const out = new Map<string, Readonly<MoodVector>>();
  if (!isRecord(raw)) return out;
  for (const [key, weights] of Object.entries(raw)) {
    out.set(key, freezeVector(pickWeights(weights, isMoodLabel)));
  }
  return out;
}

function buildSearchTerms(
  raw: unknown,
): ReadonlyMap<MoodLabel, readonly string[]> {
  const out = new Map<MoodLabel, readonly string[]>();
  if (!isRecord(raw)) return out;
  for (const [mood, terms] of Object.entries(raw)) {
    if (!isMoodLabel(mood) || !isArray(terms)) continue;
    out.set(mood, Object.freeze(terms.filter(isString)));
  }
  return out;
}

function buildGenreSynonyms(raw: unknown): readonly GenreSynonymEntry[] {
  if (!isArray(raw)) return [];
  const out: GenreSynonymEntry[] = [];
  for (const it of raw) {
    if (!isRecord(it)) continue;
    const { label, genreId, synonyms } = it;
    if (!isString(label) || !isNumber(genreId) || !isArray(synonyms)) continue;
    out.push(
      Object.freeze({
        label,
        genreId: Math.trunc(genreId),
        synonyms: Object.freeze(
          synonyms.filter(isString).map((s) => s.toLowerCase()),
        ),
      }),
    );
  }
  return Object.freeze(out);
}

/**
 * ✅ 프로세스 전체에서 공유하는 읽기 전용 테이블 (로드 시 1회 구성, 이후 변경 없음)
 */
export const GENRE_MOOD_TABLE = buildMoodTable(lexiconData.genreMoods);

function buildEmotionTable(
  raw: unknown,
): ReadonlyMap<EmotionLabel, Readonly<MoodVector>> {
  const out = new Map<EmotionLabel, Readonly<MoodVector>>();
  for (const [k, v] of buildMoodTable(raw)) {
    if (isEmotionLabel(k)) out.set(k, v);
  }
  return out;
}

export const EMOTION_MOOD_TABLE = buildEmotionTable(lexiconData.emotionMoods);

export const MOOD_SEARCH_TERMS = buildSearchTerms(lexiconData.moodSearchTerms);

export const GENRE_SYNONYMS = buildGenreSynonyms(lexiconData.genreSynonyms);

const EMPTY: Readonly<MoodVector> = Object.freeze({});

/** TMDB 영어 장르명 기준. 모르는 장르는 빈 벡터 */
export function genreToMoods(genre: string): Readonly<MoodVector> {
  return GENRE_MOOD_TABLE.get(genre) ?? EMPTY;
}

export function emotionToMoods(emotion: string): Readonly<MoodVector> {
  return isEmotionLabel(emotion)
    ? (EMOTION_MOOD_TABLE.get(emotion) ?? EMPTY)
    : EMPTY;
}

export function moodToSearchTerms(mood: MoodLabel): readonly string[] {
  return MOOD_SEARCH_TERMS.get(mood) ?? [mood];
}

/** 키별 최댓값 병합 */
export function mergeMoodVectors(
  ...vectors: ReadonlyArray<Readonly<MoodVector>>
): MoodVector {
  const out: MoodVector = {};
  for (const v of vectors) {
    for (const [k, w] of Object.entries(v)) {
      if (!isMoodLabel(k) || !isNumber(w)) continue;
      out[k] = Math.max(out[k] ?? 0, w);
    }
  }
  return out;
}

/** 영화가 가진 장르들로부터 추론한 무드 프로필 */
export function inferMovieMoods(genres: readonly string[]): MoodVector {
  return mergeMoodVectors(...genres.map(genreToMoods));
}
