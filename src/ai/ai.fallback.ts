// src/ai/ai.fallback.ts
import { isRecord } from '../common/safe';
import type { EmotionVector, MoodVector } from '../recommend/recommend.types';
import type {
  AnalysisContext,
  ComplexityPreference,
  EmotionAnalysis,
  EnergyLevel,
  SocialPreference,
  TimePreference,
} from './ai.types';

export const DEFAULT_CONTEXT: Readonly<AnalysisContext> = Object.freeze({
  energyLevel: 'medium',
  socialPreference: 'either',
  timePreference: 'medium',
  complexityPreference: 'moderate',
});

function normalizeEnergy(v: unknown): EnergyLevel {
  if (v === 'low' || v === 'medium' || v === 'high') return v;
  return DEFAULT_CONTEXT.energyLevel;
}

function normalizeSocial(v: unknown): SocialPreference {
  if (v === 'alone' || v === 'with_others' || v === 'either') return v;
  return DEFAULT_CONTEXT.socialPreference;
}

function normalizeTime(v: unknown): TimePreference {
  if (v === 'short' || v === 'medium' || v === 'long') return v;
  return DEFAULT_CONTEXT.timePreference;
}

function normalizeComplexity(v: unknown): ComplexityPreference {
  if (v === 'simple' || v === 'moderate' || v === 'complex') return v;
  return DEFAULT_CONTEXT.complexityPreference;
}

/** 모델이 준 context_analysis (snake_case) → AnalysisContext */
export function normalizeContext(v: unknown): AnalysisContext {
  if (!isRecord(v)) return { ...DEFAULT_CONTEXT };
  return {
    energyLevel: normalizeEnergy(v.energy_level),
    socialPreference: normalizeSocial(v.social_preference),
    timePreference: normalizeTime(v.time_preference),
    complexityPreference: normalizeComplexity(v.complexity_preference),
  };
}

type KeywordRule = {
  words: readonly string[];
  moods: MoodVector;
  emotions: EmotionVector;
};

const KEYWORD_RULES: readonly KeywordRule[] = [
  {
    words: ['excited', 'action', 'adventure', 'thrilling'],
    moods: { action: 0.8, adventure: 0.7 },
    emotions: { excitement: 0.8 },
  },
  {
    words: ['romantic', 'love', 'romance'],
    moods: { romance: 0.9 },
    emotions: { joy: 0.6 },
  },
  {
    words: ['funny', 'comedy', 'laugh', 'humor'],
    moods: { comedy: 0.8 },
    emotions: { joy: 0.7 },
  },
  {
    // 우울하면 밝은 쪽으로
    words: ['sad', 'depressed', 'down', 'upset'],
    moods: { drama: 0.6, uplifting: 0.8 },
    emotions: { sadness: 0.7 },
  },
];

/**
 * 모델을 못 쓸 때 (키 없음/전송 실패/비정상 응답)
 * - 부분 문자열 매칭, 뒤 규칙이 같은 키를 덮어씀
 */
export function buildKeywordFallback(text: string): EmotionAnalysis {
  const lower = text.toLowerCase();
  const moods: MoodVector = {};
  const emotions: EmotionVector = {};

  for (const rule of KEYWORD_RULES) {
    if (!rule.words.some((w) => lower.includes(w))) continue;
    Object.assign(moods, rule.moods);
    Object.assign(emotions, rule.emotions);
  }

  return {
    moods,
    emotions,
    context: { ...DEFAULT_CONTEXT },
    reasoning: 'Fallback keyword-based analysis',
    confidence: 0.6,
    method: 'fallback',
  };
}

/** 모델 응답은 왔는데 JSON 을 못 읽었을 때 */
export function buildParseFailureAnalysis(): EmotionAnalysis {
  return {
    moods: { 'feel-good': 0.7, comedy: 0.6 },
    emotions: { joy: 0.5 },
    context: { ...DEFAULT_CONTEXT },
    reasoning: 'Default recommendation due to parsing error',
    confidence: 0.5,
    method: 'fallback',
  };
}
