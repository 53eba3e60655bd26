// src/ai/ai.types.ts
import type { EmotionVector, MoodVector } from '../recommend/recommend.types';

export type EnergyLevel = 'low' | 'medium' | 'high';
export type SocialPreference = 'alone' | 'with_others' | 'either';
export type TimePreference = 'short' | 'medium' | 'long';
export type ComplexityPreference = 'simple' | 'moderate' | 'complex';

export interface AnalysisContext {
  energyLevel: EnergyLevel;
  socialPreference: SocialPreference;
  timePreference: TimePreference;
  complexityPreference: ComplexityPreference;
}

/** 'llm' = 모델 응답 파싱 성공, 'fallback' = 키워드/기본값 */
export type AnalysisMethod = 'llm' | 'fallback';

export interface EmotionAnalysis {
  moods: MoodVector;
  emotions: EmotionVector;
  context: AnalysisContext;
  reasoning: string;
  confidence: number; // 0~1
  method: AnalysisMethod;
}
