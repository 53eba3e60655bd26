// src/ai/ai.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';

import { MemoryCache } from '../common/memoryCache';
import {
  errMessage,
  extractFirstJsonObject,
  isArray,
  isNumber,
  isRecord,
  isString,
  pickWeights,
} from '../common/safe';
import {
  HOUR_MS,
  readNumber,
  readOptionalString,
  readString,
} from '../config/env';
import { UsageTracker } from '../limits/usage.tracker';
import {
  EMOTION_LABELS,
  MOOD_LABELS,
  isEmotionLabel,
  isMoodLabel,
  type MoodVector,
} from '../recommend/recommend.types';
import {
  buildKeywordFallback,
  buildParseFailureAnalysis,
  normalizeContext,
} from './ai.fallback';
import type { EmotionAnalysis } from './ai.types';

const SYSTEM_PROMPT =
  'You are an expert emotion analyst and movie recommendation specialist.';

const REQUEST_TIMEOUT_MS = 20_000;
const MOOD_PRESENT = 0.3;

type LlmReply = {
  content: string;
  tokens: number;
};

function buildPrompt(text: string): string {
  const weights = (labels: readonly string[]) =>
    labels.map((l) => `    "${l}": 0.0-1.0`).join(',\n');

  return [
    `Analyze the emotional state and movie preferences from this user input: "${text}"`,
    ``,
    `Respond with a JSON object in exactly this shape:`,
    `{`,
    `  "primary_emotions": {`,
    weights(EMOTION_LABELS),
    `  },`,
    `  "movie_moods": {`,
    weights(MOOD_LABELS),
    `  },`,
    `  "context_analysis": {`,
    `    "energy_level": "low|medium|high",`,
    `    "social_preference": "alone|with_others|either",`,
    `    "time_preference": "short|medium|long",`,
    `    "complexity_preference": "simple|moderate|complex"`,
    `  },`,
    `  "reasoning": "Brief explanation of why these moods were selected"`,
    `}`,
    ``,
    `Consider the user's current emotional state, the movie experience they`,
    `are after and the intensity they want.`,
    `Return only valid JSON without any additional text.`,
  ].join('\n');
}

/** 성공 응답 기본 0.85, 긴 입력/복수 무드면 가산, 최대 0.95 */
export function computeConfidence(text: string, moods: MoodVector): number {
  let confidence = 0.85;

  const words = text.split(/\s+/).filter(Boolean).length;
  if (words > 5) confidence += 0.1;

  const strong = Object.values(moods).filter(
    (w) => w !== undefined && w > MOOD_PRESENT,
  ).length;
  if (strong >= 2) confidence += 0.05;

  return Math.min(confidence, 0.95);
}

/** 모델 응답 텍스트 → EmotionAnalysis (JSON 을 못 찾으면 기본 구조) */
export function parseAnalysis(content: string, text: string): EmotionAnalysis {
  const obj = extractFirstJsonObject(content);
  if (!isRecord(obj)) return buildParseFailureAnalysis();

  const moods = pickWeights(obj.movie_moods, isMoodLabel);
  const emotions = pickWeights(obj.primary_emotions, isEmotionLabel);
  const reasoning =
    isString(obj.reasoning) && obj.reasoning.trim()
      ? obj.reasoning.trim()
      : 'Analysis completed';

  return {
    moods,
    emotions,
    context: normalizeContext(obj.context_analysis),
    reasoning,
    confidence: computeConfidence(text, moods),
    method: 'llm',
  };
}

function copyAnalysis(a: EmotionAnalysis): EmotionAnalysis {
  return {
    ...a,
    moods: { ...a.moods },
    emotions: { ...a.emotions },
    context: { ...a.context },
  };
}

const normalizeKey = (text: string) =>
  text.trim().toLowerCase().replace(/\s+/g, ' ');

/**
 * 자유 텍스트 → 무드/감정 가중치
 * - 절대 throw 하지 않음 (키 없음/실패 시 키워드 분석)
 */
@Injectable()
export class AiService {
  private readonly logger = new Logger(AiService.name);

  private readonly apiBase: string;
  private readonly model: string;
  private readonly cache: MemoryCache<EmotionAnalysis>;

  constructor(
    private readonly http: HttpService,
    private readonly config: ConfigService,
    private readonly usage: UsageTracker,
  ) {
    this.apiBase = readString(
      config,
      'OPENAI_API_BASE',
      'https://api.openai.com/v1',
    ).replace(/\/+$/, '');
    this.model = readString(config, 'OPENAI_MODEL', 'gpt-4.1-mini');
    this.cache = new MemoryCache<EmotionAnalysis>({
      defaultTtlMs: readNumber(config, 'CACHE_TTL_HOURS', 24) * HOUR_MS,
      maxEntries: 1_000,
    });

    if (!this.hasApiKey()) {
      this.logger.warn(
        'OPENAI_API_KEY not set. Mood analysis will use keyword fallback.',
      );
    }
  }

  hasApiKey(): boolean {
    return readOptionalString(this.config, 'OPENAI_API_KEY') !== null;
  }

  async analyze(text: string): Promise<EmotionAnalysis> {
    const input = text.trim();
    const key = normalizeKey(input);

    const hit = this.cache.get(key);
    if (hit) return copyAnalysis(hit);

    const apiKey = readOptionalString(this.config, 'OPENAI_API_KEY');
    if (!apiKey) return buildKeywordFallback(input);

    let reply: LlmReply;
    try {
      reply = await this.complete(apiKey, buildPrompt(input));
    } catch (e: unknown) {
      this.logger.warn(`LLM analysis failed: ${errMessage(e)}`);
      return buildKeywordFallback(input);
    }

    this.usage.record(reply.tokens);

    const analysis = parseAnalysis(reply.content, input);
    if (analysis.method === 'llm') {
      this.cache.set(key, copyAnalysis(analysis));
    } else {
      this.logger.warn('LLM reply was not valid JSON, using default analysis');
    }
    return analysis;
  }

  private async complete(apiKey: string, prompt: string): Promise<LlmReply> {
    const res = await firstValueFrom(
      this.http.post<unknown>(
        `${this.apiBase}/chat/completions`,
        {
          model: this.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
          temperature: 0.3,
          max_tokens: 500,
        },
        {
          headers: {
            Authorization: `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
          },
          timeout: REQUEST_TIMEOUT_MS,
          validateStatus: () => true,
        },
      ),
    );

    if (res.status < 200 || res.status >= 300) {
      throw new Error(`chat completions failed with status ${res.status}`);
    }

    const data = res.data;
    if (!isRecord(data) || !isArray(data.choices)) {
      throw new Error('chat completions reply has no choices');
    }

    const c0 = data.choices[0];
    if (
      !isRecord(c0) ||
      !isRecord(c0.message) ||
      !isString(c0.message.content)
    ) {
      throw new Error('chat completions reply has no content');
    }

    const content = c0.message.content;
    const reported = isRecord(data.usage) ? data.usage.total_tokens : null;
    const tokens = isNumber(reported)
      ? reported
      : Math.ceil((prompt.length + content.length) / 4);

    return { content, tokens };
  }
}
