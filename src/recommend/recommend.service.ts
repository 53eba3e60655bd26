// src/recommend/recommend.service.ts
import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { AiService } from '../ai/ai.service';
import type { EmotionAnalysis } from '../ai/ai.types';
import { readBool } from '../config/env';
import { CandidateAggregator } from './recommend.aggregator';
import { extractSearchCriteria } from './recommend.criteria';
import { selectDiverse } from './recommend.diversity';
import { scoreForMood, scoreForText, sortByScore } from './recommend.scorer';
import type {
  EmotionVector,
  MoodVector,
  RankedCandidate,
  RecommendOptions,
} from './recommend.types';

function hasWeights(v: Readonly<Partial<Record<string, number>>>): boolean {
  return Object.keys(v).length > 0;
}

function assertText(text: string): string {
  const t = text.trim();
  if (!t) throw new BadRequestException('Text cannot be empty');
  return t;
}

@Injectable()
export class RecommendService {
  private readonly logger = new Logger(RecommendService.name);

  private readonly diversifyMood: boolean;
  private readonly diversifyText: boolean;

  constructor(
    private readonly aggregator: CandidateAggregator,
    private readonly ai: AiService,
    config: ConfigService,
  ) {
    this.diversifyMood = readBool(config, 'RECOMMEND_DIVERSIFY_MOOD', false);
    this.diversifyText = readBool(config, 'RECOMMEND_DIVERSIFY_TEXT', false);
  }

  /** 점수순 정렬 후 (옵션) 다양성 선택, 상위 n개 */
  private finalize(
    scored: RankedCandidate[],
    n: number,
    diversify: boolean,
  ): RankedCandidate[] {
    const sorted = sortByScore(scored);
    const limit = Math.max(0, Math.trunc(n));
    return diversify ? selectDiverse(sorted, limit) : sorted.slice(0, limit);
  }

  async recommendByMood(
    moods: Readonly<MoodVector>,
    emotions: Readonly<EmotionVector>,
    n: number,
    options: RecommendOptions = {},
  ): Promise<RankedCandidate[]> {
    const candidates = await this.aggregator.collectForMood(moods);
    const scored = candidates.map((m) => scoreForMood(m, moods, emotions));

    this.logger.log(`mood ranking: ${candidates.length} candidates → top ${n}`);
    return this.finalize(scored, n, options.diversify ?? this.diversifyMood);
  }

  /**
   * 자유 텍스트 검색
   * - 분석 결과에 무드/감정 가중치가 하나라도 있으면 무드 경로로 넘김
   * - 없으면 조건 추출 → 텍스트 관련도 + 품질
   */
  async recommendByText(
    text: string,
    n: number,
    options: RecommendOptions = {},
  ): Promise<RankedCandidate[]> {
    const query = assertText(text);
    const analysis = await this.ai.analyze(query);

    if (hasWeights(analysis.moods) || hasWeights(analysis.emotions)) {
      return this.recommendByMood(analysis.moods, analysis.emotions, n, {
        diversify: options.diversify ?? this.diversifyText,
      });
    }

    const criteria = extractSearchCriteria(query);
    const candidates = await this.aggregator.collectForText(query, criteria);
    const scored = candidates.map((m) => scoreForText(m, query, criteria));

    this.logger.log(`text ranking: ${candidates.length} candidates → top ${n}`);
    return this.finalize(scored, n, options.diversify ?? this.diversifyText);
  }

  /** /recommend/mood: 분석 + 무드 추천, 분석 결과도 함께 반환 */
  async recommendByMoodText(
    text: string,
    n: number,
    options: RecommendOptions = {},
  ): Promise<{ analysis: EmotionAnalysis; results: RankedCandidate[] }> {
    const query = assertText(text);
    const analysis = await this.ai.analyze(query);
    const results = await this.recommendByMood(
      analysis.moods,
      analysis.emotions,
      n,
      options,
    );
    return { analysis, results };
  }
}
