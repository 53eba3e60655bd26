// src/recommend/recommend.criteria.ts
import { GENRE_SYNONYMS } from './recommend.lexicon';
import type { RuntimeWindow, SearchCriteria } from './recommend.types';

const YEAR_MIN = 1900;
const YEAR_MAX = 2030;
const RUNTIME_SLACK = 15;

/**
 * 텍스트에서 처음 나오는 그럴듯한 연도(1900~2030)
 * - "1990s", "2010年" 도 앞 4자리로 잡힘
 */
export function extractYear(text: string): number | null {
  for (const m of text.matchAll(/\d{4}/g)) {
    const y = Number(m[0]);
    if (y >= YEAR_MIN && y <= YEAR_MAX) return y;
  }
  return null;
}

/** "120 minutes", "90min", "100分" → ±15분 */
export function extractRuntime(text: string): RuntimeWindow | null {
  const m = text.match(/(\d+)\s*(?:minutes?|mins?|分)/i);
  if (!m?.[1]) return null;

  const runtime = Number(m[1]);
  if (!Number.isFinite(runtime)) return null;

  return {
    min: Math.max(runtime - RUNTIME_SLACK, 0),
    max: runtime + RUNTIME_SLACK,
  };
}

/**
 * 휴리스틱 조건 추출 (필드마다 첫 매치 우선, 되돌아가지 않음)
 */
export function extractSearchCriteria(text: string): SearchCriteria {
  const lower = (text ?? '').toLowerCase();

  const keywords: string[] = [];
  const genreIds: number[] = [];

  for (const entry of GENRE_SYNONYMS) {
    if (!entry.synonyms.some((s) => lower.includes(s))) continue;
    keywords.push(entry.label);
    genreIds.push(entry.genreId);
  }

  const seen = new Set(keywords);
  for (const m of lower.matchAll(/\p{L}+/gu)) {
    const token = m[0];
    if (token.length <= 3 || seen.has(token)) continue;
    seen.add(token);
    keywords.push(token);
  }

  return {
    keywords,
    genreIds,
    year: extractYear(text ?? ''),
    runtime: extractRuntime(lower),
  };
}
