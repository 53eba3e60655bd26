// src/common/safe.ts
export type JsonRecord = Record<string, unknown>;

export function isRecord(v: unknown): v is JsonRecord {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function isString(v: unknown): v is string {
  return typeof v === 'string';
}

export function isNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

export function isBoolean(v: unknown): v is boolean {
  return typeof v === 'boolean';
}

export function isArray(v: unknown): v is unknown[] {
  return Array.isArray(v);
}

export function toStringOr(v: unknown, fallback: string): string {
  return isString(v) ? v : fallback;
}

export function toNumberOr(v: unknown, fallback: number): number {
  return isNumber(v) ? v : fallback;
}

export function toStringOrNull(v: unknown): string | null {
  return isString(v) && v.length > 0 ? v : null;
}

export function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return null;
  }
}

/**
 * 모델 응답에서 ```json ...``` 또는 첫 번째 { ... } 객체를 찾아 파싱
 */
export function extractFirstJsonObject(text: string): unknown {
  const fenced = text.match(/```json\s*([\s\S]*?)```/i);
  if (fenced?.[1]) {
    const parsed = safeJsonParse(fenced[1].trim());
    if (parsed !== null) return parsed;
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start >= 0 && end > start) {
    const chunk = text.slice(start, end + 1);
    const parsed = safeJsonParse(chunk);
    if (parsed !== null) return parsed;
  }

  return null;
}

export function errMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (isString(err)) return err;
  return 'Unknown error';
}

export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

/** "YYYY-MM-DD" → YYYY */
export function toYear(date: string | null | undefined): number | null {
  if (!date || date.length < 4) return null;
  const y = Number(date.slice(0, 4));
  return Number.isInteger(y) ? y : null;
}

/**
 * 외부에서 들어온 { label: weight } 객체를 어휘 안의 키만 남기고 0~1로 정규화
 */
export function pickWeights<K extends string>(
  v: unknown,
  isKey: (k: string) => k is K,
): Partial<Record<K, number>> {
  const out: Partial<Record<K, number>> = {};
  if (!isRecord(v)) return out;

  for (const [k, w] of Object.entries(v)) {
    if (!isKey(k) || !isNumber(w)) continue;
    out[k] = clamp(w, 0, 1);
  }
  return out;
}
