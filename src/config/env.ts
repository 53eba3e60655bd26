// src/config/env.ts
import type { ConfigService } from '@nestjs/config';

/**
 * ConfigService 값 읽기
 * - validateEnv 를 거치면 number/boolean, 테스트에서 직접 넣으면 string 일 수도 있음
 */
export function readString(
  config: ConfigService,
  key: string,
  fallback: string,
): string {
  const v = config.get<unknown>(key);
  if (typeof v !== 'string') return fallback;
  const s = v.trim();
  return s.length > 0 ? s : fallback;
}

export function readOptionalString(
  config: ConfigService,
  key: string,
): string | null {
  const s = readString(config, key, '');
  return s.length > 0 ? s : null;
}

export function readNumber(
  config: ConfigService,
  key: string,
  fallback: number,
): number {
  const v = config.get<unknown>(key);
  const n = typeof v === 'string' && v.trim() !== '' ? Number(v) : v;
  return typeof n === 'number' && Number.isFinite(n) ? n : fallback;
}

export function readBool(
  config: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const v = config.get<unknown>(key);
  if (typeof v === 'boolean') return v;
  if (typeof v !== 'string') return fallback;

  const s = v.trim().toLowerCase();
  if (s === 'true' || s === '1') return true;
  if (s === 'false' || s === '0') return false;
  return fallback;
}

export const HOUR_MS = 60 * 60 * 1000;
