// src/common/dto/trim.ts
import { Transform } from 'class-transformer';

/** 문자열이면 앞뒤 공백 제거 (검증 전에 적용) */
export const Trim = () =>
  Transform(({ value }: { value: unknown }) =>
    typeof value === 'string' ? value.trim() : value,
  );
