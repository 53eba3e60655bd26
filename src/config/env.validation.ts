// src/config/env.validation.ts
import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

const toBool = ({ value }: { value: unknown }): unknown => {
  if (typeof value !== 'string') return value;
  const v = value.trim().toLowerCase();
  if (v === 'true' || v === '1') return true;
  if (v === 'false' || v === '0' || v === '') return false;
  return value;
};

const toNum = ({ value }: { value: unknown }): unknown => {
  if (typeof value !== 'string' || value.trim() === '') return value;
  const n = Number(value);
  return Number.isFinite(n) ? n : value;
};

/**
 * .env / process.env 검증
 * - API 키가 없어도 부팅은 됨 (폴백으로 동작, 시작 시 경고)
 */
export class EnvironmentVariables {
  @IsOptional()
  @Transform(toNum)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  CORS_ORIGINS?: string;

  @IsOptional()
  @IsString()
  TMDB_API_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  TMDB_BASE_URL?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  TMDB_IMAGE_BASE_URL?: string;

  @IsOptional()
  @IsString()
  TMDB_LANGUAGE?: string;

  @IsOptional()
  @Transform(toNum)
  @IsInt()
  @Min(0)
  TMDB_MIN_INTERVAL_MS?: number;

  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  OPENAI_API_BASE?: string;

  @IsOptional()
  @IsString()
  OPENAI_MODEL?: string;

  @IsOptional()
  @Transform(toNum)
  @IsNumber()
  @Min(0)
  OPENAI_MONTHLY_LIMIT?: number;

  @IsOptional()
  @Transform(toNum)
  @IsNumber()
  @Min(0)
  OPENAI_COST_PER_1K_TOKENS?: number;

  @IsOptional()
  @Transform(toNum)
  @IsNumber()
  @Min(0)
  CACHE_TTL_HOURS?: number;

  @IsOptional()
  @Transform(toBool)
  @IsBoolean()
  RATE_LIMIT_ENABLED?: boolean;

  @IsOptional()
  @Transform(toNum)
  @IsInt()
  @Min(1)
  RATE_LIMIT_PER_MINUTE?: number;

  @IsOptional()
  @Transform(toNum)
  @IsInt()
  @Min(1)
  RATE_LIMIT_PER_DAY?: number;

  @IsOptional()
  @Transform(toBool)
  @IsBoolean()
  EMERGENCY_STOP?: boolean;

  @IsOptional()
  @Transform(toBool)
  @IsBoolean()
  RECOMMEND_DIVERSIFY_MOOD?: boolean;

  @IsOptional()
  @Transform(toBool)
  @IsBoolean()
  RECOMMEND_DIVERSIFY_TEXT?: boolean;
}

export function validateEnv(
  config: Record<string, unknown>,
): EnvironmentVariables {
  // KEY= 처럼 비어 있는 값은 미설정으로 취급
  const present = Object.fromEntries(
    Object.entries(config).filter(([, v]) => v !== ''),
  );
  const env = plainToInstance(EnvironmentVariables, present);
  const errors = validateSync(env, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((e) => Object.values(e.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return env;
}
