// src/recommend/dto/recommend.dto.ts
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

import { Trim } from '../../common/dto/trim';

export class RecommendDto {
  @Trim()
  @IsString()
  @IsNotEmpty({ message: 'Text cannot be empty' })
  @MaxLength(1000)
  text!: string;

  /** 1~20 으로 잘림, 기본 8 */
  @IsOptional()
  @IsInt()
  numRecommendations?: number;

  @IsOptional()
  @IsBoolean()
  diversify?: boolean;
}
