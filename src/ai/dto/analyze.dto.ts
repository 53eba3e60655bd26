// src/ai/dto/analyze.dto.ts
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

import { Trim } from '../../common/dto/trim';

export class AnalyzeDto {
  @Trim()
  @IsString()
  @IsNotEmpty({ message: 'Text cannot be empty' })
  @MaxLength(1000)
  text!: string;
}
