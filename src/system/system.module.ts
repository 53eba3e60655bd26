// src/system/system.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AiModule } from '../ai/ai.module';
import { TmdbModule } from '../tmdb/tmdb.module';
import { SystemController } from './system.controller';
import { SystemService } from './system.service';

@Module({
  imports: [ConfigModule, TmdbModule, AiModule],
  controllers: [SystemController],
  providers: [SystemService],
})
export class SystemModule {}
