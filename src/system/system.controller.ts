// src/system/system.controller.ts
import { Controller, Get, HttpStatus, Res } from '@nestjs/common';
import type { Response } from 'express';

import {
  APP_VERSION,
  SystemService,
  type HealthReport,
  type StatusReport,
} from './system.service';

@Controller()
export class SystemController {
  constructor(private readonly system: SystemService) {}

  @Get()
  index() {
    return {
      message: 'MoodFlix API Server',
      version: APP_VERSION,
      status: 'running',
      endpoints: {
        health: '/api/health',
        moodRecommendation: '/api/recommend/mood',
        textSearch: '/api/recommend/search',
        analyze: '/api/ai/analyze',
        movieDetails: '/api/movies/:id',
        popularMovies: '/api/movies/popular',
        topRatedMovies: '/api/movies/top-rated',
        systemStatus: '/api/status',
      },
    };
  }

  // 하나라도 비정상이면 503
  @Get('health')
  async health(
    @Res({ passthrough: true }) res: Response,
  ): Promise<HealthReport> {
    const report = await this.system.health();
    if (report.status !== 'healthy') {
      res.status(HttpStatus.SERVICE_UNAVAILABLE);
    }
    return report;
  }

  @Get('status')
  status(): StatusReport {
    return this.system.status();
  }
}
