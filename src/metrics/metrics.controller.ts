import { Controller, Get, Res } from '@nestjs/common';
import { Response } from 'express';

import { MetricsService } from './metrics.service';

@Controller('metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  /**
   * Prometheus scrape endpoint, served outside the global prefix.
   */
  @Get()
  public async getMetrics(@Res() res: Response): Promise<void> {
    res.set({
      'Content-Type': this.metricsService.contentType,
      'Cache-Control': 'no-store',
    });
    res.send(await this.metricsService.metrics());
  }
}
