import { Controller, Get, Header, Res } from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';

import { MetricsCollectorService } from './metrics-collector.service';
import { MetricsService } from './metrics.service';

@ApiTags('Observability')
@Controller('metrics')
export class MetricsController {
  public constructor(
    private readonly metricsService: MetricsService,
    private readonly metricsCollectorService: MetricsCollectorService,
  ) {}

  @Get()
  @Header('Cache-Control', 'no-store')
  @ApiOperation({ summary: 'Prometheus scrape endpoint' })
  @ApiProduces('text/plain')
  @ApiResponse({ status: 200, description: 'Metrics in Prometheus text exposition format' })
  public async scrape(@Res() response: Response): Promise<void> {
    // Refresh gauges before rendering.
    await this.metricsCollectorService.collect();

    const exposition: string = await this.metricsService.getMetrics();
    response.status(200).type(this.metricsService.getContentType()).send(exposition);
  }
}
