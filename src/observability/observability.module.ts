import { Module } from '@nestjs/common';

import { MetricsCollectorService } from './metrics-collector.service';
import { MetricsController } from './metrics.controller';
import { MetricsService } from './metrics.service';
import { RateLimitingModule } from '../rate-limiting/rate-limiting.module';

/** Prometheus registry, gauge collector and the `/metrics` scrape endpoint. */
@Module({
  imports: [RateLimitingModule],
  providers: [MetricsService, MetricsCollectorService],
  controllers: [MetricsController],
  exports: [MetricsService],
})
export class ObservabilityModule {}
