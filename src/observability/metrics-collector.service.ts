import { Injectable, Logger, type OnModuleDestroy, type OnModuleInit } from '@nestjs/common';

import { MetricsService } from './metrics.service';
import { type ICacheStats, getAllCacheStats } from '../common/utils/cache';
import { AppConfigService } from '../config/app-config.service';
import type { ILimiterSnapshot, LimiterKey } from '../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../rate-limiting/bottleneck-rate-limiter.service';

const COLLECT_INTERVAL_MS = 10_000;

/** Copies limiter and cache state into gauges, on a timer and on every scrape. */
@Injectable()
export class MetricsCollectorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: Logger = new Logger(MetricsCollectorService.name);
  private timer: NodeJS.Timeout | null = null;

  public constructor(
    private readonly metricsService: MetricsService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    private readonly appConfigService: AppConfigService,
  ) {}

  public onModuleInit(): void {
    if (!this.appConfigService.metricsEnabled) {
      this.logger.log('periodic metrics collection disabled');
      return;
    }

    this.timer = setInterval((): void => {
      this.collect().catch((error: unknown): void => {
        const reason: string = error instanceof Error ? error.message : String(error);
        this.logger.warn(`metrics collection failed reason=${reason}`);
      });
    }, COLLECT_INTERVAL_MS);
    this.timer.unref();
  }

  public onModuleDestroy(): void {
    if (this.timer === null) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;
  }

  public async collect(): Promise<void> {
    const snapshots: ReadonlyArray<readonly [LimiterKey, ILimiterSnapshot]> = await Promise.all(
      this.rateLimiterService
        .keys()
        .map(
          async (key: LimiterKey): Promise<readonly [LimiterKey, ILimiterSnapshot]> => [
            key,
            await this.rateLimiterService.snapshot(key),
          ],
        ),
    );

    for (const [limiter, snapshot] of snapshots) {
      this.metricsService.rateLimitQueueSize.set({ limiter }, snapshot.queueSize);

      if (snapshot.reservoir !== null) {
        this.metricsService.rateLimitReservoir.set({ limiter }, snapshot.reservoir);
      }
    }

    getAllCacheStats().forEach((stats: ICacheStats, cache: string): void => {
      this.metricsService.cacheEntries.set({ cache }, stats.keys);
    });
  }
}
