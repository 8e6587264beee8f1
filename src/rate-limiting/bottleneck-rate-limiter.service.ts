import { Inject, Injectable, Logger, type OnApplicationShutdown } from '@nestjs/common';
import Bottleneck from 'bottleneck';

import {
  type IBottleneckConfig,
  type ILimiterSnapshot,
  LIMITER_CONFIGS,
  type LimiterConfigs,
  LimiterKey,
  RequestPriority,
} from './bottleneck-rate-limiter.interfaces';

const DEFAULT_RESERVOIR_REFRESH_INTERVAL_MS = 1000;

function toBottleneckOptions(config: IBottleneckConfig): Bottleneck.ConstructorOptions {
  const options: Bottleneck.ConstructorOptions = {
    minTime: config.minTime,
    maxConcurrent: config.maxConcurrent,
  };

  if (config.reservoir === undefined) {
    return options;
  }

  return {
    ...options,
    reservoir: config.reservoir,
    reservoirRefreshAmount: config.reservoir,
    reservoirRefreshInterval:
      config.reservoirRefreshIntervalMs ?? DEFAULT_RESERVOIR_REFRESH_INTERVAL_MS,
  };
}

/**
 * One Bottleneck per outbound dependency. Stopped on application shutdown, which Nest
 * runs after the delivery queue has drained in its module-destroy hook.
 */
@Injectable()
export class BottleneckRateLimiterService implements OnApplicationShutdown {
  private readonly logger: Logger = new Logger(BottleneckRateLimiterService.name);
  private readonly limiters: ReadonlyMap<LimiterKey, Bottleneck>;

  public constructor(@Inject(LIMITER_CONFIGS) configs: LimiterConfigs) {
    const limiters = new Map<LimiterKey, Bottleneck>();

    for (const [key, config] of configs) {
      limiters.set(key, this.createLimiter(key, config));
    }

    this.limiters = limiters;
  }

  public async schedule<T>(
    key: LimiterKey,
    operation: () => Promise<T>,
    priority: RequestPriority = RequestPriority.DELIVERY,
  ): Promise<T> {
    return this.requireLimiter(key).schedule({ priority }, operation);
  }

  public keys(): readonly LimiterKey[] {
    return [...this.limiters.keys()];
  }

  public async snapshot(key: LimiterKey): Promise<ILimiterSnapshot> {
    const limiter: Bottleneck = this.requireLimiter(key);
    const counts: Bottleneck.Counts = limiter.counts();

    return {
      queueSize: counts.RECEIVED + counts.QUEUED,
      running: counts.RUNNING + counts.EXECUTING,
      reservoir: await limiter.currentReservoir(),
    };
  }

  public async onApplicationShutdown(): Promise<void> {
    await Promise.all(
      [...this.limiters].map(
        ([key, limiter]: [LimiterKey, Bottleneck]): Promise<void> => this.stopLimiter(key, limiter),
      ),
    );
  }

  private createLimiter(key: LimiterKey, config: IBottleneckConfig): Bottleneck {
    const limiter = new Bottleneck(toBottleneckOptions(config));

    limiter.on('error', (error: unknown): void => {
      const message: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`limiter error key=${key} reason=${message}`);
    });
    limiter.on('dropped', (): void => {
      this.logger.warn(`limiter dropped queued call key=${key}`);
    });

    return limiter;
  }

  private requireLimiter(key: LimiterKey): Bottleneck {
    const limiter: Bottleneck | undefined = this.limiters.get(key);

    if (limiter === undefined) {
      throw new Error(`No rate limiter configured for key=${key}`);
    }

    return limiter;
  }

  private async stopLimiter(key: LimiterKey, limiter: Bottleneck): Promise<void> {
    try {
      await limiter.stop({ dropWaitingJobs: true });
      this.logger.log(`limiter stopped key=${key}`);
    } catch (error: unknown) {
      const message: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`limiter stop failed key=${key} reason=${message}`);
    }
  }
}
