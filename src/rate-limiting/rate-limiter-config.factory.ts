import {
  type IBottleneckConfig,
  LimiterKey,
  type LimiterConfigs,
} from './bottleneck-rate-limiter.interfaces';
import type { AppConfigService } from '../config/app-config.service';

const TELEGRAM_RESERVOIR_REFRESH_INTERVAL_MS = 1000;

export function buildLimiterConfigs(config: AppConfigService): LimiterConfigs {
  const map = new Map<LimiterKey, IBottleneckConfig>();

  // Sends per second are capped by the reservoir; in-flight requests by the socket pool size.
  map.set(LimiterKey.TELEGRAM, {
    minTime: 0,
    maxConcurrent: config.telegramMaxConnections,
    reservoir: config.rateLimitTelegramPerSecond,
    reservoirRefreshIntervalMs: TELEGRAM_RESERVOIR_REFRESH_INTERVAL_MS,
  });

  return map;
}
