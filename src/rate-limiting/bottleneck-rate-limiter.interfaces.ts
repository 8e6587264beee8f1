export const LIMITER_CONFIGS = Symbol('LIMITER_CONFIGS');

export enum LimiterKey {
  TELEGRAM = 'telegram',
}

// Bottleneck runs lower numbers first (0–9).
export enum RequestPriority {
  DELIVERY = 5,
  PROBE = 9,
}

export interface IBottleneckConfig {
  readonly minTime: number;
  readonly maxConcurrent: number;
  readonly reservoir?: number;
  readonly reservoirRefreshIntervalMs?: number;
}

export type LimiterConfigs = ReadonlyMap<LimiterKey, IBottleneckConfig>;

export interface ILimiterSnapshot {
  readonly queueSize: number;
  readonly running: number;
  /** `null` when the limiter has no reservoir. */
  readonly reservoir: number | null;
}
