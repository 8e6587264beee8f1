export interface ICacheStats {
  readonly keys: number;
  readonly hits: number;
  readonly misses: number;
}

export interface ICacheStatsSource {
  stats(): ICacheStats;
}

export interface ISimpleCache<T> extends ICacheStatsSource {
  get(key: string): T | undefined;
  set(key: string, value: T): void;
  del(key: string): void;
  has(key: string): boolean;
  keys(): string[];
  size(): number;
  prune(predicate: (value: T, key: string) => boolean): number;
}

export type SimpleCacheOptions = {
  /** 0 disables time-based expiry; the owner expires entries itself. */
  readonly ttlSec: number;
  readonly maxKeys?: number;
  readonly checkperiod?: number;
};
