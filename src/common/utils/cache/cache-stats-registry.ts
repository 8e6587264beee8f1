import type { ICacheStats, ICacheStatsSource } from './cache.interfaces';

// Process-wide; a later registration under the same name replaces the earlier one.
const cachesByName: Map<string, ICacheStatsSource> = new Map<string, ICacheStatsSource>();

export function registerCache(name: string, cache: ICacheStatsSource): void {
  cachesByName.set(name, cache);
}

export function getAllCacheStats(): ReadonlyMap<string, ICacheStats> {
  return new Map<string, ICacheStats>(
    [...cachesByName].map(
      ([name, cache]: [string, ICacheStatsSource]): [string, ICacheStats] => [name, cache.stats()],
    ),
  );
}
