export {
  type ICacheStats,
  type ICacheStatsSource,
  type ISimpleCache,
  type SimpleCacheOptions,
} from './cache.interfaces';
export { SimpleCacheImpl } from './simple-cache';
export { getAllCacheStats, registerCache } from './cache-stats-registry';
