import NodeCache from 'node-cache';

import type { ICacheStats, ISimpleCache, SimpleCacheOptions } from './cache.interfaces';

/**
 * Thin node-cache wrapper with an optional hard key cap. When the cap is hit the oldest
 * inserted key is dropped; node-cache keeps insertion order, so that is the head of `keys()`.
 */
export class SimpleCacheImpl<T> implements ISimpleCache<T> {
  private readonly store: NodeCache;

  public constructor(private readonly options: SimpleCacheOptions) {
    this.store = new NodeCache({
      stdTTL: options.ttlSec,
      checkperiod: options.checkperiod ?? 0,
      useClones: false,
    });
  }

  public get(key: string): T | undefined {
    return this.store.get<T>(key);
  }

  public set(key: string, value: T): void {
    if (!this.store.has(key)) {
      this.makeRoomForOneKey();
    }

    this.store.set(key, value);
  }

  public del(key: string): void {
    this.store.del(key);
  }

  public has(key: string): boolean {
    return this.store.has(key);
  }

  public keys(): string[] {
    return this.store.keys();
  }

  public size(): number {
    return this.store.keys().length;
  }

  /** Deletes every entry matching `predicate`; returns how many were removed. */
  public prune(predicate: (value: T, key: string) => boolean): number {
    const doomedKeys: string[] = this.store.keys().filter((key: string): boolean => {
      const value: T | undefined = this.store.get<T>(key);
      return value !== undefined && predicate(value, key);
    });

    return doomedKeys.length === 0 ? 0 : this.store.del(doomedKeys);
  }

  public stats(): ICacheStats {
    const { keys, hits, misses } = this.store.getStats();
    return { keys, hits, misses };
  }

  private makeRoomForOneKey(): void {
    const maxKeys: number | undefined = this.options.maxKeys;

    if (maxKeys === undefined) {
      return;
    }

    const existingKeys: string[] = this.store.keys();
    const overflow: number = existingKeys.length - maxKeys + 1;

    if (overflow > 0) {
      this.store.del(existingKeys.slice(0, overflow));
    }
  }
}
