import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SimpleCacheImpl } from './simple-cache';

describe('SimpleCacheImpl', (): void => {
  beforeEach((): void => {
    vi.useFakeTimers();
  });

  afterEach((): void => {
    vi.useRealTimers();
  });

  it('stores, reports and deletes entries', (): void => {
    const cache = new SimpleCacheImpl<number>({ ttlSec: 0 });

    cache.set('BTCUSDT:Buy:t1', 100);

    expect(cache.get('BTCUSDT:Buy:t1')).toBe(100);
    expect(cache.has('BTCUSDT:Buy:t1')).toBe(true);
    expect(cache.keys()).toEqual(['BTCUSDT:Buy:t1']);
    expect(cache.size()).toBe(1);

    cache.del('BTCUSDT:Buy:t1');

    expect(cache.get('BTCUSDT:Buy:t1')).toBeUndefined();
    expect(cache.size()).toBe(0);
  });

  it('keeps entries indefinitely when ttl is zero', (): void => {
    const cache = new SimpleCacheImpl<number>({ ttlSec: 0 });

    cache.set('key', 1);
    vi.advanceTimersByTime(24 * 60 * 60 * 1000);

    expect(cache.get('key')).toBe(1);
  });

  it('expires entries after a positive ttl', (): void => {
    const cache = new SimpleCacheImpl<string>({ ttlSec: 10 });

    cache.set('key', 'value');

    vi.advanceTimersByTime(9_999);
    expect(cache.get('key')).toBe('value');

    vi.advanceTimersByTime(2);
    expect(cache.get('key')).toBeUndefined();
  });

  it('evicts the oldest entry when maxKeys is reached', (): void => {
    const cache = new SimpleCacheImpl<number>({ ttlSec: 0, maxKeys: 2 });

    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('c', 3);

    expect(cache.keys()).toEqual(['b', 'c']);
  });

  it('overwrites an existing key without evicting others', (): void => {
    const cache = new SimpleCacheImpl<number>({ ttlSec: 0, maxKeys: 2 });

    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 10);

    expect(cache.get('a')).toBe(10);
    expect(cache.get('b')).toBe(2);
  });

  it('prunes entries matching a predicate', (): void => {
    const cache = new SimpleCacheImpl<number>({ ttlSec: 0 });

    cache.set('old', 100);
    cache.set('fresh', 900);
    cache.set('older', 50);

    const removed: number = cache.prune((seenAtMs: number): boolean => seenAtMs < 500);

    expect(removed).toBe(2);
    expect(cache.keys()).toEqual(['fresh']);
    expect(cache.prune((): boolean => false)).toBe(0);
  });
});
