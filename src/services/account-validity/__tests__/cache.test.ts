// ═══════════════════════════════════════════════════════════════════════════════
// EXPIRATION CACHE TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';
import { ExpirationCache } from '../cache.js';
import { createDeferred } from './helpers.js';

describe('ExpirationCache', () => {
  it('should call the loader once per account', async () => {
    const cache = new ExpirationCache();
    const loader = vi.fn(async () => 1000);

    expect(await cache.load('alice', loader)).toBe(1000);
    expect(await cache.load('alice', loader)).toBe(1000);

    expect(loader).toHaveBeenCalledTimes(1);
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it('should cache misses', async () => {
    const cache = new ExpirationCache();
    const loader = vi.fn(async () => null);

    expect(await cache.load('ghost', loader)).toBeNull();
    expect(await cache.load('ghost', loader)).toBeNull();

    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('should reload after invalidate', async () => {
    const cache = new ExpirationCache();
    await cache.load('alice', async () => 1000);

    cache.invalidate('alice');

    expect(cache.has('alice')).toBe(false);
    expect(await cache.load('alice', async () => 2000)).toBe(2000);
  });

  it('should not store a load invalidated while in flight', async () => {
    const cache = new ExpirationCache();
    const deferred = createDeferred<number | null>();

    const pending = cache.load('alice', () => deferred.promise);
    cache.invalidate('alice');
    deferred.resolve(1000);

    expect(await pending).toBe(1000);
    expect(cache.has('alice')).toBe(false);
  });

  it('should not store in-flight loads after clear', async () => {
    const cache = new ExpirationCache();
    const deferred = createDeferred<number | null>();

    const pending = cache.load('alice', () => deferred.promise);
    cache.clear();
    deferred.resolve(1000);
    await pending;

    expect(cache.has('alice')).toBe(false);
  });

  it('should evict the least recently used entry', async () => {
    const cache = new ExpirationCache({ maxEntries: 2 });

    await cache.load('a', async () => 1);
    await cache.load('b', async () => 2);
    await cache.load('a', async () => 1);
    await cache.load('c', async () => 3);

    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
    expect(cache.getStats().size).toBe(2);
  });
});
