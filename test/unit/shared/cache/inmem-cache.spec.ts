import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';

describe('InMemCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-15T10:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('expires string values after their TTL', async () => {
    const cache = new InMemCache();
    await cache.set('k', 'v', { ttlSeconds: 10 });

    vi.advanceTimersByTime(9_999);
    expect(await cache.get('k')).toBe('v');

    vi.advanceTimersByTime(1);
    expect(await cache.get('k')).toBeNull();
  });

  it('keeps values without a TTL', async () => {
    const cache = new InMemCache();
    await cache.set('k', 'v');

    vi.advanceTimersByTime(24 * 60 * 60 * 1000);
    expect(await cache.get('k')).toBe('v');
  });

  it('supports set membership with a refreshed TTL', async () => {
    const cache = new InMemCache();
    await cache.sadd('s', 'a', { ttlSeconds: 10 });
    vi.advanceTimersByTime(8_000);
    await cache.sadd('s', 'b', { ttlSeconds: 10 });
    vi.advanceTimersByTime(8_000);

    expect((await cache.smembers('s')).sort()).toEqual(['a', 'b']);

    await cache.srem('s', 'a');
    expect(await cache.smembers('s')).toEqual(['b']);

    vi.advanceTimersByTime(2_000);
    expect(await cache.smembers('s')).toEqual([]);
  });

  it('del() removes strings, sets and attempt logs under the key', async () => {
    const cache = new InMemCache();
    await cache.set('k', 'v');
    await cache.sadd('k', 'm');
    await cache.slidingWindowHit('k', { nowMs: 1_000, windowMs: 60_000, limit: 1 });

    await cache.del('k');

    expect(await cache.get('k')).toBeNull();
    expect(await cache.smembers('k')).toEqual([]);
    expect(await cache.slidingWindowHit('k', { nowMs: 2_000, windowMs: 60_000, limit: 1 })).toEqual({
      allowed: true,
      count: 1,
      oldestMs: 2_000,
    });
  });

  it('slidingWindowHit() prunes old entries and does not record a rejected hit', async () => {
    const cache = new InMemCache();
    const input = { windowMs: 1_000, limit: 2 };

    expect(await cache.slidingWindowHit('w', { ...input, nowMs: 100 })).toEqual({
      allowed: true,
      count: 1,
      oldestMs: 100,
    });
    expect(await cache.slidingWindowHit('w', { ...input, nowMs: 200 })).toEqual({
      allowed: true,
      count: 2,
      oldestMs: 100,
    });
    expect(await cache.slidingWindowHit('w', { ...input, nowMs: 300 })).toEqual({
      allowed: false,
      count: 2,
      oldestMs: 100,
    });

    // 100 falls out at 1100 (entries at or before now - window are dropped).
    expect(await cache.slidingWindowHit('w', { ...input, nowMs: 1_100 })).toEqual({
      allowed: true,
      count: 2,
      oldestMs: 200,
    });
  });

  it('drops attempt logs one window after their newest entry', async () => {
    const cache = new InMemCache();
    const input = { windowMs: 1_000, limit: 5 };

    await cache.slidingWindowHit('a', { ...input, nowMs: 0 });
    await cache.slidingWindowHit('b', { ...input, nowMs: 500 });

    expect(cache.pruneExpiredLogs(999)).toBe(0);
    expect(cache.pruneExpiredLogs(1_000)).toBe(1);

    // The next hit on any key sweeps 'b' (newest entry at 500).
    await cache.slidingWindowHit('c', { ...input, nowMs: 2_000 });
    expect(cache.pruneExpiredLogs(2_000)).toBe(0);
  });
});
