import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { RateLimiter } from '../../../../src/shared/security/rate-limit';

const T0 = new Date('2026-01-15T10:00:00.000Z');

function at(seconds: number): Date {
  return new Date(T0.getTime() + seconds * 1000);
}

function makeLimiter() {
  return new RateLimiter(new InMemCache(), { prefix: 'rl', limit: 5, windowSeconds: 300 });
}

describe('RateLimiter (sliding window)', () => {
  it('admits 5 attempts and rejects the 6th with the time until the oldest one expires', async () => {
    const limiter = makeLimiter();

    for (let i = 0; i < 5; i++) {
      const decision = await limiter.checkAndRecord({ identity: 'k1', operation: 'login', now: at(i * 10) });
      expect(decision).toEqual({ allowed: true, remaining: 4 - i });
    }

    const blocked = await limiter.checkAndRecord({ identity: 'k1', operation: 'login', now: at(60) });
    expect(blocked).toEqual({ allowed: false, retryAfterSeconds: 240 });
  });

  it('frees a slot when the oldest attempt leaves the window', async () => {
    const limiter = makeLimiter();
    for (let i = 0; i < 5; i++) {
      await limiter.checkAndRecord({ identity: 'k1', operation: 'login', now: at(i * 10) });
    }

    // Oldest attempt (t=0) is still inside the window one second before it ends.
    const stillBlocked = await limiter.checkAndRecord({ identity: 'k1', operation: 'login', now: at(299) });
    expect(stillBlocked).toEqual({ allowed: false, retryAfterSeconds: 1 });

    const admitted = await limiter.checkAndRecord({ identity: 'k1', operation: 'login', now: at(300) });
    expect(admitted).toEqual({ allowed: true, remaining: 0 });

    // Next slot opens when the t=10 attempt expires.
    const next = await limiter.checkAndRecord({ identity: 'k1', operation: 'login', now: at(301) });
    expect(next).toEqual({ allowed: false, retryAfterSeconds: 9 });
  });

  it('rounds retry-after up to whole seconds', async () => {
    const limiter = makeLimiter();
    for (let i = 0; i < 5; i++) {
      await limiter.checkAndRecord({ identity: 'k1', operation: 'login', now: T0 });
    }

    const blocked = await limiter.checkAndRecord({ identity: 'k1', operation: 'login', now: at(100.5) });
    expect(blocked).toEqual({ allowed: false, retryAfterSeconds: 200 });
  });

  it('keeps operations independent for the same identity', async () => {
    const limiter = makeLimiter();
    for (let i = 0; i < 5; i++) {
      await limiter.checkAndRecord({ identity: 'k1', operation: 'login', now: T0 });
    }

    expect((await limiter.checkAndRecord({ identity: 'k1', operation: 'login', now: T0 })).allowed).toBe(false);
    expect(await limiter.checkAndRecord({ identity: 'k1', operation: 'reset-request', now: T0 })).toEqual({
      allowed: true,
      remaining: 4,
    });
  });

  it('keeps identities independent for the same operation', async () => {
    const limiter = makeLimiter();
    for (let i = 0; i < 5; i++) {
      await limiter.checkAndRecord({ identity: 'k1', operation: 'login', now: T0 });
    }

    expect(await limiter.checkAndRecord({ identity: 'k2', operation: 'login', now: T0 })).toEqual({
      allowed: true,
      remaining: 4,
    });
  });

  it('admits exactly 5 of 8 concurrent attempts on one key', async () => {
    const cache = new InMemCache();
    const limiter = new RateLimiter(cache, { prefix: 'rl', limit: 5, windowSeconds: 300 });

    const decisions = await Promise.all(
      Array.from({ length: 8 }, () => limiter.checkAndRecord({ identity: 'k1', operation: 'login', now: T0 })),
    );

    expect(decisions.filter((d) => d.allowed)).toHaveLength(5);
    expect(decisions.filter((d) => !d.allowed)).toEqual([
      { allowed: false, retryAfterSeconds: 300 },
      { allowed: false, retryAfterSeconds: 300 },
      { allowed: false, retryAfterSeconds: 300 },
    ]);

    // Only the admitted attempts were logged.
    expect(await cache.slidingWindowHit('rl:login:k1', { nowMs: T0.getTime(), windowMs: 300_000, limit: 100 })).toEqual({
      allowed: true,
      count: 6,
      oldestMs: T0.getTime(),
    });
  });

  it('reset() clears the window for one (identity, operation) pair', async () => {
    const limiter = makeLimiter();
    for (let i = 0; i < 5; i++) {
      await limiter.checkAndRecord({ identity: 'k1', operation: 'reset-verification', now: T0 });
    }

    await limiter.reset('k1', 'reset-verification');

    expect(
      await limiter.checkAndRecord({ identity: 'k1', operation: 'reset-verification', now: T0 }),
    ).toEqual({ allowed: true, remaining: 4 });
  });

  it('rejects a non-positive policy', () => {
    expect(() => new RateLimiter(new InMemCache(), { limit: 0 })).toThrow(
      'RateLimiter: limit and windowSeconds must be positive',
    );
  });
});
