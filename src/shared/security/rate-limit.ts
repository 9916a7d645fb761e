/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Caps brute-force attempts on every auth operation:
 *   N attempts per identity per operation inside a sliding window (default 5 / 5 min).
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: 'rl', limit: 5, windowSeconds: 300 })
 * - const decision = await limiter.checkAndRecord({ identity: emailKey, operation: 'login', now })
 * - if (!decision.allowed) -> RATE_LIMITED(decision.retryAfterSeconds)
 * - await limiter.reset(emailKey, 'reset-verification')
 *
 * SLIDING WINDOW:
 * - Each (operation, identity) pair keeps a log of attempt timestamps.
 * - Timestamps older than the window are pruned on every attempt.
 * - Successful and failed attempts share one log; a blocked attempt is not recorded.
 * - Retry-after = oldest retained + window - now, rounded up to whole seconds (min 1).
 *
 * ATOMICITY:
 * - Prune + count + append is one cache operation (Lua in Redis), so two
 *   concurrent attempts cannot both take the last slot.
 *
 * RULES:
 * - `identity` is already an opaque key (emailKey). Raw emails never reach cache keys.
 * - Operations are independent: exhausting `login` leaves `reset-request` untouched.
 */

import type { Cache } from '../cache/cache';

export const RATE_LIMITED_OPERATIONS = [
  'login',
  'registration',
  'reset-request',
  'reset-verification',
] as const;

export type RateLimitedOperation = (typeof RATE_LIMITED_OPERATIONS)[number];

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterSeconds: number };

export type RateLimitPolicy = {
  limit: number;
  windowSeconds: number;
};

export const DEFAULT_RATE_LIMIT_POLICY: RateLimitPolicy = {
  limit: 5,
  windowSeconds: 300,
};

export class RateLimiter {
  private readonly prefix: string;
  private readonly policy: RateLimitPolicy;

  constructor(
    private readonly cache: Cache,
    opts?: { prefix?: string; limit?: number; windowSeconds?: number },
  ) {
    this.prefix = opts?.prefix ?? 'rl';
    this.policy = {
      limit: opts?.limit ?? DEFAULT_RATE_LIMIT_POLICY.limit,
      windowSeconds: opts?.windowSeconds ?? DEFAULT_RATE_LIMIT_POLICY.windowSeconds,
    };

    if (this.policy.limit < 1 || this.policy.windowSeconds < 1) {
      throw new Error('RateLimiter: limit and windowSeconds must be positive');
    }
  }

  private key(operation: RateLimitedOperation, identity: string): string {
    return `${this.prefix}:${operation}:${identity}`;
  }

  async checkAndRecord(input: {
    identity: string;
    operation: RateLimitedOperation;
    now: Date;
  }): Promise<RateLimitDecision> {
    const nowMs = input.now.getTime();
    const windowMs = this.policy.windowSeconds * 1000;

    const hit = await this.cache.slidingWindowHit(this.key(input.operation, input.identity), {
      nowMs,
      windowMs,
      limit: this.policy.limit,
    });

    if (hit.allowed) {
      return { allowed: true, remaining: Math.max(0, this.policy.limit - hit.count) };
    }

    const oldestMs = hit.oldestMs ?? nowMs;
    const retryAfterMs = oldestMs + windowMs - nowMs;

    return {
      allowed: false,
      retryAfterSeconds: Math.max(1, Math.ceil(retryAfterMs / 1000)),
    };
  }

  async reset(identity: string, operation: RateLimitedOperation): Promise<void> {
    await this.cache.del(this.key(operation, identity));
  }
}
