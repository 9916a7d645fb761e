/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Rate limiting and sessions are short-lived shared state that must be fast
 *   and externalized (Redis in production).
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key) / cache.set(key, value, { ttlSeconds }) / cache.del(key)
 * - cache.sadd / smembers / srem -> SET semantics for the user-session index
 * - cache.slidingWindowHit(key, ...) -> atomic prune + count + append on an attempt log
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export type SlidingWindowHitInput = {
  /** Attempt timestamp (ms since epoch). */
  nowMs: number;
  windowMs: number;
  limit: number;
};

export type SlidingWindowHitResult = {
  /** True when the attempt was recorded. */
  allowed: boolean;
  /** Attempts retained in the window after this call. */
  count: number;
  /** Oldest retained timestamp, or null when the log is empty. */
  oldestMs: number | null;
};

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Add a member to a set. Idempotent — adding an existing member is a no-op.
   * Optionally refresh the TTL on the set key.
   */
  sadd(key: string, member: string, opts?: { ttlSeconds?: number }): Promise<void>;

  /**
   * Return all members of a set, or an empty array if the key does not exist.
   */
  smembers(key: string): Promise<string[]>;

  /**
   * Remove a member from a set. No-op if the member is not present.
   */
  srem(key: string, member: string): Promise<void>;

  /**
   * One atomic step over a timestamp log:
   * drop entries `<= nowMs - windowMs`, then append `nowMs` only if fewer than
   * `limit` entries remain. Concurrent callers on the same key never both
   * observe the last free slot.
   */
  slidingWindowHit(key: string, input: SlidingWindowHitInput): Promise<SlidingWindowHitResult>;
}
