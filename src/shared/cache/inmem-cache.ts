/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev without Redis) to run without external infra.
 *
 * ATOMICITY:
 * - Every method does its read-modify-write synchronously before returning a
 *   resolved promise, so no other caller can interleave inside one operation.
 *
 * EXPIRY:
 * - An attempt log expires one window after its newest entry, as the PEXPIRE
 *   in the Redis script does. Every slidingWindowHit() sweeps expired logs, so
 *   identities that never come back do not stay in memory.
 */

import type { Cache, SlidingWindowHitInput, SlidingWindowHitResult } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };
type AttemptLog = { timestamps: number[]; expiresAtMs: number };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();
  private readonly sets = new Map<string, Set<string>>();
  private readonly setExpiry = new Map<string, number | null>();
  private readonly logs = new Map<string, AttemptLog>();

  private now(): number {
    return Date.now();
  }

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  private isSetExpired(key: string): boolean {
    const exp = this.setExpiry.get(key);
    if (exp === undefined || exp === null) return false;
    return exp <= this.now();
  }

  private evictSetIfExpired(key: string): void {
    if (this.isSetExpired(key)) {
      this.sets.delete(key);
      this.setExpiry.delete(key);
    }
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: { ttlSeconds?: number }): Promise<void> {
    const expiresAtMs = opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;
    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    this.sets.delete(key);
    this.setExpiry.delete(key);
    this.logs.delete(key);
    return Promise.resolve();
  }

  sadd(key: string, member: string, opts?: { ttlSeconds?: number }): Promise<void> {
    this.evictSetIfExpired(key);

    let set = this.sets.get(key);
    if (!set) {
      set = new Set<string>();
      this.sets.set(key, set);
    }
    set.add(member);

    // Refresh TTL on every sadd (same as Redis EXPIRE after SADD)
    if (opts?.ttlSeconds !== undefined) {
      this.setExpiry.set(key, this.now() + opts.ttlSeconds * 1000);
    } else if (!this.setExpiry.has(key)) {
      this.setExpiry.set(key, null);
    }

    return Promise.resolve();
  }

  smembers(key: string): Promise<string[]> {
    this.evictSetIfExpired(key);

    const set = this.sets.get(key);
    return Promise.resolve(set ? Array.from(set) : []);
  }

  srem(key: string, member: string): Promise<void> {
    this.evictSetIfExpired(key);

    this.sets.get(key)?.delete(member);
    return Promise.resolve();
  }

  /**
   * Drops every attempt log whose newest entry is at or before `nowMs - window`.
   * Returns how many keys were dropped.
   */
  pruneExpiredLogs(nowMs: number): number {
    let dropped = 0;
    for (const [key, log] of this.logs) {
      if (log.expiresAtMs <= nowMs) {
        this.logs.delete(key);
        dropped++;
      }
    }
    return dropped;
  }

  slidingWindowHit(key: string, input: SlidingWindowHitInput): Promise<SlidingWindowHitResult> {
    this.pruneExpiredLogs(input.nowMs);

    const cutoff = input.nowMs - input.windowMs;
    const retained = (this.logs.get(key)?.timestamps ?? []).filter((ts) => ts > cutoff);

    const allowed = retained.length < input.limit;
    if (allowed) {
      retained.push(input.nowMs);
      retained.sort((a, b) => a - b);
    }

    const newestMs = retained.length > 0 ? retained[retained.length - 1] : null;
    if (newestMs === null) {
      this.logs.delete(key);
    } else {
      this.logs.set(key, { timestamps: retained, expiresAtMs: newestMs + input.windowMs });
    }

    return Promise.resolve({
      allowed,
      count: retained.length,
      oldestMs: retained.length > 0 ? retained[0] : null,
    });
  }
}
