/**
 * src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache used for rate limiting and sessions.
 *
 * IMPORTANT:
 * - We derive the client type from createClient() instead of importing
 *   RedisClientType, which avoids type conflicts between copies of @redis/client.
 * - The sliding-window step is one Lua script so prune + count + append cannot
 *   interleave across app instances.
 *
 * LOGGING:
 * - Connection errors fire outside any request, so they go to the global logger.
 */

import { randomUUID } from 'node:crypto';
import { createClient } from 'redis';
import { z } from 'zod';

import type { Cache, SlidingWindowHitInput, SlidingWindowHitResult } from './cache';
import { logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

// KEYS[1] = log key
// ARGV = nowMs, windowMs, limit, member
// Returns { allowed (0|1), count, oldestMs | -1 }
const SLIDING_WINDOW_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])

redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)

local allowed = 0
if count < limit then
  redis.call('ZADD', key, now, ARGV[4])
  redis.call('PEXPIRE', key, window)
  count = count + 1
  allowed = 1
end

local oldest = -1
local first = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
if first[2] then
  oldest = tonumber(first[2])
end

return { allowed, count, oldest }
`;

const SlidingWindowReply = z.tuple([z.number(), z.number(), z.number()]);

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, opts?: { ttlSeconds?: number }): Promise<void> {
    if (opts?.ttlSeconds) {
      await this.client.set(key, value, { EX: opts.ttlSeconds });
      return;
    }
    await this.client.set(key, value);
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async sadd(key: string, member: string, opts?: { ttlSeconds?: number }): Promise<void> {
    await this.client.sAdd(key, member);
    if (opts?.ttlSeconds !== undefined) {
      await this.client.expire(key, opts.ttlSeconds);
    }
  }

  async smembers(key: string): Promise<string[]> {
    return this.client.sMembers(key);
  }

  async srem(key: string, member: string): Promise<void> {
    await this.client.sRem(key, member);
  }

  async slidingWindowHit(key: string, input: SlidingWindowHitInput): Promise<SlidingWindowHitResult> {
    const reply = await this.client.eval(SLIDING_WINDOW_SCRIPT, {
      keys: [key],
      arguments: [
        String(input.nowMs),
        String(input.windowMs),
        String(input.limit),
        // Unique member so two attempts in the same millisecond both count.
        `${input.nowMs}-${randomUUID()}`,
      ],
    });

    const [allowed, count, oldest] = SlidingWindowReply.parse(reply);

    return {
      allowed: allowed === 1,
      count,
      oldestMs: oldest < 0 ? null : oldest,
    };
  }
}
