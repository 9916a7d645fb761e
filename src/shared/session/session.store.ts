/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side sessions through the Cache interface (Redis in prod, InMemCache in tests).
 * - Sessions are revocable immediately via del(); TTL is enforced by the cache.
 *
 * USER-SESSION INDEX:
 * - create(): SADD session:user:{emailKey} {sessionId}, TTL refreshed to the session TTL.
 * - destroy(): SREM from the index, then DEL the session.
 * - destroyAllForUser(): SMEMBERS → DEL each → DEL the index.
 *   Called after a password reset so an old cookie stops working.
 *
 * RULES:
 * - The index is keyed by a digest of the email, never the raw address.
 * - No HTTP concerns here (cookie handling lives in middleware / controllers).
 */

import type { Cache } from '../cache/cache';
import type { TokenHasher } from '../security/token-hasher';
import { generateSecureToken } from '../security/token';
import type { SessionData } from './session.types';
import { SESSION_KEY_PREFIX, SESSION_USER_INDEX_PREFIX, SessionDataSchema } from './session.types';

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly emailHasher: TokenHasher,
    private readonly ttlSeconds: number,
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  private userIndexKey(email: string): string {
    return `${SESSION_USER_INDEX_PREFIX}:${this.emailHasher.hash(email)}`;
  }

  /** Returns the new session id. The caller sets the cookie. */
  async create(data: SessionData): Promise<string> {
    const sessionId = generateSecureToken();

    await this.cache.set(this.key(sessionId), JSON.stringify(data), {
      ttlSeconds: this.ttlSeconds,
    });

    await this.cache.sadd(this.userIndexKey(data.email), sessionId, {
      ttlSeconds: this.ttlSeconds,
    });

    return sessionId;
  }

  /** Null if expired, missing or unreadable. */
  async get(sessionId: string): Promise<SessionData | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (!raw) return null;

    const parsed = SessionDataSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      await this.cache.del(this.key(sessionId));
      return null;
    }

    return parsed.data;
  }

  async destroy(sessionId: string): Promise<void> {
    const session = await this.get(sessionId);
    if (session) {
      await this.cache.srem(this.userIndexKey(session.email), sessionId);
    }

    await this.cache.del(this.key(sessionId));
  }

  async destroyAllForUser(email: string): Promise<void> {
    const indexKey = this.userIndexKey(email);
    const sessionIds = await this.cache.smembers(indexKey);

    await Promise.all(sessionIds.map((id) => this.cache.del(this.key(id))));
    await this.cache.del(indexKey);
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
