/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Server-side session data model. Sessions live in the Cache (Redis in prod)
 *   under a TTL, 30 days by default.
 *
 * RULES:
 * - Session data is JSON (stored as a string) and validated on every read.
 * - Cookie is HttpOnly, SameSite=Strict, Secure in production.
 * - Never store passwords, hashes or API keys in session data.
 */

import { z } from 'zod';

export const SessionDataSchema = z.object({
  email: z.string().min(1),
  createdAt: z.string().datetime(),
});

export type SessionData = z.infer<typeof SessionDataSchema>;

export const SESSION_COOKIE_NAME = 'sid';

/** Full key: `session:{sessionId}`. */
export const SESSION_KEY_PREFIX = 'session';

/**
 * Per-account index of live session ids. Full key: `session:user:{emailKey}`.
 * A Redis SET, so revoking every session of an account needs no key scan.
 */
export const SESSION_USER_INDEX_PREFIX = 'session:user';
