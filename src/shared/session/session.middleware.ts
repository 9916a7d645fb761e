/**
 * src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Reads the session cookie on every request and fills req.authContext.
 * - Does NOT throw when there is no session; endpoints decide if auth is required.
 *
 * RULES:
 * - Runs AFTER the requestContext and authContext hooks.
 * - A cache failure here is logged and the request continues unauthenticated.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import { withRequestContext } from '../logger/with-context';
import type { TokenHasher } from '../security/token-hasher';
import type { SessionStore } from './session.store';
import { SESSION_COOKIE_NAME } from './session.types';

/** "key1=value1; key2=value2" → { key1: 'value1', key2: 'value2' } */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}

export function registerSessionMiddleware(
  app: FastifyInstance,
  deps: { sessionStore: SessionStore; emailHasher: TokenHasher },
): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const sessionId = parseCookies(req.headers.cookie)[SESSION_COOKIE_NAME];
    if (!sessionId) return;

    try {
      const session = await deps.sessionStore.get(sessionId);
      if (!session) return;

      req.authContext = {
        sessionId,
        email: session.email,
        emailKey: deps.emailHasher.hash(session.email),
      };
    } catch (err) {
      withRequestContext(req).warn('session.lookup_failed', {
        flow: 'session',
        message: err instanceof Error ? err.message : String(err),
      });
    }
  });
}
