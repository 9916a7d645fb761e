/**
 * src/modules/auth/helpers/create-auth-session.ts
 *
 * WHY:
 * - register() and login() end the same way: create a server-side session.
 *
 * RULES:
 * - Cookie flags are set by the controller, not here.
 */

import type { StoreOpRunner } from '../../../shared/db/store-timeout';
import type { SessionStore } from '../../../shared/session/session.store';

export async function createAuthSession(params: {
  sessionStore: SessionStore;
  store: StoreOpRunner;
  email: string;
  now: Date;
}): Promise<string> {
  return params.store('sessions.create', () =>
    params.sessionStore.create({
      email: params.email,
      createdAt: params.now.toISOString(),
    }),
  );
}
