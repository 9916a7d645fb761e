/**
 * src/shared/http/auth-context.ts
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an unauthenticated stub on every request.
 * 2. Session middleware overwrites it when a valid session cookie is present.
 * 3. Controllers read req.authContext (or call requireSession()).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type AuthContext = {
  sessionId: string | null;
  email: string | null;
  /** SHA-256 of the email; safe to log. */
  emailKey: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = {
      sessionId: null,
      email: null,
      emailKey: null,
    };

    done();
  });
}
