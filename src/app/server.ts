/**
 * src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * ORDER MATTERS:
 * - requestContext → authContext stub → session middleware (fills authContext).
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerRequestContext } from '../shared/http/request-context';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // Winston handles logging
    bodyLimit: 64 * 1024,
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerSessionMiddleware(app, {
    sessionStore: opts.deps.sessionStore,
    emailHasher: opts.deps.emailHasher,
  });
  registerErrorHandler(app);

  app.addHook('onResponse', async (req, reply) => {
    opts.deps.logger.info('request', {
      method: req.method,
      url: req.routeOptions.url ?? req.url,
      statusCode: reply.statusCode,
      requestId: req.requestContext.requestId,
      durationMs: Math.round(reply.elapsedTime),
    });
  });

  return app;
}
