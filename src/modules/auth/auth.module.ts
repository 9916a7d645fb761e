/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring: reset-code manager, service, controller, routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import type { DbExecutor } from '../../shared/db/db';
import type { StoreOpRunner } from '../../shared/db/store-timeout';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { CredentialHasher } from '../../shared/security/credential-hasher';
import type { KeyedHasher } from '../../shared/security/keyed-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { SessionStore } from '../../shared/session/session.store';
import type { AccountStore } from '../accounts';

import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import { AuthService } from './auth.service';
import { InMemResetRequestStore } from './reset-codes/dal/inmem-reset-request.store';
import { KyselyResetRequestStore } from './reset-codes/dal/kysely-reset-request.store';
import { ResetCodeManager } from './reset-codes/reset-code.manager';
import type { ResetRequestStore } from './reset-codes/reset-request.types';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  db: DbExecutor | null;
  accountStore: AccountStore;
  resetRequestStore?: ResetRequestStore;
  credentials: CredentialHasher;
  rateLimiter: RateLimiter;
  resetCodeHasher: KeyedHasher;
  resetCodeTtlMinutes: number;
  sessionStore: SessionStore;
  sessionTtlSeconds: number;
  queue: Queue;
  emailHasher: TokenHasher;
  logger: Logger;
  store: StoreOpRunner;
  clock: () => Date;
  isProduction: boolean;
}) {
  const resetRequestStore: ResetRequestStore =
    deps.resetRequestStore ??
    (deps.db ? new KyselyResetRequestStore(deps.db) : new InMemResetRequestStore());

  const resetCodes = new ResetCodeManager({
    store: resetRequestStore,
    codeHasher: deps.resetCodeHasher,
    ttlMinutes: deps.resetCodeTtlMinutes,
  });

  const authService = new AuthService({
    accountStore: deps.accountStore,
    credentials: deps.credentials,
    rateLimiter: deps.rateLimiter,
    resetCodes,
    sessionStore: deps.sessionStore,
    queue: deps.queue,
    emailHasher: deps.emailHasher,
    logger: deps.logger,
    store: deps.store,
    clock: deps.clock,
  });

  const controller = new AuthController(authService, {
    isProduction: deps.isProduction,
    sessionTtlSeconds: deps.sessionTtlSeconds,
  });

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
