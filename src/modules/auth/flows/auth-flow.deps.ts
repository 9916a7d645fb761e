/**
 * src/modules/auth/flows/auth-flow.deps.ts
 *
 * Dependencies shared by the auth flows. Built once by AuthService from what
 * di.ts passes in; flows never construct infra.
 */

import type { StoreOpRunner } from '../../../shared/db/store-timeout';
import type { Logger } from '../../../shared/logger/logger';
import type { Queue } from '../../../shared/messaging/queue';
import type { CredentialHasher } from '../../../shared/security/credential-hasher';
import type { RateLimiter } from '../../../shared/security/rate-limit';
import type { TokenHasher } from '../../../shared/security/token-hasher';
import type { SessionStore } from '../../../shared/session/session.store';
import type { AccountStore } from '../../accounts';
import type { ResetCodeManager } from '../reset-codes/reset-code.manager';

export type AuthFlowDeps = {
  accountStore: AccountStore;
  credentials: CredentialHasher;
  rateLimiter: RateLimiter;
  resetCodes: ResetCodeManager;
  sessionStore: SessionStore;
  queue: Queue;
  /** SHA-256 of the normalized email: limiter identity + log key. */
  emailHasher: TokenHasher;
  logger: Logger;
  /** Bounds each store/cache call by STORE_TIMEOUT_MS. */
  store: StoreOpRunner;
  clock: () => Date;
};
