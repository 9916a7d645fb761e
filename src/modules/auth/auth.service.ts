/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Public in-process API of the auth core: register, login, password reset
 *   request/verification, and session lookup/logout.
 * - getSession() serves callers outside HTTP. The HTTP session middleware sits
 *   in shared/ below this module and reads the SessionStore itself.
 * - Each operation delegates to a flow under flows/ and returns that flow's
 *   discriminated result.
 *
 * RULES:
 * - No exception crosses this boundary for an auth outcome. Store/cache
 *   failures and timeouts (StoreUnavailableError), and any other unexpected
 *   throw inside a flow, become STORE_UNAVAILABLE and are logged here.
 * - All collaborators are injected (di.ts); nothing here is a singleton.
 */

import { StoreUnavailableError, type StoreOpRunner } from '../../shared/db/store-timeout';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { CredentialHasher } from '../../shared/security/credential-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { SessionStore } from '../../shared/session/session.store';
import type { AccountStore } from '../accounts';

import {
  fail,
  ok,
  type LoginParams,
  type LoginResult,
  type LogoutResult,
  type RegisterParams,
  type RegisterResult,
  type RequestPasswordResetParams,
  type RequestPasswordResetResult,
  type ResetPasswordParams,
  type ResetPasswordResult,
  type SessionResult,
} from './auth.types';
import type { AuthFlowDeps } from './flows/auth-flow.deps';
import { executeLoginFlow } from './flows/login/execute-login-flow';
import { requestPasswordResetFlow } from './flows/password-reset/request-password-reset-flow';
import { resetPasswordFlow } from './flows/password-reset/reset-password-flow';
import { executeRegisterFlow } from './flows/register/execute-register-flow';
import type { ResetCodeManager } from './reset-codes/reset-code.manager';

const STORE_UNAVAILABLE = fail({ kind: 'STORE_UNAVAILABLE' });

export class AuthService {
  private readonly flowDeps: AuthFlowDeps;

  constructor(deps: {
    accountStore: AccountStore;
    credentials: CredentialHasher;
    rateLimiter: RateLimiter;
    resetCodes: ResetCodeManager;
    sessionStore: SessionStore;
    queue: Queue;
    emailHasher: TokenHasher;
    logger: Logger;
    store: StoreOpRunner;
    clock: () => Date;
  }) {
    this.flowDeps = { ...deps };
  }

  register(params: RegisterParams): Promise<RegisterResult> {
    return this.guard<RegisterResult>('auth.register', params.requestId, () =>
      executeRegisterFlow(this.flowDeps, params),
    );
  }

  login(params: LoginParams): Promise<LoginResult> {
    return this.guard<LoginResult>('auth.login', params.requestId, () =>
      executeLoginFlow(this.flowDeps, params),
    );
  }

  requestPasswordReset(params: RequestPasswordResetParams): Promise<RequestPasswordResetResult> {
    return this.guard<RequestPasswordResetResult>('auth.password_reset', params.requestId, () =>
      requestPasswordResetFlow(this.flowDeps, params),
    );
  }

  resetPassword(params: ResetPasswordParams): Promise<ResetPasswordResult> {
    return this.guard<ResetPasswordResult>('auth.password_reset', params.requestId, () =>
      resetPasswordFlow(this.flowDeps, params),
    );
  }

  /** value is null when the session is unknown or expired. */
  getSession(sessionId: string): Promise<SessionResult> {
    return this.guard<SessionResult>('auth.session', undefined, async () =>
      ok(await this.flowDeps.store('sessions.get', () => this.flowDeps.sessionStore.get(sessionId))),
    );
  }

  logout(sessionId: string, requestId?: string): Promise<LogoutResult> {
    return this.guard<LogoutResult>('auth.logout', requestId, async () => {
      await this.flowDeps.store('sessions.destroy', () => this.flowDeps.sessionStore.destroy(sessionId));
      return ok(null);
    });
  }

  private async guard<R>(
    flow: string,
    requestId: string | undefined,
    run: () => Promise<R>,
  ): Promise<R | typeof STORE_UNAVAILABLE> {
    try {
      return await run();
    } catch (err) {
      const cause = err instanceof StoreUnavailableError ? err.cause : err;

      this.flowDeps.logger.error({
        msg: 'auth.store_unavailable',
        flow,
        requestId,
        operation: err instanceof StoreUnavailableError ? err.operation : 'unexpected',
        error: cause instanceof Error ? cause.message : String(cause),
        stack: cause instanceof Error ? cause.stack : undefined,
      });

      return STORE_UNAVAILABLE;
    }
  }
}
