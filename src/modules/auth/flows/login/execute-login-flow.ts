/**
 * src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Login also retires legacy hashes: a correct password against a legacy
 *   record is re-hashed with the current scheme in the same write that records
 *   lastLoginAt.
 *
 * RULES:
 * - Unknown email and wrong password are the same INVALID_CREDENTIALS, and an
 *   unknown email still pays for one bcrypt comparison.
 * - Successful and failed logins share the rate-limit window.
 * - The migration only applies if the stored hash is still the one we verified;
 *   a password reset that lands in between wins.
 */

import { emailDomain, modifyAccount, normalizeEmail } from '../../../accounts';
import { fail, ok, type LoginParams, type LoginResult } from '../../auth.types';
import { checkRateLimit } from '../../helpers/check-rate-limit';
import { createAuthSession } from '../../helpers/create-auth-session';
import type { AuthFlowDeps } from '../auth-flow.deps';

export async function executeLoginFlow(deps: AuthFlowDeps, params: LoginParams): Promise<LoginResult> {
  const email = normalizeEmail(params.email);
  const emailKey = deps.emailHasher.hash(email);
  const now = deps.clock();

  deps.logger.info({
    msg: 'auth.login.start',
    flow: 'auth.login',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  const limited = await checkRateLimit(deps, {
    emailKey,
    operation: 'login',
    now,
    requestId: params.requestId,
  });
  if (limited) return fail(limited);

  const account = await deps.store('accounts.get', () => deps.accountStore.get(email));

  if (!account) {
    await deps.credentials.verifyDummy(params.password);
    deps.logger.info({
      msg: 'auth.login.failed',
      flow: 'auth.login',
      requestId: params.requestId,
      emailKey,
      reason: 'unknown_identity',
    });
    return fail({ kind: 'INVALID_CREDENTIALS' });
  }

  const valid = await deps.credentials.verify(params.password, account.passwordHash, account.hashScheme);
  if (!valid) {
    deps.logger.info({
      msg: 'auth.login.failed',
      flow: 'auth.login',
      requestId: params.requestId,
      emailKey,
      reason: 'bad_password',
    });
    return fail({ kind: 'INVALID_CREDENTIALS' });
  }

  const replacement = deps.credentials.needsMigration(account.hashScheme)
    ? await deps.credentials.hash(params.password)
    : null;

  const saved = await deps.store('accounts.modify', () =>
    modifyAccount(deps.accountStore, email, (current) => {
      const stillVerified =
        current.passwordHash === account.passwordHash && current.hashScheme === account.hashScheme;

      if (replacement && stillVerified) {
        return {
          ...current,
          passwordHash: replacement.hash,
          hashScheme: replacement.scheme,
          lastLoginAt: now,
          updatedAt: now,
        };
      }

      return { ...current, lastLoginAt: now, updatedAt: now };
    }),
  );

  if (!saved) {
    return fail({ kind: 'INVALID_CREDENTIALS' });
  }

  const migrated = replacement !== null && saved.passwordHash === replacement.hash;
  if (migrated) {
    deps.logger.info({
      msg: 'auth.login.hash_migrated',
      flow: 'auth.login',
      requestId: params.requestId,
      emailKey,
      from: account.hashScheme,
      to: saved.hashScheme,
    });
  }

  const sessionId = await createAuthSession({
    sessionStore: deps.sessionStore,
    store: deps.store,
    email,
    now,
  });

  deps.logger.info({
    msg: 'auth.login.success',
    flow: 'auth.login',
    requestId: params.requestId,
    emailKey,
  });

  return ok({ email, sessionId, migrated });
}
