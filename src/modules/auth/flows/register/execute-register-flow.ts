/**
 * src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - Registration end to end: validate → rate limit → create → welcome email → session.
 *
 * RULES:
 * - Password strength is checked before the rate-limit slot is consumed, so a
 *   user fixing a weak password does not lock themselves out.
 * - create() is insert-if-absent: a concurrent registration of the same email
 *   loses with IDENTITY_ALREADY_EXISTS, never a duplicate row.
 * - Never log raw email or password.
 */

import { emailDomain, emptySettings, normalizeEmail } from '../../../accounts';
import { fail, ok, type RegisterParams, type RegisterResult } from '../../auth.types';
import { checkRateLimit } from '../../helpers/check-rate-limit';
import { createAuthSession } from '../../helpers/create-auth-session';
import { enqueueEmail } from '../../helpers/enqueue-email';
import { getPasswordWeaknesses } from '../../policies/password-strength.policy';
import type { AuthFlowDeps } from '../auth-flow.deps';

export async function executeRegisterFlow(
  deps: AuthFlowDeps,
  params: RegisterParams,
): Promise<RegisterResult> {
  const email = normalizeEmail(params.email);
  const emailKey = deps.emailHasher.hash(email);
  const now = deps.clock();

  deps.logger.info({
    msg: 'auth.register.start',
    flow: 'auth.register',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  const reasons = getPasswordWeaknesses(params.password, params.passwordConfirmation);
  if (reasons.length > 0) {
    return fail({ kind: 'WEAK_PASSWORD', reasons });
  }

  const limited = await checkRateLimit(deps, {
    emailKey,
    operation: 'registration',
    now,
    requestId: params.requestId,
  });
  if (limited) return fail(limited);

  const existing = await deps.store('accounts.get', () => deps.accountStore.get(email));
  if (existing) {
    return fail({ kind: 'IDENTITY_ALREADY_EXISTS' });
  }

  const credential = await deps.credentials.hash(params.password);

  const created = await deps.store('accounts.create', () =>
    deps.accountStore.create({
      email,
      passwordHash: credential.hash,
      hashScheme: credential.scheme,
      createdAt: now,
      updatedAt: now,
      lastLoginAt: null,
      settings: emptySettings(),
    }),
  );
  if (!created) {
    return fail({ kind: 'IDENTITY_ALREADY_EXISTS' });
  }

  await enqueueEmail(deps, { type: 'auth.welcome-email', email }, { requestId: params.requestId, emailKey });

  const sessionId = await createAuthSession({
    sessionStore: deps.sessionStore,
    store: deps.store,
    email,
    now,
  });

  deps.logger.info({
    msg: 'auth.register.success',
    flow: 'auth.register',
    requestId: params.requestId,
    emailKey,
  });

  return ok({ email, sessionId });
}
