/**
 * src/modules/auth/flows/password-reset/reset-password-flow.ts
 *
 * WHY:
 * - Verifies a reset code and sets the new password.
 *
 * RULES:
 * - Rate limit first (every verification attempt counts), then password strength.
 * - NOT_FOUND / EXPIRED / INVALID all become INVALID_OR_EXPIRED_CODE.
 * - The code is consumed before the password is written. If the write fails
 *   the user requests a new code.
 * - On success: clear the reset-verification and login windows, then revoke
 *   every session.
 *   No auto-login; the user signs in with the new password.
 */

import { modifyAccount, normalizeEmail } from '../../../accounts';
import { RESET_PASSWORD_RESPONSE_MESSAGE } from '../../auth.constants';
import { fail, ok, type ResetPasswordParams, type ResetPasswordResult } from '../../auth.types';
import { checkRateLimit } from '../../helpers/check-rate-limit';
import { getPasswordWeaknesses } from '../../policies/password-strength.policy';
import type { AuthFlowDeps } from '../auth-flow.deps';

export async function resetPasswordFlow(
  deps: AuthFlowDeps,
  params: ResetPasswordParams,
): Promise<ResetPasswordResult> {
  const email = normalizeEmail(params.email);
  const emailKey = deps.emailHasher.hash(email);
  const now = deps.clock();

  const limited = await checkRateLimit(deps, {
    emailKey,
    operation: 'reset-verification',
    now,
    requestId: params.requestId,
  });
  if (limited) return fail(limited);

  const reasons = getPasswordWeaknesses(params.newPassword, params.newPasswordConfirmation);
  if (reasons.length > 0) {
    return fail({ kind: 'WEAK_PASSWORD', reasons });
  }

  const outcome = await deps.store('reset-requests.verify', () =>
    deps.resetCodes.verify(email, params.code, now),
  );

  if (outcome !== 'VALID') {
    deps.logger.info({
      msg: 'auth.password_reset.code_rejected',
      flow: 'auth.password_reset',
      requestId: params.requestId,
      emailKey,
      outcome,
    });
    return fail({ kind: 'INVALID_OR_EXPIRED_CODE' });
  }

  const credential = await deps.credentials.hash(params.newPassword);

  const saved = await deps.store('accounts.modify', () =>
    modifyAccount(deps.accountStore, email, (current) => ({
      ...current,
      passwordHash: credential.hash,
      hashScheme: credential.scheme,
      updatedAt: now,
    })),
  );

  if (!saved) {
    return fail({ kind: 'INVALID_OR_EXPIRED_CODE' });
  }

  await deps.store('rate-limit.reset', () => deps.rateLimiter.reset(emailKey, 'reset-verification'));
  await deps.store('rate-limit.reset', () => deps.rateLimiter.reset(emailKey, 'login'));
  await deps.store('sessions.destroy-all', () => deps.sessionStore.destroyAllForUser(email));

  deps.logger.info({
    msg: 'auth.password_reset.completed',
    flow: 'auth.password_reset',
    requestId: params.requestId,
    emailKey,
  });

  return ok({ message: RESET_PASSWORD_RESPONSE_MESSAGE });
}
