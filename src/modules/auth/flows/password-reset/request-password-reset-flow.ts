/**
 * src/modules/auth/flows/password-reset/request-password-reset-flow.ts
 *
 * WHY:
 * - Issues a reset code and emails it.
 *
 * RULES:
 * - Anti-enumeration: known and unknown emails get the same response value.
 *   The rate-limit window is keyed by the email either way, so RATE_LIMITED
 *   reveals nothing about existence.
 * - A second request replaces the first code.
 */

import { emailDomain, normalizeEmail } from '../../../accounts';
import { RESET_REQUEST_RESPONSE_MESSAGE } from '../../auth.constants';
import {
  fail,
  ok,
  type RequestPasswordResetParams,
  type RequestPasswordResetResult,
} from '../../auth.types';
import { checkRateLimit } from '../../helpers/check-rate-limit';
import { enqueueEmail } from '../../helpers/enqueue-email';
import type { AuthFlowDeps } from '../auth-flow.deps';

export async function requestPasswordResetFlow(
  deps: AuthFlowDeps,
  params: RequestPasswordResetParams,
): Promise<RequestPasswordResetResult> {
  const email = normalizeEmail(params.email);
  const emailKey = deps.emailHasher.hash(email);
  const now = deps.clock();

  deps.logger.info({
    msg: 'auth.password_reset.requested',
    flow: 'auth.password_reset',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  const limited = await checkRateLimit(deps, {
    emailKey,
    operation: 'reset-request',
    now,
    requestId: params.requestId,
  });
  if (limited) return fail(limited);

  const account = await deps.store('accounts.get', () => deps.accountStore.get(email));

  if (account) {
    const code = await deps.store('reset-requests.issue', () => deps.resetCodes.issue(email, now));

    await enqueueEmail(
      deps,
      {
        type: 'auth.reset-code-email',
        email,
        code,
        expiresInMinutes: deps.resetCodes.ttlMinutes,
      },
      { requestId: params.requestId, emailKey },
    );
  }

  deps.logger.info({
    msg: 'auth.password_reset.request_handled',
    flow: 'auth.password_reset',
    requestId: params.requestId,
    emailKey,
    issued: account !== undefined,
  });

  return ok({ message: RESET_REQUEST_RESPONSE_MESSAGE });
}
