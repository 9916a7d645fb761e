/**
 * src/modules/auth/helpers/check-rate-limit.ts
 *
 * WHY:
 * - Every flow starts the same way: record one attempt for (emailKey, operation)
 *   and stop with RATE_LIMITED when the window is full.
 */

import type { RateLimitedOperation } from '../../../shared/security/rate-limit';
import type { FailureOf } from '../auth.types';
import type { AuthFlowDeps } from '../flows/auth-flow.deps';

export async function checkRateLimit(
  deps: Pick<AuthFlowDeps, 'rateLimiter' | 'store' | 'logger'>,
  params: { emailKey: string; operation: RateLimitedOperation; now: Date; requestId?: string },
): Promise<FailureOf<'RATE_LIMITED'> | null> {
  const decision = await deps.store(`rate-limit.${params.operation}`, () =>
    deps.rateLimiter.checkAndRecord({
      identity: params.emailKey,
      operation: params.operation,
      now: params.now,
    }),
  );

  if (decision.allowed) return null;

  deps.logger.warn({
    msg: 'auth.rate_limited',
    flow: `auth.${params.operation}`,
    requestId: params.requestId,
    emailKey: params.emailKey,
    retryAfterSeconds: decision.retryAfterSeconds,
  });

  return { kind: 'RATE_LIMITED', retryAfterSeconds: decision.retryAfterSeconds };
}
