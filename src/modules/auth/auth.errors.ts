/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - The HTTP boundary turns AuthFailure results into AppError.
 * - Security-safe: messages never reveal whether an email exists, or why a
 *   reset code was rejected.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, codes or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import type { AuthFailure } from './auth.types';
import { PASSWORD_WEAKNESS_MESSAGES } from './policies/password-strength.policy';

export const AuthErrors = {
  /** Wrong email or password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid email or password.', meta);
  },

  alreadyRegistered(meta?: AppErrorMeta) {
    return AppError.conflict('This email is already registered. Please sign in.', meta);
  },

  /**
   * One error for not-found, expired, wrong and already-used codes, so the
   * response is not an oracle for which of those happened.
   */
  invalidOrExpiredCode(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid or expired verification code.', meta);
  },

  storeUnavailable(meta?: AppErrorMeta) {
    return AppError.serviceUnavailable('Service temporarily unavailable. Please try again.', meta);
  },
} as const;

export function authFailureToAppError(failure: AuthFailure, meta?: AppErrorMeta): AppError {
  switch (failure.kind) {
    case 'RATE_LIMITED':
      return AppError.rateLimited(failure.retryAfterSeconds, meta);
    case 'INVALID_CREDENTIALS':
      return AuthErrors.invalidCredentials(meta);
    case 'WEAK_PASSWORD':
      return AppError.validationError(
        failure.reasons.map((r) => PASSWORD_WEAKNESS_MESSAGES[r]).join(' '),
        meta,
        { reasons: failure.reasons },
      );
    case 'IDENTITY_ALREADY_EXISTS':
      return AuthErrors.alreadyRegistered(meta);
    case 'INVALID_OR_EXPIRED_CODE':
      return AuthErrors.invalidOrExpiredCode(meta);
    case 'STORE_UNAVAILABLE':
      return AuthErrors.storeUnavailable(meta);
  }
}
