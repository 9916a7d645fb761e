import { describe, it, expect } from 'vitest';
import { authFailureToAppError } from '../../../src/modules/auth/auth.errors';

describe('authFailureToAppError', () => {
  it('maps WEAK_PASSWORD to a 400 carrying every reason', () => {
    const err = authFailureToAppError({
      kind: 'WEAK_PASSWORD',
      reasons: ['MISSING_DIGIT', 'CONFIRMATION_MISMATCH'],
    });

    expect(err.status).toBe(400);
    expect(err.code).toBe('VALIDATION_ERROR');
    expect(err.message).toBe('Password must contain at least one digit. Passwords do not match.');
    expect(err.details).toEqual({ reasons: ['MISSING_DIGIT', 'CONFIRMATION_MISMATCH'] });
  });

  it('maps RATE_LIMITED to a 429 with retry-after details', () => {
    const err = authFailureToAppError({ kind: 'RATE_LIMITED', retryAfterSeconds: 42 });

    expect(err.status).toBe(429);
    expect(err.code).toBe('RATE_LIMITED');
    expect(err.details).toEqual({ retryAfterSeconds: 42 });
  });

  it('uses one vague message for credentials and one for codes', () => {
    expect(authFailureToAppError({ kind: 'INVALID_CREDENTIALS' })).toMatchObject({
      status: 401,
      message: 'Invalid email or password.',
    });
    expect(authFailureToAppError({ kind: 'INVALID_OR_EXPIRED_CODE' })).toMatchObject({
      status: 400,
      message: 'Invalid or expired verification code.',
    });
  });

  it('maps the remaining failures', () => {
    expect(authFailureToAppError({ kind: 'IDENTITY_ALREADY_EXISTS' })).toMatchObject({
      status: 409,
      code: 'CONFLICT',
    });
    expect(authFailureToAppError({ kind: 'STORE_UNAVAILABLE' })).toMatchObject({
      status: 503,
      code: 'SERVICE_UNAVAILABLE',
    });
  });
});
