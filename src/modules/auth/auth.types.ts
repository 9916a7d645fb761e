/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Every auth flow returns a discriminated result instead of throwing for
 *   expected outcomes (bad password, rate limit, used code...).
 * - Each flow's result type names exactly the failures that flow can produce,
 *   so callers get exhaustive switches.
 *
 * RULES:
 * - Never include raw passwords, hashes or codes in result values.
 */

import type { SessionData } from '../../shared/session/session.types';
import type { PasswordWeakness } from './policies/password-strength.policy';

// ── Failures ─────────────────────────────────────────────────

export type AuthFailure =
  | { kind: 'RATE_LIMITED'; retryAfterSeconds: number }
  | { kind: 'INVALID_CREDENTIALS' }
  | { kind: 'WEAK_PASSWORD'; reasons: PasswordWeakness[] }
  | { kind: 'IDENTITY_ALREADY_EXISTS' }
  | { kind: 'INVALID_OR_EXPIRED_CODE' }
  | { kind: 'STORE_UNAVAILABLE' };

export type AuthFailureKind = AuthFailure['kind'];

export type FailureOf<K extends AuthFailureKind> = Extract<AuthFailure, { kind: K }>;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends AuthFailure>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ── Flow params ──────────────────────────────────────────────

export type RegisterParams = {
  email: string;
  password: string;
  passwordConfirmation: string;
  requestId?: string;
};

export type LoginParams = {
  email: string;
  password: string;
  requestId?: string;
};

export type RequestPasswordResetParams = {
  email: string;
  requestId?: string;
};

export type ResetPasswordParams = {
  email: string;
  code: string;
  newPassword: string;
  newPasswordConfirmation: string;
  requestId?: string;
};

// ── Flow values ──────────────────────────────────────────────

export type AuthSession = {
  email: string;
  sessionId: string;
};

export type LoginValue = AuthSession & {
  /** True when this login moved the stored hash off the legacy scheme. */
  migrated: boolean;
};

export type GenericMessage = { message: string };

// ── Flow results ─────────────────────────────────────────────

export type RegisterResult = Result<
  AuthSession,
  FailureOf<'WEAK_PASSWORD' | 'RATE_LIMITED' | 'IDENTITY_ALREADY_EXISTS' | 'STORE_UNAVAILABLE'>
>;

export type LoginResult = Result<
  LoginValue,
  FailureOf<'RATE_LIMITED' | 'INVALID_CREDENTIALS' | 'STORE_UNAVAILABLE'>
>;

export type RequestPasswordResetResult = Result<
  GenericMessage,
  FailureOf<'RATE_LIMITED' | 'STORE_UNAVAILABLE'>
>;

export type ResetPasswordResult = Result<
  GenericMessage,
  FailureOf<'RATE_LIMITED' | 'WEAK_PASSWORD' | 'INVALID_OR_EXPIRED_CODE' | 'STORE_UNAVAILABLE'>
>;

export type SessionResult = Result<SessionData | null, FailureOf<'STORE_UNAVAILABLE'>>;

export type LogoutResult = Result<null, FailureOf<'STORE_UNAVAILABLE'>>;
