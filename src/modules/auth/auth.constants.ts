/**
 * src/modules/auth/auth.constants.ts
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const RESET_REQUEST_RESPONSE_MESSAGE =
  'If this email is registered, a verification code will be sent.';

export const RESET_PASSWORD_RESPONSE_MESSAGE = 'Password reset successfully. You can now login.';

export const RESET_CODE_TTL_MINUTES = { default: 15, min: 15, max: 30 } as const;

export const SESSION_TTL_SECONDS_DEFAULT = 30 * 24 * 60 * 60;
