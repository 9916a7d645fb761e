/**
 * src/modules/auth/policies/password-strength.policy.ts
 *
 * WHY:
 * - One password rule set for registration and password reset.
 * - Returns every failed rule (not just the first) so the UI can show them together.
 *
 * RULES:
 * - Pure. No I/O.
 * - Confirmation mismatch is reported through the same list.
 */

export const PASSWORD_MIN_LENGTH = 8;

export type PasswordWeakness =
  | 'TOO_SHORT'
  | 'MISSING_UPPERCASE'
  | 'MISSING_LOWERCASE'
  | 'MISSING_DIGIT'
  | 'CONFIRMATION_MISMATCH';

export const PASSWORD_WEAKNESS_MESSAGES: Record<PasswordWeakness, string> = {
  TOO_SHORT: `Password must be at least ${PASSWORD_MIN_LENGTH} characters long.`,
  MISSING_UPPERCASE: 'Password must contain at least one uppercase letter.',
  MISSING_LOWERCASE: 'Password must contain at least one lowercase letter.',
  MISSING_DIGIT: 'Password must contain at least one digit.',
  CONFIRMATION_MISMATCH: 'Passwords do not match.',
};

export function getPasswordWeaknesses(password: string, confirmation: string): PasswordWeakness[] {
  const reasons: PasswordWeakness[] = [];

  if (password.length < PASSWORD_MIN_LENGTH) reasons.push('TOO_SHORT');
  if (!/[A-Z]/.test(password)) reasons.push('MISSING_UPPERCASE');
  if (!/[a-z]/.test(password)) reasons.push('MISSING_LOWERCASE');
  if (!/[0-9]/.test(password)) reasons.push('MISSING_DIGIT');
  if (password !== confirmation) reasons.push('CONFIRMATION_MISMATCH');

  return reasons;
}
