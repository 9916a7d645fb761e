/**
 * src/shared/security/token.ts
 *
 * WHY:
 * - Session ids and reset codes come from one place, both from crypto.randomBytes.
 *
 * RESET CODE FORMAT:
 * - 10 characters over a 32-symbol alphabet with the look-alikes removed
 *   (no 0/O, no 1/I). 32 divides 256, so `byte % 32` has no modulo bias.
 * - 10 × 5 bits = 50 bits of entropy. Short enough to type from an email.
 */

import { randomBytes } from 'node:crypto';

export const RESET_CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
export const RESET_CODE_LENGTH = 10;

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}

export function generateResetCode(length: number = RESET_CODE_LENGTH): string {
  const bytes = randomBytes(length);
  let code = '';
  for (const byte of bytes) {
    code += RESET_CODE_ALPHABET.charAt(byte % RESET_CODE_ALPHABET.length);
  }
  return code;
}

/** Users type codes by hand: ignore surrounding whitespace and case. */
export function normalizeResetCode(candidate: string): string {
  return candidate.trim().toUpperCase();
}
