/**
 * src/modules/accounts/email.ts
 *
 * RULES:
 * - normalizeEmail() runs at every entry point before any lookup or key derivation.
 * - emailDomain() is for PII-minimized logging. Never throws.
 */

export function normalizeEmail(raw: string): string {
  return raw.trim().toLowerCase();
}

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}
