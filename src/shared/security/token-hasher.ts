/**
 * src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Infrastructure keys (rate-limit windows, session indexes) and logs refer to
 *   an account by a digest of its email, never the raw address.
 *
 * HOW TO USE:
 * - const emailKey = tokenHasher.hash(normalizedEmail)
 */

export interface TokenHasher {
  hash(raw: string): string;
}
