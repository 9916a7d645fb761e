/**
 * src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Each stored hash format (legacy digest, bcrypt) gets one implementation.
 * - CredentialHasher dispatches to them by scheme tag; nothing else calls them directly.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
