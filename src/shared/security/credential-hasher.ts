/**
 * src/shared/security/credential-hasher.ts
 *
 * WHY:
 * - Stored password hashes are tagged with the scheme that produced them.
 * - Verification dispatches on the tag; new hashes always use the current scheme.
 * - Legacy hashes are migrated by the login flow after a successful verify.
 *
 * HOW TO USE:
 * - const { hash, scheme } = await credentials.hash(password)
 * - const ok = await credentials.verify(password, account.passwordHash, account.hashScheme)
 * - if (ok && credentials.needsMigration(account.hashScheme)) { ...rehash + save }
 * - await credentials.verifyDummy(password) when the account does not exist
 */

import { BcryptPasswordHasher } from './bcrypt-password-hasher';
import { LegacySha256PasswordHasher } from './legacy-sha256-password-hasher';
import type { PasswordHasher } from './password-hasher';

export const HASH_SCHEMES = ['legacy', 'bcrypt'] as const;
export type HashScheme = (typeof HASH_SCHEMES)[number];

export const CURRENT_HASH_SCHEME: HashScheme = 'bcrypt';

export type HashedCredential = {
  hash: string;
  scheme: HashScheme;
};

export function isHashScheme(value: string): value is HashScheme {
  return (HASH_SCHEMES as readonly string[]).includes(value);
}

const DUMMY_PASSWORD = 'dummy-password-for-timing';

export class CredentialHasher {
  private readonly hashers: Record<HashScheme, PasswordHasher>;
  private dummyHash: Promise<string> | null = null;

  constructor(opts: { bcryptCost: number; hashers?: Partial<Record<HashScheme, PasswordHasher>> }) {
    this.hashers = {
      legacy: opts.hashers?.legacy ?? new LegacySha256PasswordHasher(),
      bcrypt: opts.hashers?.bcrypt ?? new BcryptPasswordHasher({ cost: opts.bcryptCost }),
    };
  }

  async hash(plain: string): Promise<HashedCredential> {
    const hash = await this.hashers[CURRENT_HASH_SCHEME].hash(plain);
    return { hash, scheme: CURRENT_HASH_SCHEME };
  }

  async verify(plain: string, storedHash: string, scheme: HashScheme): Promise<boolean> {
    return this.hashers[scheme].verify(plain, storedHash);
  }

  needsMigration(scheme: HashScheme): boolean {
    return scheme !== CURRENT_HASH_SCHEME;
  }

  /**
   * Runs one current-scheme comparison that always fails.
   * Login calls this for unknown identities so they cost the same as a wrong password.
   */
  async verifyDummy(plain: string): Promise<void> {
    if (!this.dummyHash) {
      this.dummyHash = this.hashers[CURRENT_HASH_SCHEME].hash(DUMMY_PASSWORD);
    }
    const hash = await this.dummyHash;
    await this.hashers[CURRENT_HASH_SCHEME].verify(plain, hash);
  }
}
