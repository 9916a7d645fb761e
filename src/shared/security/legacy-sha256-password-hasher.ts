/**
 * src/shared/security/legacy-sha256-password-hasher.ts
 *
 * WHY:
 * - Accounts created before bcrypt stored an unsalted SHA-256 hex digest.
 * - We must still verify them so the login flow can migrate each one to bcrypt.
 *
 * RULES:
 * - verify() only. New hashes are never produced in this format outside tests.
 * - Digest comparison is constant-time.
 */

import { createHash } from 'node:crypto';

import type { PasswordHasher } from './password-hasher';
import { safeEqualHex } from './safe-compare';

function sha256Hex(plain: string): string {
  return createHash('sha256').update(plain, 'utf8').digest('hex');
}

export class LegacySha256PasswordHasher implements PasswordHasher {
  /**
   * Produces a legacy digest. Only seeds and tests that simulate pre-migration
   * records call this.
   */
  hash(plain: string): Promise<string> {
    return Promise.resolve(sha256Hex(plain));
  }

  verify(plain: string, hash: string): Promise<boolean> {
    return Promise.resolve(safeEqualHex(sha256Hex(plain), hash.toLowerCase()));
  }
}
