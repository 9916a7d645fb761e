/**
 * src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Current password scheme. The salt and cost are embedded in the hash string,
 *   so verification needs nothing besides the stored value.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 *
 * RULES:
 * - Tests pass a low cost (4) to keep suites fast. Production uses config.BCRYPT_COST.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

const MIN_COST = 4;
const MAX_COST = 15;

export class BcryptPasswordHasher implements PasswordHasher {
  readonly cost: number;

  constructor(opts?: { cost?: number }) {
    const cost = opts?.cost ?? 12;
    if (!Number.isInteger(cost) || cost < MIN_COST || cost > MAX_COST) {
      throw new Error(`BcryptPasswordHasher: cost must be an integer in [${MIN_COST}, ${MAX_COST}]`);
    }
    this.cost = cost;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    // bcrypt.compare rejects on a malformed hash; treat that as a mismatch.
    if (!hash.startsWith('$2')) return false;
    return bcrypt.compare(plain, hash);
  }
}
