import { createHash } from 'node:crypto';

import { emptySettings, type NewAccount } from '../../src/modules/accounts';
import { TEST_EPOCH } from './test-clock';

/** Unsalted SHA-256 hex, the format of accounts created before bcrypt. */
export function legacyHash(password: string): string {
  return createHash('sha256').update(password, 'utf8').digest('hex');
}

export function makeAccount(overrides: Partial<NewAccount> = {}): NewAccount {
  return {
    email: 'alice@example.com',
    passwordHash: legacyHash('Passw0rd!'),
    hashScheme: 'legacy',
    createdAt: TEST_EPOCH,
    updatedAt: TEST_EPOCH,
    lastLoginAt: null,
    settings: emptySettings(),
    ...overrides,
  };
}
