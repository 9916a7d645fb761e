/**
 * src/modules/accounts/account.store.ts
 *
 * WHY:
 * - The auth flows and settings service depend on this interface only.
 *   Postgres (Kysely) in production, in-memory for tests and local dev.
 *
 * RULES:
 * - `email` arguments are already normalized.
 * - create() is insert-if-absent: false means the email is taken.
 * - update() is compare-and-swap on `version`: it writes only if the stored
 *   version still equals `account.version`, bumps it, and returns the stored
 *   record. undefined means someone else wrote first (or the row is gone).
 * - Implementations may throw on I/O failure; flows wrap calls in runStoreOp().
 */

import type { Account } from './account.types';

export type NewAccount = Omit<Account, 'version'>;

export interface AccountStore {
  get(email: string): Promise<Account | undefined>;
  create(account: NewAccount): Promise<boolean>;
  update(account: Account): Promise<Account | undefined>;
}
