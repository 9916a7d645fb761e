/**
 * src/modules/accounts/modify-account.ts
 *
 * WHY:
 * - Every account write is read → mutate → compare-and-swap. Two writers on the
 *   same account (a login migrating the hash, a settings save) must not lose
 *   each other's changes.
 *
 * HOW TO USE:
 * - const updated = await modifyAccount(store, email, (current) => ({ ...current, lastLoginAt: now }))
 * - null → the account does not exist.
 *
 * RULES:
 * - `mutate` must be pure: it can run more than once.
 * - After MAX_ATTEMPTS version conflicts we give up with StoreUnavailableError.
 */

import { StoreUnavailableError } from '../../shared/db/store-timeout';
import type { AccountStore } from './account.store';
import type { Account } from './account.types';

export const MODIFY_ACCOUNT_MAX_ATTEMPTS = 3;

export async function modifyAccount(
  store: AccountStore,
  email: string,
  mutate: (current: Account) => Account,
): Promise<Account | null> {
  for (let attempt = 1; attempt <= MODIFY_ACCOUNT_MAX_ATTEMPTS; attempt++) {
    const current = await store.get(email);
    if (!current) return null;

    const next = mutate(current);
    const saved = await store.update({ ...next, email: current.email, version: current.version });
    if (saved) return saved;
  }

  throw new StoreUnavailableError('accounts.modify', {
    cause: new Error(`version conflict after ${MODIFY_ACCOUNT_MAX_ATTEMPTS} attempts`),
  });
}
