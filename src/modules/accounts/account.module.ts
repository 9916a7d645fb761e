/**
 * src/modules/accounts/account.module.ts
 *
 * WHY:
 * - Accounts is a support module (no routes of its own).
 *   Auth and settings consume its store.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { DbExecutor } from '../../shared/db/db';
import type { AccountStore } from './account.store';
import { InMemAccountStore } from './dal/inmem-account.store';
import { KyselyAccountStore } from './dal/kysely-account.store';

export type AccountModule = ReturnType<typeof createAccountModule>;

export function createAccountModule(deps: { db: DbExecutor | null; accountStore?: AccountStore }) {
  const accountStore: AccountStore =
    deps.accountStore ?? (deps.db ? new KyselyAccountStore(deps.db) : new InMemAccountStore());

  return {
    accountStore,
  };
}
