/**
 * src/modules/accounts/dal/inmem-account.store.ts
 *
 * WHY:
 * - AccountStore for tests and local dev without Postgres.
 *
 * RULES:
 * - Records are cloned on the way in and out so callers cannot mutate stored state.
 * - Each method completes synchronously, which makes create() and update()
 *   atomic with respect to other callers.
 */

import type { AccountStore, NewAccount } from '../account.store';
import type { Account } from '../account.types';

function clone(account: Account): Account {
  return structuredClone(account);
}

export class InMemAccountStore implements AccountStore {
  private readonly accounts = new Map<string, Account>();

  get(email: string): Promise<Account | undefined> {
    const found = this.accounts.get(email);
    return Promise.resolve(found ? clone(found) : undefined);
  }

  create(account: NewAccount): Promise<boolean> {
    if (this.accounts.has(account.email)) return Promise.resolve(false);

    this.accounts.set(account.email, clone({ ...account, version: 1 }));
    return Promise.resolve(true);
  }

  update(account: Account): Promise<Account | undefined> {
    const current = this.accounts.get(account.email);
    if (!current || current.version !== account.version) return Promise.resolve(undefined);

    const next = clone({ ...account, version: current.version + 1 });
    this.accounts.set(account.email, next);
    return Promise.resolve(clone(next));
  }
}
