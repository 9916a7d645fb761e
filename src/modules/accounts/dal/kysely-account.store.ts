/**
 * src/modules/accounts/dal/kysely-account.store.ts
 *
 * WHY:
 * - AccountStore on Postgres.
 *
 * RULES:
 * - create(): INSERT ... ON CONFLICT (email) DO NOTHING, so two concurrent
 *   registrations of one email produce exactly one row.
 * - update(): UPDATE ... WHERE email = ? AND version = ?, bumping version.
 * - Rows are validated on read (scheme tag, settings jsonb).
 * - No AppError here.
 */

import type { Selectable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { AccountsTable } from '../../../shared/db/database.types';
import { isHashScheme } from '../../../shared/security/credential-hasher';
import type { AccountStore, NewAccount } from '../account.store';
import { AccountSettingsSchema, type Account } from '../account.types';

type AccountRow = Selectable<AccountsTable>;

function toAccount(row: AccountRow): Account {
  if (!isHashScheme(row.hash_scheme)) {
    throw new Error(`accounts: unknown hash_scheme "${row.hash_scheme}"`);
  }

  return {
    email: row.email,
    passwordHash: row.password_hash,
    hashScheme: row.hash_scheme,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastLoginAt: row.last_login_at,
    settings: AccountSettingsSchema.parse(row.settings ?? {}),
    version: row.version,
  };
}

export class KyselyAccountStore implements AccountStore {
  constructor(private readonly db: DbExecutor) {}

  async get(email: string): Promise<Account | undefined> {
    const row = await this.db
      .selectFrom('accounts')
      .selectAll()
      .where('email', '=', email)
      .executeTakeFirst();

    return row ? toAccount(row) : undefined;
  }

  async create(account: NewAccount): Promise<boolean> {
    const row = await this.db
      .insertInto('accounts')
      .values({
        email: account.email,
        password_hash: account.passwordHash,
        hash_scheme: account.hashScheme,
        created_at: account.createdAt,
        updated_at: account.updatedAt,
        last_login_at: account.lastLoginAt,
        settings: JSON.stringify(account.settings),
      })
      .onConflict((oc) => oc.column('email').doNothing())
      .returning(['email'])
      .executeTakeFirst();

    return row !== undefined;
  }

  async update(account: Account): Promise<Account | undefined> {
    const row = await this.db
      .updateTable('accounts')
      .set((eb) => ({
        password_hash: account.passwordHash,
        hash_scheme: account.hashScheme,
        updated_at: account.updatedAt,
        last_login_at: account.lastLoginAt,
        settings: JSON.stringify(account.settings),
        version: eb('version', '+', 1),
      }))
      .where('email', '=', account.email)
      .where('version', '=', account.version)
      .returningAll()
      .executeTakeFirst();

    return row ? toAccount(row) : undefined;
  }
}
