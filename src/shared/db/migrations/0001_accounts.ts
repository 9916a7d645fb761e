/**
 * src/shared/db/migrations/0001_accounts.ts
 *
 * WHY:
 * - One row per account, keyed by the normalized email.
 * - `hash_scheme` tags the stored hash format (legacy | bcrypt).
 * - `version` backs optimistic updates (update ... where version = ?).
 *
 * HOW TO USE:
 * - npm run db:migrate
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('accounts')
    .addColumn('email', 'text', (col) => col.primaryKey())
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('hash_scheme', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('last_login_at', 'timestamptz')
    .addColumn('settings', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('version', 'integer', (col) => col.notNull().defaultTo(1))
    .execute();

  await sql`
    ALTER TABLE accounts
    ADD CONSTRAINT accounts_hash_scheme_check
    CHECK (hash_scheme IN ('legacy', 'bcrypt'));
  `.execute(db);

  await sql`
    ALTER TABLE accounts
    ADD CONSTRAINT accounts_email_normalized_check
    CHECK (email = lower(btrim(email)));
  `.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('accounts').ifExists().execute();
}
