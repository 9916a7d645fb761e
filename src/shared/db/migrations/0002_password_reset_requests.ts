/**
 * src/shared/db/migrations/0002_password_reset_requests.ts
 *
 * WHY:
 * - At most one reset request per account: the primary key is the email, and
 *   issuing a new code overwrites the row.
 * - Only the HMAC of the code is stored.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('password_reset_requests')
    .addColumn('email', 'text', (col) =>
      col.primaryKey().references('accounts.email').onDelete('cascade'),
    )
    .addColumn('request_id', 'uuid', (col) => col.notNull())
    .addColumn('code_hash', 'text', (col) => col.notNull())
    .addColumn('issued_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .addColumn('consumed_at', 'timestamptz')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('password_reset_requests').ifExists().execute();
}
