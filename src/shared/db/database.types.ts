/**
 * src/shared/db/database.types.ts
 *
 * WHY:
 * - Kysely table types for the two tables this service owns.
 * - Kept in step with src/shared/db/migrations by hand (two small tables).
 *
 * RULES:
 * - timestamptz columns come back from pg as Date.
 * - `settings` is jsonb: pg parses it on read, we write a JSON string.
 *   Readers must validate it (see accounts DAL).
 */

import type { ColumnType, Generated } from 'kysely';

export interface AccountsTable {
  email: string;
  password_hash: string;
  hash_scheme: string;
  created_at: Date;
  updated_at: Date;
  last_login_at: Date | null;
  settings: ColumnType<unknown, string, string>;
  version: Generated<number>;
}

export interface PasswordResetRequestsTable {
  email: string;
  request_id: string;
  code_hash: string;
  issued_at: Date;
  expires_at: Date;
  consumed_at: Date | null;
}

export interface DB {
  accounts: AccountsTable;
  password_reset_requests: PasswordResetRequestsTable;
}
