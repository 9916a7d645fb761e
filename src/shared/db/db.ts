/**
 * src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 *
 * HOW TO USE:
 * - const db = createDb(config.databaseUrl)
 * - Stores take a DbExecutor so they work with the root db and a transaction alike.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './database.types';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" stores should accept.
 * Works for both the main DB and transactions.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
