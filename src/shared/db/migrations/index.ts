/**
 * src/shared/db/migrations/index.ts
 *
 * Ordered migration list for Kysely's Migrator. Add new files here.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_accounts';
import * as m0002 from './0002_password_reset_requests';

export const migrations: Record<string, Migration> = {
  '0001_accounts': m0001,
  '0002_password_reset_requests': m0002,
};
