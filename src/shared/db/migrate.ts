/**
 * src/shared/db/migrate.ts
 *
 * WHY:
 * - Brings the database to the latest schema.
 *
 * HOW TO USE:
 * - npm run db:migrate            (migrate to latest)
 * - npm run db:migrate -- down    (roll back one migration)
 */

import 'dotenv/config';

import { Migrator } from 'kysely';

import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';
import { createDb } from './db';
import { migrations } from './migrations';

async function runMigrations(direction: 'latest' | 'down'): Promise<void> {
  const config = buildConfig();
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required to run migrations');
  }

  const db = createDb(config.databaseUrl);
  const migrator = new Migrator({
    db,
    provider: { getMigrations: () => Promise.resolve(migrations) },
  });

  const { error, results } =
    direction === 'down' ? await migrator.migrateDown() : await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName, direction: r.direction });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName, direction: r.direction });
  });

  await db.destroy();

  if (error) {
    throw error;
  }

  logger.info('migration.up_to_date');
}

const direction = process.argv[2] === 'down' ? 'down' : 'latest';

runMigrations(direction).catch((err: unknown) => {
  logger.error('migration.failed', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exitCode = 1;
});
