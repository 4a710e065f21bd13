/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev.
 * - TS migrations live in: src/shared/db/migrations
 * - We run this file with `tsx`, so the provider can import `.ts` migrations.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import 'dotenv/config';

import path from 'node:path';
import { promises as fs } from 'node:fs';

import { FileMigrationProvider, Migrator } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  // Point directly at the SOURCE migrations folder (no dist/path confusion).
  const migrationFolder = path.join(process.cwd(), 'src/shared/db/migrations');

  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({ fs, path, migrationFolder }),
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migration.failed', { err: error });
    process.exit(1);
  }

  logger.info('migration.up_to_date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migration.fatal', { err });
  process.exit(1);
});
