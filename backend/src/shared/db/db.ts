/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types come from ./schema (mirrors the migrations).
 *
 * NOTE:
 * - The pg pool connects lazily, so building the app (and the tests that
 *   inject an in-process identity store) never opens a connection.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * Works for both main DB and transactions.
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
