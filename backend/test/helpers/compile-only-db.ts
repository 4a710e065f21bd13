import {
  DummyDriver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
} from 'kysely';
import type { CompiledQuery } from 'kysely';
import type { DB } from '../../src/shared/db/schema';

/**
 * WHY:
 * - Compiles (and "executes", returning no rows) Postgres queries without a server.
 * - Lets DAL tests assert on the exact SQL + parameters the repo sends.
 */
export function createCompileOnlyDb(): { db: Kysely<DB>; executed: CompiledQuery[] } {
  const executed: CompiledQuery[] = [];

  const db = new Kysely<DB>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => new DummyDriver(),
      createIntrospector: (kysely) => new PostgresIntrospector(kysely),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
    log: (event) => {
      if (event.level === 'query') executed.push(event.query);
    },
  });

  return { db, executed };
}
