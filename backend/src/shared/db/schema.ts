/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely table interfaces for the tables created by src/shared/db/migrations.
 * - Keep in lock-step with migrations: a new column lands in both places.
 *
 * RULES:
 * - snake_case here only; domain types live in the modules.
 */

import type { ColumnType, Generated } from 'kysely';

type Timestamp = ColumnType<Date, Date | string, Date | string>;

export interface IdentitiesTable {
  id: Generated<string>;
  email: string;
  username: string | null;
  password_hash: string | null;

  reset_password_token: string | null;
  reset_password_sent_at: Timestamp | null;

  confirmation_token: string | null;
  confirmation_sent_at: Timestamp | null;
  confirmed_at: Timestamp | null;

  locked_at: Timestamp | null;

  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface DB {
  identities: IdentitiesTable;
}
