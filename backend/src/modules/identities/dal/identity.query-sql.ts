/**
 * backend/src/modules/identities/dal/identity.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for identities (raw SQL access).
 * - Field → column mapping is an explicit allow-list; a field name never
 *   becomes SQL text on its own.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - Builders are exported separately so the SQL shape is testable without a DB.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { IdentitiesTable } from '../../../shared/db/schema';
import type { AuthConditions, IdentityField } from '../identity.types';
import { conditionEntries } from '../helpers/sanitize-auth-conditions';

export type IdentityRow = Selectable<IdentitiesTable>;

export const IDENTITY_FIELD_COLUMNS = {
  email: 'email',
  username: 'username',
  resetPasswordToken: 'reset_password_token',
  confirmationToken: 'confirmation_token',
} as const satisfies Record<IdentityField, keyof IdentitiesTable>;

export function buildSelectIdentityByConditions(db: DbExecutor, conditions: AuthConditions) {
  let query = db.selectFrom('identities').selectAll();

  for (const [field, value] of conditionEntries(conditions)) {
    query = query.where(IDENTITY_FIELD_COLUMNS[field], '=', value);
  }

  return query.limit(1);
}

export function buildSelectIdentityIdBy(db: DbExecutor, field: IdentityField, value: string) {
  return db
    .selectFrom('identities')
    .select('id')
    .where(IDENTITY_FIELD_COLUMNS[field], '=', value)
    .limit(1);
}

export async function selectIdentityByConditionsSql(
  db: DbExecutor,
  conditions: AuthConditions,
): Promise<IdentityRow | undefined> {
  return buildSelectIdentityByConditions(db, conditions).executeTakeFirst();
}

export async function selectIdentityIdBySql(
  db: DbExecutor,
  field: IdentityField,
  value: string,
): Promise<{ id: string } | undefined> {
  return buildSelectIdentityIdBy(db, field, value).executeTakeFirst();
}
