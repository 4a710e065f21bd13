/**
 * backend/src/modules/identities/queries/identity.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into IdentitySubject domain values.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { FieldErrors } from '../field-errors';
import type { AuthConditions, IdentityField, IdentitySubject } from '../identity.types';
import { selectIdentityByConditionsSql, selectIdentityIdBySql } from '../dal/identity.query-sql';
import type { IdentityRow } from '../dal/identity.query-sql';

export function toIdentitySubject(row: IdentityRow): IdentitySubject {
  const attributes: AuthConditions = { email: row.email };
  if (row.username !== null) attributes.username = row.username;
  if (row.reset_password_token !== null) attributes.resetPasswordToken = row.reset_password_token;
  if (row.confirmation_token !== null) attributes.confirmationToken = row.confirmation_token;

  return {
    id: row.id,
    attributes,
    passwordHash: row.password_hash,
    confirmedAt: row.confirmed_at,
    lockedAt: row.locked_at,
    createdAt: row.created_at,
    errors: new FieldErrors(),
  };
}

export async function findIdentityByConditions(
  db: DbExecutor,
  conditions: AuthConditions,
): Promise<IdentitySubject | undefined> {
  const row = await selectIdentityByConditionsSql(db, conditions);
  if (!row) return undefined;
  return toIdentitySubject(row);
}

export async function identityExistsBy(
  db: DbExecutor,
  field: IdentityField,
  value: string,
): Promise<boolean> {
  const row = await selectIdentityIdBySql(db, field, value);
  return row !== undefined;
}
