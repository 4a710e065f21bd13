/**
 * backend/src/modules/identities/dal/identity.repo.ts
 *
 * WHY:
 * - Postgres-backed implementation of the storage contract the core consumes.
 * - Reads delegate to queries/; the only write is token assignment.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { AuthConditions, IdentityField, IdentitySubject, TokenField } from '../identity.types';
import { findIdentityByConditions, identityExistsBy } from '../queries/identity.queries';
import type { IdentityStore, IdentityTokenWriter } from './identity.store';

export class IdentityRepo implements IdentityStore, IdentityTokenWriter {
  constructor(private readonly db: DbExecutor) {}

  findFirst(conditions: AuthConditions): Promise<IdentitySubject | undefined> {
    return findIdentityByConditions(this.db, conditions);
  }

  existsBy(field: IdentityField, value: string): Promise<boolean> {
    return identityExistsBy(this.db, field, value);
  }

  async assignToken(params: {
    identityId: string;
    field: TokenField;
    token: string;
    sentAt: Date;
  }): Promise<void> {
    const update =
      params.field === 'resetPasswordToken'
        ? { reset_password_token: params.token, reset_password_sent_at: params.sentAt }
        : { confirmation_token: params.token, confirmation_sent_at: params.sentAt };

    await this.db
      .updateTable('identities')
      .set({ ...update, updated_at: params.sentAt })
      .where('id', '=', params.identityId)
      .execute();
  }
}
