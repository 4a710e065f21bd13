/**
 * backend/src/modules/identities/dal/identity.store.ts
 *
 * WHY:
 * - The core only needs a narrow find/exists contract from storage.
 * - Resolver and TokenGenerator depend on these interfaces, so tests run
 *   against an in-process store and production against Postgres.
 *
 * RULES:
 * - findFirst receives sanitized conditions only (see sanitize-auth-conditions).
 * - existsBy must be strongly consistent with a later assignToken for the same
 *   field; the DB unique constraint is the backstop for concurrent requests.
 */

import type {
  AuthConditions,
  IdentityField,
  IdentityId,
  IdentitySubject,
  TokenField,
} from '../identity.types';

export interface IdentityStore {
  findFirst(conditions: AuthConditions): Promise<IdentitySubject | undefined>;
  existsBy(field: IdentityField, value: string): Promise<boolean>;
}

export interface IdentityTokenWriter {
  assignToken(params: {
    identityId: IdentityId;
    field: TokenField;
    token: string;
    sentAt: Date;
  }): Promise<void>;
}
