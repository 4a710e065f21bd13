/**
 * backend/src/modules/identities/index.ts
 *
 * WHY:
 * - Define the public surface of the identities core.
 * - Prevent cross-module coupling via deep imports into /dal or /policies.
 */

export { createIdentityModule } from './identity.module';
export type { IdentityModule } from './identity.module';
export { defineIdentityKind, IDENTITY_FEATURES } from './identity.config';
export type { IdentityFeature, IdentityKindConfig } from './identity.config';
export { IdentityRepo } from './dal/identity.repo';
export type { IdentityStore, IdentityTokenWriter } from './dal/identity.store';
export { isPersisted, AUTHENTICATION_KEYS } from './identity.types';
export type {
  AuthenticationKey,
  FieldErrorReason,
  IdentitySubject,
  InactiveReason,
  PersistedIdentity,
  RawAttributes,
  TokenField,
} from './identity.types';
