/**
 * backend/src/modules/identities/identity.types.ts
 *
 * WHY:
 * - Domain types for the authenticatable core.
 * - An identity is the subject an authentication strategy tries to sign in.
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - Field names here are the only names callers may resolve or issue tokens by;
 *   the DAL maps each one to its column through an allow-list.
 */

import type { FieldErrors } from './field-errors';

export const AUTHENTICATION_KEYS = ['email', 'username'] as const;
export const TOKEN_FIELDS = ['resetPasswordToken', 'confirmationToken'] as const;
export const IDENTITY_FIELDS = [...AUTHENTICATION_KEYS, ...TOKEN_FIELDS] as const;

/** A field that can locate an identity before credentials are checked. */
export type AuthenticationKey = (typeof AUTHENTICATION_KEYS)[number];

/** A field holding an out-of-band token (reset link, confirmation link). */
export type TokenField = (typeof TOKEN_FIELDS)[number];

export type IdentityField = (typeof IDENTITY_FIELDS)[number];

/** Sanitized lookup values: always scalar strings by the time they reach storage. */
export type AuthConditions = Partial<Record<IdentityField, string>>;

/** Untrusted input (form body, decoded header). Values may be anything. */
export type RawAttributes = Readonly<Record<string, unknown>>;

/**
 * 'invalid'   — value supplied but no identity matched.
 * 'blank'     — value missing entirely.
 * 'not_found' — caller-chosen reason for token request flows.
 */
export type FieldErrorReason = 'invalid' | 'blank' | 'not_found';

export type InactiveReason = 'inactive' | 'unconfirmed' | 'locked';

export type IdentityId = string;

export type IdentitySubject = {
  /** null while the subject is synthesized in memory (never persisted by the core). */
  id: IdentityId | null;
  attributes: AuthConditions;
  passwordHash: string | null;

  confirmedAt: Date | null;
  lockedAt: Date | null;
  createdAt: Date | null;

  errors: FieldErrors;
};

export type PersistedIdentity = IdentitySubject & { id: IdentityId };

export function isPersisted(subject: IdentitySubject): subject is PersistedIdentity {
  return subject.id !== null;
}

export function isIdentityField(value: string): value is IdentityField {
  return IDENTITY_FIELDS.some((field) => field === value);
}
