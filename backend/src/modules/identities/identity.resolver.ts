/**
 * backend/src/modules/identities/identity.resolver.ts
 *
 * WHY:
 * - Sign-in and token-request forms hand us partially trusted attributes.
 * - We either resolve the identity they point at, or hand back a transient
 *   subject whose FieldErrors say what was wrong — as data, never thrown.
 *
 * RULES:
 * - Storage is only queried when every required field has a non-blank value.
 * - Lookup values are sanitized before they reach storage.
 * - When lookup fails, EVERY required field is marked with the error reason,
 *   not only the one that was wrong. Marking a subset would tell a caller
 *   which key matched (credential enumeration).
 * - The transient subject is never persisted here.
 */

import { FieldErrors } from './field-errors';
import type {
  FieldErrorReason,
  IdentityField,
  IdentitySubject,
  RawAttributes,
} from './identity.types';
import { isBlank } from './helpers/is-blank';
import { sanitizeAuthConditions } from './helpers/sanitize-auth-conditions';
import type { IdentityStore } from './dal/identity.store';

type CandidateFields = Partial<Record<IdentityField, unknown>>;

export function buildTransientIdentity(): IdentitySubject {
  return {
    id: null,
    attributes: {},
    passwordHash: null,
    confirmedAt: null,
    lockedAt: null,
    createdAt: null,
    errors: new FieldErrors(),
  };
}

export class RecordResolver {
  constructor(private readonly store: Pick<IdentityStore, 'findFirst'>) {}

  async findForAuthentication(conditions: CandidateFields): Promise<IdentitySubject | undefined> {
    return this.store.findFirst(sanitizeAuthConditions(conditions));
  }

  async resolveOrInitialize(
    required: readonly IdentityField[],
    rawAttributes: RawAttributes,
    errorReason: FieldErrorReason = 'invalid',
  ): Promise<IdentitySubject> {
    const requiredFields = Array.from(new Set(required));

    const supplied: CandidateFields = {};
    for (const field of requiredFields) {
      const value = rawAttributes[field];
      if (!isBlank(value)) supplied[field] = value;
    }

    // An empty required set would mean "first row in the table"; never look that up.
    const complete =
      requiredFields.length > 0 && Object.keys(supplied).length === requiredFields.length;

    if (complete) {
      const found = await this.findForAuthentication(supplied);
      if (found) return found;
    }

    const subject = buildTransientIdentity();
    const values = sanitizeAuthConditions(supplied);

    for (const field of requiredFields) {
      const value = values[field];
      if (value !== undefined) subject.attributes[field] = value;
      subject.errors.add(field, value !== undefined ? errorReason : 'blank');
    }

    return subject;
  }

  /** Single-field form, used by token request flows (e.g. "email me a reset link"). */
  async findOrInitializeWithErrorBy(
    field: IdentityField,
    value: unknown,
    errorReason: FieldErrorReason = 'invalid',
  ): Promise<IdentitySubject> {
    return this.resolveOrInitialize([field], { [field]: value }, errorReason);
  }
}
