/**
 * backend/src/modules/identities/helpers/sanitize-auth-conditions.ts
 *
 * WHY:
 * - Lookup values come from untrusted input (JSON bodies, decoded headers).
 * - A structured value (array/object) reaching a query builder can be read as
 *   an operator or a list. Coercing every value to a string closes that vector.
 *
 * RULES:
 * - Normalize, never reject. No error conditions.
 * - Always returns a new object; forward only the returned value to storage.
 */

import type { AuthConditions, IdentityField } from '../identity.types';
import { isIdentityField } from '../identity.types';

export function toScalarString(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      // circular structures
      return Object.prototype.toString.call(value);
    }
  }
  return String(value);
}

export function sanitizeAuthConditions(
  fields: Readonly<Partial<Record<IdentityField, unknown>>>,
): AuthConditions {
  const out: AuthConditions = {};
  for (const [key, value] of Object.entries(fields)) {
    if (!isIdentityField(key)) continue;
    out[key] = toScalarString(value);
  }
  return out;
}

/** Typed, order-preserving view of a conditions object. */
export function conditionEntries(conditions: AuthConditions): Array<[IdentityField, string]> {
  const entries: Array<[IdentityField, string]> = [];
  for (const [key, value] of Object.entries(conditions)) {
    if (isIdentityField(key) && value !== undefined) entries.push([key, value]);
  }
  return entries;
}
