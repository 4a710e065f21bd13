/**
 * backend/src/modules/identities/field-errors.ts
 *
 * WHY:
 * - Field-level validation problems are data attached to a synthesized subject,
 *   never exceptions. The caller decides how to render them.
 *
 * RULES:
 * - One reason per field; a later add() for the same field replaces it.
 * - Insertion order is kept (it follows the required-field order).
 */

import type { FieldErrorReason, IdentityField } from './identity.types';

export class FieldErrors {
  private readonly entries = new Map<IdentityField, FieldErrorReason>();

  add(field: IdentityField, reason: FieldErrorReason): void {
    this.entries.set(field, reason);
  }

  on(field: IdentityField): FieldErrorReason | undefined {
    return this.entries.get(field);
  }

  get isEmpty(): boolean {
    return this.entries.size === 0;
  }

  get size(): number {
    return this.entries.size;
  }

  get fields(): IdentityField[] {
    return Array.from(this.entries.keys());
  }

  toJSON(): Partial<Record<IdentityField, FieldErrorReason>> {
    return Object.fromEntries(this.entries);
  }
}
