import { describe, it, expect } from 'vitest';
import {
  conditionEntries,
  sanitizeAuthConditions,
  toScalarString,
} from '../../../src/modules/identities/helpers/sanitize-auth-conditions';
import { isBlank } from '../../../src/modules/identities/helpers/is-blank';

describe('sanitizeAuthConditions', () => {
  it('coerces an array value to a single string', () => {
    const out = sanitizeAuthConditions({ email: ['a', 'b'] });
    expect(out).toEqual({ email: '["a","b"]' });
    expect(typeof out.email).toBe('string');
  });

  it('coerces operator-shaped objects to their JSON text', () => {
    expect(sanitizeAuthConditions({ email: { $ne: null } })).toEqual({ email: '{"$ne":null}' });
  });

  it('stringifies scalars and maps null/undefined to empty string', () => {
    expect(
      sanitizeAuthConditions({ email: 42, username: true, resetPasswordToken: null }),
    ).toEqual({ email: '42', username: 'true', resetPasswordToken: '' });
  });

  it('leaves strings untouched', () => {
    expect(sanitizeAuthConditions({ email: ' Alice@Example.com ' })).toEqual({
      email: ' Alice@Example.com ',
    });
  });

  it('drops keys that are not identity fields', () => {
    const input: Record<string, unknown> = { email: 'a@example.com', admin: true };
    expect(sanitizeAuthConditions(input)).toEqual({ email: 'a@example.com' });
  });

  it('does not throw on circular structures', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(toScalarString(circular)).toBe('[object Object]');
  });

  it('returns a new object', () => {
    const input = { email: 'a@example.com' };
    expect(sanitizeAuthConditions(input)).not.toBe(input);
  });
});

describe('conditionEntries', () => {
  it('keeps insertion order', () => {
    expect(conditionEntries({ username: 'alice', email: 'a@example.com' })).toEqual([
      ['username', 'alice'],
      ['email', 'a@example.com'],
    ]);
  });
});

describe('isBlank', () => {
  it.each([undefined, null, false, '', '   ', '\t\n', [], {}])('treats %j as blank', (value) => {
    expect(isBlank(value)).toBe(true);
  });

  it.each(['x', ' x ', 0, true, ['a'], { a: 1 }])('treats %j as present', (value) => {
    expect(isBlank(value)).toBe(false);
  });
});
