import { describe, it, expect } from 'vitest';
import {
  buildEligibilityStages,
  defineIdentityKind,
} from '../../../src/modules/identities/identity.config';
import type { IdentityKindConfig } from '../../../src/modules/identities/identity.config';

const BASE: IdentityKindConfig = {
  name: 'user',
  authenticationKeys: ['email', 'email', 'username'],
  resetPasswordKeys: ['email'],
  confirmationKeys: ['username', 'username'],
  httpAuthenticatable: ['database'],
  paramsAuthenticatable: true,
  features: ['lockable', 'confirmable'],
  allowUnconfirmedForMs: 0,
  unlockAfterMs: null,
  tokenMaxAttempts: 10,
};

describe('defineIdentityKind', () => {
  it('freezes the config and its lists', () => {
    const kind = defineIdentityKind(BASE);

    expect(Object.isFrozen(kind)).toBe(true);
    expect(Object.isFrozen(kind.authenticationKeys)).toBe(true);
    expect(Object.isFrozen(kind.httpAuthenticatable)).toBe(true);
    expect(Object.isFrozen(kind.features)).toBe(true);
  });

  it('deduplicates key lists preserving order', () => {
    const kind = defineIdentityKind(BASE);

    expect(kind.authenticationKeys).toEqual(['email', 'username']);
    expect(kind.confirmationKeys).toEqual(['username']);
    expect(Object.isFrozen(kind.resetPasswordKeys)).toBe(true);
  });

  it('does not share list instances with the input', () => {
    const httpAuthenticatable = ['database'];
    const kind = defineIdentityKind({ ...BASE, httpAuthenticatable });

    httpAuthenticatable.push('token');
    expect(kind.httpAuthenticatable).toEqual(['database']);
  });
});

describe('buildEligibilityStages', () => {
  it('builds feature stages in the configured order', () => {
    const stages = buildEligibilityStages(defineIdentityKind(BASE));
    expect(stages.map((s) => s.name)).toEqual(['lockable', 'confirmable']);
  });

  it('builds no stages when no feature is enabled', () => {
    expect(buildEligibilityStages(defineIdentityKind({ ...BASE, features: [] }))).toEqual([]);
  });
});
