import { describe, it, expect } from 'vitest';
import {
  StrategyGateKeeper,
  resolveStrategyGate,
} from '../../../src/modules/identities/policies/strategy-gate.policy';

describe('resolveStrategyGate', () => {
  it('returns a boolean setting as-is for any strategy', () => {
    expect(resolveStrategyGate(true, 'database')).toBe(true);
    expect(resolveStrategyGate(true, 'anything')).toBe(true);
    expect(resolveStrategyGate(false, 'database')).toBe(false);
  });

  it('tests membership for a list setting', () => {
    expect(resolveStrategyGate(['database'], 'database')).toBe(true);
    expect(resolveStrategyGate(['database'], 'token')).toBe(false);
    expect(resolveStrategyGate([], 'database')).toBe(false);
  });

  it('defaults to false when unset', () => {
    expect(resolveStrategyGate(undefined, 'database')).toBe(false);
  });
});

describe('StrategyGateKeeper', () => {
  it('keeps the HTTP and params gates independent', () => {
    const gates = new StrategyGateKeeper({
      httpAuthenticatable: ['token'],
      paramsAuthenticatable: true,
    });

    expect(gates.allowsHttp('token')).toBe(true);
    expect(gates.allowsHttp('database')).toBe(false);
    expect(gates.allowsParams('database')).toBe(true);
    expect(gates.allows('http', 'database')).toBe(false);
    expect(gates.allows('params', 'database')).toBe(true);
  });

  it('denies everything when nothing is configured', () => {
    const gates = new StrategyGateKeeper({});
    expect(gates.allowsHttp('database')).toBe(false);
    expect(gates.allowsParams('database')).toBe(false);
  });
});
