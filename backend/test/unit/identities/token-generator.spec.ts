import { describe, it, expect, vi } from 'vitest';
import { TokenGenerator } from '../../../src/modules/identities/identity.token-generator';
import {
  TokenGenerationExhaustedError,
  generateFriendlyToken,
} from '../../../src/shared/security/token';
import { logger } from '../../../src/shared/logger/logger';
import { InMemIdentityStore } from '../../helpers/inmem-identity-store';

function sequence(...values: string[]) {
  let i = 0;
  return vi.fn(() => values[Math.min(i++, values.length - 1)] ?? '');
}

describe('TokenGenerator', () => {
  it('returns the first candidate no identity holds', async () => {
    const store = new InMemIdentityStore();
    store.insert({ email: 'alice@example.com', resetPasswordToken: 'token-taken' });
    const existsBy = vi.spyOn(store, 'existsBy');
    const random = sequence('token-taken', 'token-free');

    const tokens = new TokenGenerator({ store, random, logger });
    const token = await tokens.generate('resetPasswordToken');

    expect(token).toBe('token-free');
    expect(random).toHaveBeenCalledTimes(2);
    expect(existsBy).toHaveBeenNthCalledWith(1, 'resetPasswordToken', 'token-taken');
    expect(existsBy).toHaveBeenNthCalledWith(2, 'resetPasswordToken', 'token-free');
  });

  it('checks uniqueness per field', async () => {
    const store = new InMemIdentityStore();
    store.insert({ email: 'alice@example.com', confirmationToken: 'shared-value' });

    const tokens = new TokenGenerator({ store, random: () => 'shared-value', logger });

    await expect(tokens.generate('resetPasswordToken')).resolves.toBe('shared-value');
  });

  it('gives up after maxAttempts with a typed error', async () => {
    const store = { existsBy: vi.fn(() => Promise.resolve(true)) };
    const random = vi.fn(() => 'always-taken');

    const tokens = new TokenGenerator({ store, random, logger, maxAttempts: 5 });
    const err = await tokens.generate('confirmationToken').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TokenGenerationExhaustedError);
    expect(err).toMatchObject({ field: 'confirmationToken', attempts: 5 });
    expect(random).toHaveBeenCalledTimes(5);
    expect(store.existsBy).toHaveBeenCalledTimes(5);
  });

  it('defaults to 1000 attempts', async () => {
    const store = { existsBy: vi.fn(() => Promise.resolve(true)) };
    const tokens = new TokenGenerator({ store, random: () => 'x', logger });

    await expect(tokens.generate('resetPasswordToken')).rejects.toMatchObject({ attempts: 1000 });
    expect(store.existsBy).toHaveBeenCalledTimes(1000);
  });

  it('logs each collision without the candidate value', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const store = new InMemIdentityStore();
    store.insert({ email: 'alice@example.com', resetPasswordToken: 'token-taken' });

    const tokens = new TokenGenerator({
      store,
      random: sequence('token-taken', 'token-free'),
      logger,
    });
    await tokens.generate('resetPasswordToken');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('identity.token.collision', {
      flow: 'identity.token',
      field: 'resetPasswordToken',
      attempt: 1,
    });
  });

  it('issues pairwise distinct tokens under concurrent calls', async () => {
    const store = new InMemIdentityStore();
    store.insert({ email: 'alice@example.com', resetPasswordToken: 'pre-existing-token' });
    const tokens = new TokenGenerator({ store, random: generateFriendlyToken, logger });

    const issued = await Promise.all(
      Array.from({ length: 50 }, () => tokens.generate('resetPasswordToken')),
    );

    expect(new Set(issued).size).toBe(50);
    expect(issued).not.toContain('pre-existing-token');
  });
});

describe('generateFriendlyToken', () => {
  it('produces 20 URL-safe characters', () => {
    expect(generateFriendlyToken()).toMatch(/^[A-Za-z0-9_-]{20}$/);
  });
});
