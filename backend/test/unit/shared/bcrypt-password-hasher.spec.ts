import { describe, it, expect } from 'vitest';
import { BcryptPasswordHasher } from '../../../src/shared/security/bcrypt-password-hasher';

describe('BcryptPasswordHasher', () => {
  const hasher = new BcryptPasswordHasher({ cost: 4 });

  it('hashes at the configured cost', async () => {
    const hash = await hasher.hash('test-password');

    expect(hash.startsWith('$2b$04$')).toBe(true);
  });

  it('verifies the matching password only', async () => {
    const hash = await hasher.hash('test-password');

    await expect(hasher.verify('test-password', hash)).resolves.toBe(true);
    await expect(hasher.verify('wrong-password', hash)).resolves.toBe(false);
  });
});
