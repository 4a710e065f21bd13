/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - The database strategy's sign-in flow (modules/auth/flows/sign-in) checks
 *   the submitted password against the identity's stored hash through this
 *   adapter, after the eligibility gate lets the identity through.
 * - Cost comes from BCRYPT_COST (app/config.ts); tests build it at cost 4.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('test-password')
 * - const ok = await hasher.verify('test-password', hash)
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts: { cost: number }) {
    this.cost = opts.cost;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
