/**
 * backend/src/modules/identities/identity.token-generator.ts
 *
 * WHY:
 * - Reset and confirmation links need a token no other identity holds for
 *   the same field.
 *
 * HOW IT WORKS:
 * - Draw a candidate from the strong random source, ask the store whether any
 *   identity already holds it, return the first free one.
 * - The loop is bounded. Hitting the bound means the store (or the random
 *   source) is broken: we throw TokenGenerationExhaustedError and let it
 *   propagate instead of spinning forever.
 *
 * RULES:
 * - The caller persists the token; this class never writes.
 * - Never log candidate values.
 */

import type { Logger } from '../../shared/logger/logger';
import type { RandomTokenSource } from '../../shared/security/token';
import { TokenGenerationExhaustedError } from '../../shared/security/token';
import type { TokenField } from './identity.types';
import type { IdentityStore } from './dal/identity.store';

export const DEFAULT_TOKEN_MAX_ATTEMPTS = 1000;

export class TokenGenerator {
  private readonly maxAttempts: number;

  constructor(
    private readonly deps: {
      store: Pick<IdentityStore, 'existsBy'>;
      random: RandomTokenSource;
      logger: Logger;
      maxAttempts?: number;
    },
  ) {
    this.maxAttempts = Math.max(1, deps.maxAttempts ?? DEFAULT_TOKEN_MAX_ATTEMPTS);
  }

  async generate(field: TokenField): Promise<string> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const candidate = this.deps.random();
      const taken = await this.deps.store.existsBy(field, candidate);
      if (!taken) return candidate;

      this.deps.logger.warn('identity.token.collision', {
        flow: 'identity.token',
        field,
        attempt,
      });
    }

    throw new TokenGenerationExhaustedError(field, this.maxAttempts);
  }
}
