/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Token generation should be consistent and strong across the system.
 * - We generate raw tokens that are safe for URLs (reset / confirmation links).
 *
 * HOW TO USE:
 * - const token = generateFriendlyToken()
 * - Uniqueness against stored tokens is the TokenGenerator's job, not this file's.
 */

import { randomBytes } from 'node:crypto';

/** Strong random source contract consumed by the identities core. */
export type RandomTokenSource = () => string;

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}

/**
 * 15 random bytes -> 20 URL-safe characters.
 * Short enough for an email link, 120 bits of entropy.
 */
export const generateFriendlyToken: RandomTokenSource = () => generateSecureToken(15);

/**
 * Raised when every candidate drawn for a token field collided with a stored value.
 * Indicates a misbehaving store (or a broken random source); fatal for the request.
 */
export class TokenGenerationExhaustedError extends Error {
  constructor(
    public readonly field: string,
    public readonly attempts: number,
  ) {
    super(`Could not generate a unique token for "${field}" after ${attempts} attempts`);
    this.name = 'TokenGenerationExhaustedError';
  }
}
