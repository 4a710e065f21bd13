/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Credential verification is delegated: the identities core never compares
 *   passwords itself, the auth flow passes a verify callback into the gate.
 * - Flows depend on an interface (DIP), not bcrypt directly.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
