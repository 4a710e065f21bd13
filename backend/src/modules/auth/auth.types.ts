/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Response and parameter types for the auth module's strategies.
 *
 * RULES:
 * - Never include raw passwords, hashes, or tokens in response types.
 */

import type { StrategyChannel } from '../identities/policies/strategy-gate.policy';

export type { StrategyChannel };

export type AuthResult = {
  status: 'AUTHENTICATED';
  strategy: string;
  channel: StrategyChannel;
  identity: {
    id: string;
    email: string | null;
    username: string | null;
  };
};

/** Which out-of-band token a request asks for. */
export type IdentityTokenPurpose = 'reset_password' | 'confirmation';
