/**
 * src/modules/auth/helpers/build-auth-result.ts
 *
 * RULES:
 * - Pure function. No I/O.
 * - Only lookup keys leave the module; never the password hash or tokens.
 */

import type { PersistedIdentity } from '../../identities';
import type { AuthResult, StrategyChannel } from '../auth.types';

export function buildAuthResult(params: {
  strategy: string;
  channel: StrategyChannel;
  identity: PersistedIdentity;
}): AuthResult {
  const { strategy, channel, identity } = params;

  return {
    status: 'AUTHENTICATED',
    strategy,
    channel,
    identity: {
      id: identity.id,
      email: identity.attributes.email ?? null,
      username: identity.attributes.username ?? null,
    },
  };
}
