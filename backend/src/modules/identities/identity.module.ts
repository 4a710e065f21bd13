/**
 * backend/src/modules/identities/identity.module.ts
 *
 * WHY:
 * - Encapsulates the authenticatable core wiring for one identity kind.
 * - Identities is a support module (no routes of its own); the auth module
 *   consumes resolver, gate, token generator and strategy gates.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { Logger } from '../../shared/logger/logger';
import type { RandomTokenSource } from '../../shared/security/token';
import { generateFriendlyToken } from '../../shared/security/token';
import type { IdentityKindConfig } from './identity.config';
import { buildEligibilityStages } from './identity.config';
import type { IdentityStore, IdentityTokenWriter } from './dal/identity.store';
import { RecordResolver } from './identity.resolver';
import { TokenGenerator } from './identity.token-generator';
import { EligibilityGate } from './policies/eligibility-gate.policy';
import { StrategyGateKeeper } from './policies/strategy-gate.policy';

export type IdentityModule = ReturnType<typeof createIdentityModule>;

export function createIdentityModule(deps: {
  kind: IdentityKindConfig;
  store: IdentityStore & IdentityTokenWriter;
  logger: Logger;
  random?: RandomTokenSource;
  now?: () => Date;
}) {
  const resolver = new RecordResolver(deps.store);

  const eligibility = new EligibilityGate(buildEligibilityStages(deps.kind, deps.now));

  const tokens = new TokenGenerator({
    store: deps.store,
    random: deps.random ?? generateFriendlyToken,
    logger: deps.logger,
    maxAttempts: deps.kind.tokenMaxAttempts,
  });

  const gates = new StrategyGateKeeper({
    httpAuthenticatable: deps.kind.httpAuthenticatable,
    paramsAuthenticatable: deps.kind.paramsAuthenticatable,
  });

  const tokenWriter: IdentityTokenWriter = deps.store;

  return {
    kind: deps.kind,
    resolver,
    eligibility,
    tokens,
    gates,
    tokenWriter,
  };
}
