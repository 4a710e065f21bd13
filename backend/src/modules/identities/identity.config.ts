/**
 * backend/src/modules/identities/identity.config.ts
 *
 * WHY:
 * - Each identity kind (e.g. "user") carries its own authentication settings:
 *   which keys locate it, which channels strategies may use, which feature
 *   preconditions apply.
 * - Built once at startup and passed into the core by reference; frozen so
 *   concurrent requests only ever read it.
 */

import type { AuthenticationKey } from './identity.types';
import type { StrategyGateSetting } from './policies/strategy-gate.policy';
import type { EligibilityStage } from './policies/eligibility-gate.policy';
import { confirmableStage } from './policies/confirmable-stage.policy';
import { lockableStage } from './policies/lockable-stage.policy';

export const IDENTITY_FEATURES = ['confirmable', 'lockable'] as const;
export type IdentityFeature = (typeof IDENTITY_FEATURES)[number];

export type IdentityKindConfig = Readonly<{
  name: string;
  authenticationKeys: readonly AuthenticationKey[];
  /** Keys that locate the identity for a password reset request. */
  resetPasswordKeys: readonly AuthenticationKey[];
  /** Keys that locate the identity for a confirmation resend request. */
  confirmationKeys: readonly AuthenticationKey[];
  httpAuthenticatable: StrategyGateSetting;
  paramsAuthenticatable: StrategyGateSetting;
  features: readonly IdentityFeature[];
  allowUnconfirmedForMs: number;
  unlockAfterMs: number | null;
  tokenMaxAttempts: number;
}>;

function freezeSetting(setting: StrategyGateSetting): StrategyGateSetting {
  return typeof setting === 'boolean' ? setting : Object.freeze([...setting]);
}

function freezeKeys(keys: readonly AuthenticationKey[]): readonly AuthenticationKey[] {
  return Object.freeze(Array.from(new Set(keys)));
}

export function defineIdentityKind(config: IdentityKindConfig): IdentityKindConfig {
  return Object.freeze({
    ...config,
    authenticationKeys: freezeKeys(config.authenticationKeys),
    resetPasswordKeys: freezeKeys(config.resetPasswordKeys),
    confirmationKeys: freezeKeys(config.confirmationKeys),
    httpAuthenticatable: freezeSetting(config.httpAuthenticatable),
    paramsAuthenticatable: freezeSetting(config.paramsAuthenticatable),
    features: Object.freeze(Array.from(new Set(config.features))),
  });
}

/** Feature stages in the order the kind lists them; the gate appends the base stage. */
export function buildEligibilityStages(
  kind: IdentityKindConfig,
  now?: () => Date,
): EligibilityStage[] {
  return kind.features.map((feature) => {
    switch (feature) {
      case 'confirmable':
        return confirmableStage({ allowUnconfirmedForMs: kind.allowUnconfirmedForMs, now });
      case 'lockable':
        return lockableStage({ unlockAfterMs: kind.unlockAfterMs, now });
    }
  });
}
