/**
 * backend/src/modules/auth/flows/sign-in/execute-sign-in-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - One flow serves both channels of the database strategy (params body and
 *   HTTP Basic header); only the way attributes are extracted differs.
 *
 * ORDER (matters):
 * 1. Strategy gate for the channel — before any storage access.
 * 2. Resolve the identity from the channel's keys: every authentication key
 *    for params, the first one alone for http (Basic carries a single login).
 * 3. Eligibility gate with the password check as its success callback, so an
 *    inactive identity is rejected with its reason.
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - Unknown identity and wrong password share one error (anti-enumeration).
 * - Never log passwords.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import { isPersisted } from '../../../identities';
import type {
  AuthenticationKey,
  IdentityKindConfig,
  IdentityModule,
  PersistedIdentity,
  RawAttributes,
} from '../../../identities';

import { AuthErrors } from '../../auth.errors';
import { DATABASE_STRATEGY } from '../../auth.constants';
import type { AuthResult, StrategyChannel } from '../../auth.types';
import { buildAuthResult } from '../../helpers/build-auth-result';

export type SignInParams = {
  channel: StrategyChannel;
  attributes: RawAttributes;
  password: string;
  requestId: string;
};

export function requiredKeysFor(
  kind: IdentityKindConfig,
  channel: StrategyChannel,
): readonly AuthenticationKey[] {
  return channel === 'http' ? kind.authenticationKeys.slice(0, 1) : kind.authenticationKeys;
}

async function verifyPassword(
  passwordHasher: PasswordHasher,
  identity: PersistedIdentity,
  password: string,
): Promise<boolean> {
  if (!identity.passwordHash) return false;
  return passwordHasher.verify(password, identity.passwordHash);
}

export async function executeSignInFlow(
  deps: {
    identities: IdentityModule;
    passwordHasher: PasswordHasher;
    logger: Logger;
  },
  params: SignInParams,
): Promise<AuthResult> {
  const strategy = DATABASE_STRATEGY;
  const logMeta = {
    flow: 'auth.sign_in',
    strategy,
    channel: params.channel,
    requestId: params.requestId,
  };

  // ── 1. Channel gate ──────────────────────────────────────
  if (!deps.identities.gates.allows(params.channel, strategy)) {
    deps.logger.warn('auth.sign_in.channel_not_allowed', logMeta);
    throw AuthErrors.channelNotAllowed({ strategy, channel: params.channel });
  }

  // ── 2. Resolve identity ──────────────────────────────────
  const subject = await deps.identities.resolver.resolveOrInitialize(
    requiredKeysFor(deps.identities.kind, params.channel),
    params.attributes,
  );

  if (!isPersisted(subject)) {
    deps.logger.info('auth.sign_in.failed', {
      ...logMeta,
      reason: 'identity_not_found',
      fieldErrors: subject.errors.toJSON(),
    });
    throw AuthErrors.invalidCredentials();
  }

  // ── 3. Eligibility + credentials ─────────────────────────
  const outcome = await deps.identities.eligibility.validForAuthentication(subject, () =>
    verifyPassword(deps.passwordHasher, subject, params.password),
  );

  if (outcome.status === 'ineligible') {
    deps.logger.info('auth.sign_in.failed', {
      ...logMeta,
      identityId: subject.id,
      reason: outcome.reason,
    });
    throw AuthErrors.inactive(outcome.reason, { identityId: subject.id });
  }

  if (!outcome.value) {
    deps.logger.info('auth.sign_in.failed', {
      ...logMeta,
      identityId: subject.id,
      reason: 'bad_password',
    });
    throw AuthErrors.invalidCredentials({ identityId: subject.id });
  }

  deps.logger.info('auth.sign_in.success', { ...logMeta, identityId: subject.id });

  return buildAuthResult({ strategy, channel: params.channel, identity: subject });
}
