/**
 * backend/src/modules/auth/flows/tokens/request-identity-token-flow.ts
 *
 * WHY:
 * - "Send me a reset link" and "resend my confirmation email" are the same
 *   use-case with a different token field and email template.
 *
 * RULES:
 * - Always returns void (controller returns 200 regardless).
 * - The identity is located by the kind's reset / confirmation keys.
 * - Unknown identity, blank keys and already-confirmed paths are silent but logged.
 * - TokenGenerationExhaustedError propagates (500): a broken store must not
 *   look like "email sent".
 * - No raw SQL here; use the identities module.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { Queue, QueueMessage } from '../../../../shared/messaging/queue';
import { isPersisted } from '../../../identities';
import type {
  AuthenticationKey,
  IdentityKindConfig,
  IdentityModule,
  RawAttributes,
  TokenField,
} from '../../../identities';
import type { IdentityTokenPurpose } from '../../auth.types';

export type RequestIdentityTokenParams = {
  purpose: IdentityTokenPurpose;
  attributes: RawAttributes;
  requestId: string;
};

const TOKEN_FIELD_BY_PURPOSE: Record<IdentityTokenPurpose, TokenField> = {
  reset_password: 'resetPasswordToken',
  confirmation: 'confirmationToken',
};

function lookupKeysFor(
  kind: IdentityKindConfig,
  purpose: IdentityTokenPurpose,
): readonly AuthenticationKey[] {
  return purpose === 'reset_password' ? kind.resetPasswordKeys : kind.confirmationKeys;
}

function buildMessage(params: {
  purpose: IdentityTokenPurpose;
  identityId: string;
  email: string;
  token: string;
}): QueueMessage {
  const { purpose, identityId, email, token } = params;
  switch (purpose) {
    case 'reset_password':
      return { type: 'identity.reset-password-email', identityId, email, token };
    case 'confirmation':
      return { type: 'identity.confirmation-email', identityId, email, token };
  }
}

export async function requestIdentityTokenFlow(
  deps: {
    identities: IdentityModule;
    queue: Queue;
    logger: Logger;
    now?: () => Date;
  },
  params: RequestIdentityTokenParams,
): Promise<void> {
  const logMeta = {
    flow: 'auth.token',
    purpose: params.purpose,
    requestId: params.requestId,
  };

  // ── 1. Find identity ─────────────────────────────────────
  const subject = await deps.identities.resolver.resolveOrInitialize(
    lookupKeysFor(deps.identities.kind, params.purpose),
    params.attributes,
    'not_found',
  );

  if (!isPersisted(subject)) {
    deps.logger.info('auth.token.skipped', {
      ...logMeta,
      outcome: 'not_found',
      fieldErrors: subject.errors.toJSON(),
    });
    return;
  }

  const email = subject.attributes.email;
  if (!email) {
    deps.logger.warn('auth.token.skipped', { ...logMeta, identityId: subject.id, outcome: 'no_email' });
    return;
  }

  if (params.purpose === 'confirmation' && subject.confirmedAt) {
    deps.logger.info('auth.token.skipped', {
      ...logMeta,
      identityId: subject.id,
      outcome: 'already_confirmed',
    });
    return;
  }

  // ── 2. Generate + store token ────────────────────────────
  const field = TOKEN_FIELD_BY_PURPOSE[params.purpose];
  const token = await deps.identities.tokens.generate(field);
  const sentAt = deps.now ? deps.now() : new Date();

  await deps.identities.tokenWriter.assignToken({
    identityId: subject.id,
    field,
    token,
    sentAt,
  });

  // ── 3. Enqueue email ─────────────────────────────────────
  await deps.queue.enqueue(
    buildMessage({ purpose: params.purpose, identityId: subject.id, email, token }),
  );

  deps.logger.info('auth.token.sent', { ...logMeta, identityId: subject.id, field });
}
