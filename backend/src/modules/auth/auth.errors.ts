/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: error messages never reveal which authentication key was wrong.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import type { InactiveReason } from '../identities';

const INACTIVE_MESSAGES: Record<InactiveReason, string> = {
  inactive: 'Your account is not activated yet.',
  unconfirmed: 'You have to confirm your email address before continuing.',
  locked: 'Your account is locked.',
};

export const AuthErrors = {
  /** Unknown identity or wrong password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid credentials.', meta, 'invalid');
  },

  /** The strategy may not run over this channel for this identity kind. */
  channelNotAllowed(meta?: AppErrorMeta) {
    return AppError.unauthorized(
      'This sign-in method is not available.',
      meta,
      'channel_not_allowed',
    );
  },

  /** Identity exists and credentials may be right, but a feature precondition failed. */
  inactive(reason: InactiveReason, meta?: AppErrorMeta) {
    return AppError.unauthorized(INACTIVE_MESSAGES[reason], meta, reason);
  },

  /** HTTP channel: Authorization header missing or not Basic. */
  missingBasicCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('You need to sign in before continuing.', meta, 'unauthenticated');
  },
} as const;
