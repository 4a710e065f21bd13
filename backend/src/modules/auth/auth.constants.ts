/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows and controller.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

/** The password strategy; the name strategy gates are configured against. */
export const DATABASE_STRATEGY = 'database';

export const BASIC_AUTH_REALM = 'Application';

export const TOKEN_REQUEST_RESPONSES = {
  reset_password: {
    message: 'If your email address exists in our database, you will receive a password recovery link shortly.',
  },
  confirmation: {
    message: 'If your email address exists in our database, you will receive an email with instructions for how to confirm your email address shortly.',
  },
} as const;
