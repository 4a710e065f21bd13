/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "I need to send an email" from "here is how emails are sent".
 * - Token flows enqueue messages; the transport is wired at the DI layer only.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - Raw tokens are allowed here — they travel to the email renderer so the
 *   link can be built. Never put password hashes in messages.
 */

// ── Message types ─────────────────────────────────────────────

export type ResetPasswordEmailMessage = {
  type: 'identity.reset-password-email';
  identityId: string;
  email: string;
  /** Goes into the email link: /password/edit?reset_password_token={token} */
  token: string;
};

export type ConfirmationEmailMessage = {
  type: 'identity.confirmation-email';
  identityId: string;
  email: string;
  /** Goes into the email link: /confirmation?confirmation_token={token} */
  token: string;
};

export type QueueMessage = ResetPasswordEmailMessage | ConfirmationEmailMessage;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
