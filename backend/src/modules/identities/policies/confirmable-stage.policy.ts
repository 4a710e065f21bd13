/**
 * backend/src/modules/identities/policies/confirmable-stage.policy.ts
 *
 * RULE:
 * - Confirmed identities pass.
 * - Unconfirmed identities pass only while inside the grace period counted
 *   from creation (allowUnconfirmedForMs; 0 = no grace period).
 * - Otherwise → 'unconfirmed'.
 */

import type { IdentitySubject } from '../identity.types';
import type { EligibilityStage } from './eligibility-gate.policy';

export function isWithinUnconfirmedGracePeriod(
  subject: IdentitySubject,
  allowUnconfirmedForMs: number,
  now: Date,
): boolean {
  if (allowUnconfirmedForMs <= 0 || !subject.createdAt) return false;
  return now.getTime() - subject.createdAt.getTime() < allowUnconfirmedForMs;
}

export function confirmableStage(opts: {
  allowUnconfirmedForMs: number;
  now?: () => Date;
}): EligibilityStage {
  const now = opts.now ?? (() => new Date());

  return {
    name: 'confirmable',
    check: (subject) =>
      subject.confirmedAt !== null ||
      isWithinUnconfirmedGracePeriod(subject, opts.allowUnconfirmedForMs, now()),
    reason: () => 'unconfirmed',
  };
}
