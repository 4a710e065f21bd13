/**
 * backend/src/modules/identities/policies/lockable-stage.policy.ts
 *
 * RULE:
 * - Identities without lockedAt pass.
 * - With unlockAfterMs set, a lock strictly older than that has expired and passes.
 * - With unlockAfterMs null, the lock holds until lockedAt is cleared.
 * - Otherwise → 'locked'.
 */

import type { IdentitySubject } from '../identity.types';
import type { EligibilityStage } from './eligibility-gate.policy';

export function isLockExpired(
  subject: IdentitySubject,
  unlockAfterMs: number | null,
  now: Date,
): boolean {
  if (!subject.lockedAt || unlockAfterMs === null) return false;
  return now.getTime() - subject.lockedAt.getTime() > unlockAfterMs;
}

export function lockableStage(opts: {
  unlockAfterMs: number | null;
  now?: () => Date;
}): EligibilityStage {
  const now = opts.now ?? (() => new Date());

  return {
    name: 'lockable',
    check: (subject) => subject.lockedAt === null || isLockExpired(subject, opts.unlockAfterMs, now()),
    reason: () => 'locked',
  };
}
