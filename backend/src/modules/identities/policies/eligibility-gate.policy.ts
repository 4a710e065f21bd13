/**
 * backend/src/modules/identities/policies/eligibility-gate.policy.ts
 *
 * WHY:
 * - "Is this identity allowed to finish signing in right now?" is separate
 *   from "is the password right?". Features (confirmable, lockable, …) each
 *   add one precondition.
 * - Keep rule pure + unit-testable (no DB, no HTTP).
 *
 * HOW IT WORKS:
 * - A gate is an ordered chain of stages. Feature stages run left to right,
 *   the base stage runs last. The first stage whose check fails decides the
 *   reason; the subject is active only if every stage passes (logical AND).
 * - An active subject's inactive message is the base stage's reason.
 *
 * RULES:
 * - validForAuthentication never throws for an inactive subject: callers tell
 *   "authenticated" from "rejected" by the result's status.
 * - Errors thrown by the onSuccess callback are not caught here.
 */

import type { IdentitySubject, InactiveReason } from '../identity.types';

export interface EligibilityStage {
  readonly name: string;
  check(subject: IdentitySubject): boolean;
  reason(subject: IdentitySubject): InactiveReason;
}

export type EligibilityDecision =
  | { status: 'active' }
  | { status: 'inactive'; reason: InactiveReason; stage: string };

export type AuthenticationOutcome<T> =
  | { status: 'eligible'; value: T }
  | { status: 'ineligible'; reason: InactiveReason };

/** Base stage: an authenticatable identity is active unless a feature says otherwise. */
export const authenticatableStage: EligibilityStage = {
  name: 'authenticatable',
  check: () => true,
  reason: () => 'inactive',
};

export class EligibilityGate {
  private readonly chain: readonly EligibilityStage[];

  constructor(
    stages: readonly EligibilityStage[] = [],
    private readonly base: EligibilityStage = authenticatableStage,
  ) {
    this.chain = [...stages, base];
  }

  get stageNames(): string[] {
    return this.chain.map((s) => s.name);
  }

  evaluate(subject: IdentitySubject): EligibilityDecision {
    for (const stage of this.chain) {
      if (!stage.check(subject)) {
        return { status: 'inactive', reason: stage.reason(subject), stage: stage.name };
      }
    }
    return { status: 'active' };
  }

  isActive(subject: IdentitySubject): boolean {
    return this.evaluate(subject).status === 'active';
  }

  inactiveMessage(subject: IdentitySubject): InactiveReason {
    const decision = this.evaluate(subject);
    return decision.status === 'inactive' ? decision.reason : this.base.reason(subject);
  }

  validForAuthentication(subject: IdentitySubject): Promise<AuthenticationOutcome<true>>;
  validForAuthentication<T>(
    subject: IdentitySubject,
    onSuccess: () => Promise<T>,
  ): Promise<AuthenticationOutcome<T>>;
  validForAuthentication<T>(
    subject: IdentitySubject,
    onSuccess: () => T,
  ): Promise<AuthenticationOutcome<T>>;
  async validForAuthentication(
    subject: IdentitySubject,
    onSuccess?: () => unknown,
  ): Promise<AuthenticationOutcome<unknown>> {
    const decision = this.evaluate(subject);
    if (decision.status === 'inactive') {
      return { status: 'ineligible', reason: decision.reason };
    }

    const value = onSuccess ? await onSuccess() : true;
    return { status: 'eligible', value };
  }
}
