/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Thin orchestrator over the auth flows; holds the dependencies so the
 *   controller only deals with HTTP.
 *
 * RULES:
 * - No raw DB access outside the identities module.
 * - Never store/log raw passwords or tokens.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Queue } from '../../shared/messaging/queue';
import type { IdentityModule } from '../identities';

import type { AuthResult } from './auth.types';
import { executeSignInFlow } from './flows/sign-in/execute-sign-in-flow';
import type { SignInParams } from './flows/sign-in/execute-sign-in-flow';
import { requestIdentityTokenFlow } from './flows/tokens/request-identity-token-flow';
import type { RequestIdentityTokenParams } from './flows/tokens/request-identity-token-flow';

export type AuthServiceDeps = {
  identities: IdentityModule;
  passwordHasher: PasswordHasher;
  queue: Queue;
  logger: Logger;
  now?: () => Date;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  /** The identity kind's first authentication key; the HTTP Basic login maps onto it. */
  get primaryAuthenticationKey() {
    return this.deps.identities.kind.authenticationKeys[0];
  }

  async signIn(params: SignInParams): Promise<AuthResult> {
    return executeSignInFlow(
      {
        identities: this.deps.identities,
        passwordHasher: this.deps.passwordHasher,
        logger: this.deps.logger,
      },
      params,
    );
  }

  async requestToken(params: RequestIdentityTokenParams): Promise<void> {
    return requestIdentityTokenFlow(
      {
        identities: this.deps.identities,
        queue: this.deps.queue,
        logger: this.deps.logger,
        now: this.deps.now,
      },
      params,
    );
  }
}
