/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 * - Auth module is the outer middleware around the identities core: it owns
 *   the strategy endpoints and the token request endpoints.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import { AuthService } from './auth.service';
import type { AuthServiceDeps } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: AuthServiceDeps) {
  const authService = new AuthService(deps);
  const controller = new AuthController(authService);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
