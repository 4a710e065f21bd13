/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/auth/sign-in', controller.signIn.bind(controller));
  app.get('/auth/me', controller.me.bind(controller));
  app.post('/auth/password', controller.requestPasswordReset.bind(controller));
  app.post('/auth/confirmation', controller.requestConfirmation.bind(controller));
}
