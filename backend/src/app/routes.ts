/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health)
 *   - module routes (auth)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      identityKind: opts.config.identity.name,
      requestId: req.requestContext.requestId,
    };
  });

  opts.deps.auth.registerRoutes(app);
}
