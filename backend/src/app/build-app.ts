/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  const deps = buildDeps(config, overrides);
  const app = await buildServer();

  registerRoutes(app, { config, deps });
  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
