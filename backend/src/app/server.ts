/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 */

import Fastify from 'fastify';

import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer() {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerErrorHandler(app);

  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
    });
    done();
  });

  return app;
}
