/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging and tracing.
 * - Once a strategy authenticates an identity, its id is attached here so
 *   every later log line for the request carries it.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - host can be null (missing/invalid Host header).
 * - identityId stays null until a strategy succeeds.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  host: string | null;
  identityId: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim();
  if (!trimmed) return null;

  // strip port if present (e.g., "localhost:3000")
  return trimmed.split(':')[0]?.toLowerCase() ?? null;
}

export function registerRequestContext(app: FastifyInstance) {
  // The real value is assigned on each request in the onRequest hook.
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.requestContext = {
      requestId: randomUUID(),
      host: parseHost(req.headers.host),
      identityId: null,
    };

    done();
  });
}
