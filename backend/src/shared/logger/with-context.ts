/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Most logs should include requestId + host so we can trace a full request.
 * - We don't want every handler repeating the same fields manually.
 *
 * HOW TO USE:
 * - In a request handler: `withRequestContext(req).warn('msg', { flow: '...' })`
 */

import type { FastifyRequest } from 'fastify';
import { logger } from './logger';

type LogMeta = Record<string, unknown>;

export function withRequestContext(req: FastifyRequest) {
  const base = {
    requestId: req.requestContext?.requestId,
    host: req.requestContext?.host,
    identityId: req.requestContext?.identityId ?? null,
  };

  return {
    warn: (msg: string, meta: LogMeta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg: string, meta: LogMeta = {}) => logger.error(msg, { ...base, ...meta }),
  };
}
