/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status, .code (and optional .reason) to structured HTTP response.
 * - TokenGenerationExhaustedError → 500 (store is misbehaving), logged at error level.
 * - Fastify client errors (malformed JSON, oversized body) → 400.
 * - Unexpected errors → 500 with generic message.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Always use withRequestContext(req) so requestId and identityId are
 *   included in every log line.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AppError } from './errors';
import { TokenGenerationExhaustedError } from '../security/token';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
    reason?: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'password',
  'passwordHash',
  'resetPasswordToken',
  'confirmationToken',
  'authorization',
  'secret',
]);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string, reason?: string): ErrorResponseBody {
  return reason ? { error: { code, message, reason } } : { error: { code, message } };
}

function clientStatusOf(err: Error): number | null {
  if (!('statusCode' in err) || typeof err.statusCode !== 'number') return null;
  return err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        reason: err.reason,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message, err.reason));
    }

    // 2) Token generation gave up — never retried further here
    if (err instanceof TokenGenerationExhaustedError) {
      log.error('token_generation_exhausted', {
        flow: 'http.error',
        field: err.field,
        attempts: err.attempts,
      });

      return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
    }

    // 3) Fastify-level client errors (bad JSON, unsupported media type…)
    const clientStatus = clientStatusOf(err);
    if (clientStatus !== null) {
      log.warn('client_error', { flow: 'http.error', status: clientStatus, message: err.message });
      return reply
        .status(clientStatus)
        .send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 4) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
