/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/flows.
 * - Keeps API error responses consistent.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. auth/auth.errors.ts).
 */

// 500s are written by the error handler itself, never raised as AppError.
export const APP_ERROR_CODES = ['UNAUTHORIZED', 'VALIDATION_ERROR'] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;
  /** Optional machine-readable sub-code returned to clients (e.g. 'locked'). */
  readonly reason?: string;

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    meta?: AppErrorMeta;
    reason?: string;
  }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
    this.reason = opts.reason;
  }

  static unauthorized(message = 'Unauthorized', meta?: AppErrorMeta, reason?: string) {
    return new AppError({ code: 'UNAUTHORIZED', status: 401, message, meta, reason });
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, meta });
  }
}
