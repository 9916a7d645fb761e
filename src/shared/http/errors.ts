/**
 * src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive for the HTTP boundary.
 * - Services return result values; controllers translate failures into AppError
 *   and the global error handler turns AppError into a response.
 *
 * RULES:
 * - This file MUST stay small.
 * - Module-specific mappings live in the module (e.g. auth/auth.errors.ts).
 */

export const APP_ERROR_CODES = [
  'UNAUTHORIZED',
  'NOT_FOUND',
  'VALIDATION_ERROR',
  'RATE_LIMITED',
  'CONFLICT',
  'SERVICE_UNAVAILABLE',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;

  /** Extra, client-safe fields merged into the `error` body (e.g. password reasons). */
  readonly details?: Record<string, unknown>;

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    meta?: AppErrorMeta;
    details?: Record<string, unknown>;
  }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
    this.details = opts.details;
  }

  static unauthorized(message = 'Unauthorized', meta?: AppErrorMeta) {
    return new AppError({ code: 'UNAUTHORIZED', status: 401, message, meta });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta });
  }

  static validationError(
    message = 'Validation error',
    meta?: AppErrorMeta,
    details?: Record<string, unknown>,
  ) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, meta, details });
  }

  /** `retryAfterSeconds` is surfaced to the client as a Retry-After header. */
  static rateLimited(retryAfterSeconds: number, meta?: AppErrorMeta) {
    return new AppError({
      code: 'RATE_LIMITED',
      status: 429,
      message: 'Too many attempts. Please try again later.',
      meta: { ...meta, retryAfterSeconds },
      details: { retryAfterSeconds },
    });
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta) {
    return new AppError({ code: 'CONFLICT', status: 409, message, meta });
  }

  static serviceUnavailable(message = 'Service temporarily unavailable', meta?: AppErrorMeta) {
    return new AppError({ code: 'SERVICE_UNAVAILABLE', status: 503, message, meta });
  }
}
