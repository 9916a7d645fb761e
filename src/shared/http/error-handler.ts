/**
 * src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → .status / .code / .details mapped to a structured response.
 *   RATE_LIMITED also sets Retry-After.
 * - Fastify body-parse errors (malformed JSON) → 400.
 * - Unexpected errors → 500 with a generic message.
 *
 * RULES:
 * - Never expose .meta or stack traces in responses.
 * - Sensitive meta keys are redacted before logging.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AppError } from './errors';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  } & Record<string, unknown>;
};

const SENSITIVE_META_KEYS = new Set([
  'email',
  'password',
  'passwordConfirmation',
  'newPassword',
  'passwordHash',
  'code',
  'resetCode',
  'sessionId',
  'apiKeys',
  'secret',
]);

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>,
): ErrorResponseBody {
  return { error: { ...details, code, message } };
}

function isClientError(err: Error): err is Error & { statusCode: number } {
  const statusCode: unknown = Reflect.get(err, 'statusCode');
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500;
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
        message: err.message,
        meta: redactMeta(err.meta),
      });

      if (err.code === 'RATE_LIMITED') {
        const retryAfter = err.details?.retryAfterSeconds;
        if (typeof retryAfter === 'number') {
          reply.header('Retry-After', String(retryAfter));
        }
      }

      return reply.status(err.status).send(buildResponse(err.code, err.message, err.details));
    }

    // 2) Framework-level client errors (malformed JSON, unsupported media type)
    if (isClientError(err)) {
      log.warn('client_error', { flow: 'http.error', status: err.statusCode, message: err.message });

      return reply
        .status(err.statusCode)
        .send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 3) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
