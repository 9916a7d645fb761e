/**
 * src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session" logic.
 *
 * RULES:
 * - HTTP-only helper; must NOT touch stores or services.
 * - Throws AppError so the error handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';

export type RequiredAuthContext = Readonly<{
  sessionId: string;
  email: string;
  emailKey: string;
}>;

export function requireSession(req: FastifyRequest): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx || !ctx.sessionId || !ctx.email || !ctx.emailKey) {
    throw AppError.unauthorized('Authentication required');
  }

  return {
    sessionId: ctx.sessionId,
    email: ctx.email,
    emailKey: ctx.emailKey,
  };
}
