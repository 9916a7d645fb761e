/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → AuthService for all auth endpoints.
 * - Sets the session cookie on register/login, clears it on logout.
 *
 * RULES:
 * - No store access here.
 * - No business rules here.
 * - Failures come back as values; authFailureToAppError() turns them into
 *   AppError and the global error handler writes the response.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import { clearSessionCookie, setSessionCookie } from '../../shared/session/set-session-cookie';
import { authFailureToAppError } from './auth.errors';
import {
  forgotPasswordSchema,
  loginSchema,
  registerSchema,
  resetPasswordSchema,
} from './auth.schemas';
import type { AuthService } from './auth.service';

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly cookie: { isProduction: boolean; sessionTtlSeconds: number },
  ) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.register({
      email: parsed.data.email,
      password: parsed.data.password,
      passwordConfirmation: parsed.data.passwordConfirmation,
      requestId: req.requestContext.requestId,
    });

    if (!result.ok) {
      throw authFailureToAppError(result.error, { flow: 'auth.register' });
    }

    setSessionCookie(reply, result.value.sessionId, {
      isProduction: this.cookie.isProduction,
      maxAgeSeconds: this.cookie.sessionTtlSeconds,
    });
    return reply.status(201).send({ email: result.value.email });
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.login({
      email: parsed.data.email,
      password: parsed.data.password,
      requestId: req.requestContext.requestId,
    });

    if (!result.ok) {
      throw authFailureToAppError(result.error, { flow: 'auth.login' });
    }

    setSessionCookie(reply, result.value.sessionId, {
      isProduction: this.cookie.isProduction,
      maxAgeSeconds: this.cookie.sessionTtlSeconds,
    });
    return reply.status(200).send({ email: result.value.email });
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const sessionId = req.authContext.sessionId;
    if (sessionId) {
      const result = await this.authService.logout(sessionId, req.requestContext.requestId);
      if (!result.ok) {
        throw authFailureToAppError(result.error, { flow: 'auth.logout' });
      }
    }

    clearSessionCookie(reply, this.cookie.isProduction);
    return reply.status(200).send({ message: 'Signed out.' });
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    return reply.status(200).send({ email: session.email });
  }

  async forgotPassword(req: FastifyRequest, reply: FastifyReply) {
    const parsed = forgotPasswordSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.requestPasswordReset({
      email: parsed.data.email,
      requestId: req.requestContext.requestId,
    });

    if (!result.ok) {
      throw authFailureToAppError(result.error, { flow: 'auth.password_reset' });
    }

    return reply.status(200).send(result.value);
  }

  async resetPassword(req: FastifyRequest, reply: FastifyReply) {
    const parsed = resetPasswordSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.resetPassword({
      email: parsed.data.email,
      code: parsed.data.code,
      newPassword: parsed.data.newPassword,
      newPasswordConfirmation: parsed.data.newPasswordConfirmation,
      requestId: req.requestContext.requestId,
    });

    if (!result.ok) {
      throw authFailureToAppError(result.error, { flow: 'auth.password_reset' });
    }

    clearSessionCookie(reply, this.cookie.isProduction);
    return reply.status(200).send(result.value);
  }
}
