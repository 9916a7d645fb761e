/**
 * src/shared/session/set-session-cookie.ts
 *
 * WHY:
 * - Register, login and logout set or clear the same cookie with the same flags.
 *
 * RULES:
 * - HttpOnly + SameSite=Strict always; Secure in production.
 * - Max-Age follows the session TTL so the browser drops the cookie with the session.
 */

import type { FastifyReply } from 'fastify';
import { SESSION_COOKIE_NAME } from './session.types';

export type SessionCookieOptions = {
  isProduction: boolean;
  maxAgeSeconds: number;
};

export function setSessionCookie(
  reply: FastifyReply,
  sessionId: string,
  opts: SessionCookieOptions,
): void {
  const parts = [
    `${SESSION_COOKIE_NAME}=${sessionId}`,
    'Path=/',
    'HttpOnly',
    'SameSite=Strict',
    `Max-Age=${opts.maxAgeSeconds}`,
  ];

  if (opts.isProduction) {
    parts.push('Secure');
  }

  reply.header('Set-Cookie', parts.join('; '));
}

export function clearSessionCookie(reply: FastifyReply, isProduction: boolean): void {
  const parts = [`${SESSION_COOKIE_NAME}=`, 'Path=/', 'HttpOnly', 'SameSite=Strict', 'Max-Age=0'];

  if (isProduction) {
    parts.push('Secure');
  }

  reply.header('Set-Cookie', parts.join('; '));
}
