import type { OutgoingHttpHeaders } from 'node:http';
import { z } from 'zod';

export const ErrorBodySchema = z.object({
  error: z
    .object({
      code: z.string(),
      message: z.string(),
    })
    .passthrough(),
});

export type ErrorBody = z.infer<typeof ErrorBodySchema>;

export const EmailBodySchema = z.object({ email: z.string() });
export const MessageBodySchema = z.object({ message: z.string() });

/** The raw Set-Cookie header of a response (first one if several). */
export function readSetCookie(headers: OutgoingHttpHeaders): string {
  const header = headers['set-cookie'];
  const raw = Array.isArray(header) ? header[0] : header;
  if (typeof raw !== 'string') throw new Error('expected a Set-Cookie header');
  return raw;
}

/** "sid=abc; Path=/; HttpOnly ..." → "sid=abc", ready for a Cookie request header. */
export function sessionCookie(headers: OutgoingHttpHeaders): string {
  return readSetCookie(headers).split(';')[0];
}
