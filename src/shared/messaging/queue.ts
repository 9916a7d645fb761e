/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "this email needs to go out" from "here is how email is sent".
 * - Auth flows enqueue messages after their state change is committed; the
 *   transport (SMTP, dev log, test queue) is chosen in di.ts only.
 *
 * RULES:
 * - Message types are a discriminated union on `type`.
 * - Messages must be JSON-serializable.
 * - The plaintext reset code is allowed here: it travels to the email renderer
 *   and is never stored or logged.
 * - Never put password hashes, session ids or API keys in messages.
 */

// ── Message types ─────────────────────────────────────────────

export type WelcomeEmailMessage = {
  type: 'auth.welcome-email';
  email: string;
};

export type ResetCodeEmailMessage = {
  type: 'auth.reset-code-email';
  email: string;
  code: string;
  expiresInMinutes: number;
};

export type QueueMessage = WelcomeEmailMessage | ResetCodeEmailMessage;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  /** Resolves once the message is accepted, not when it is delivered. */
  enqueue(message: QueueMessage): Promise<void>;
}
