/**
 * src/shared/mail/mailer.ts
 *
 * WHY:
 * - One send() contract for SMTP and the dev-mode log mailer.
 *
 * RULES:
 * - send() never throws; transport failures come back as { ok: false, reason }.
 */

export type OutgoingEmail = {
  to: string;
  subject: string;
  html: string;
};

export type SendResult = { ok: true } | { ok: false; reason: string };

export interface Mailer {
  send(email: OutgoingEmail): Promise<SendResult>;
  close?(): Promise<void>;
}
