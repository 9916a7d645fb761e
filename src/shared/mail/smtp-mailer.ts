/**
 * src/shared/mail/smtp-mailer.ts
 *
 * WHY:
 * - Production email delivery over SMTP (nodemailer).
 *
 * HOW TO USE:
 * - new SmtpMailer({ host, port, secure, user, password, from })
 * - Port 587 with secure=false upgrades via STARTTLS; 465 uses secure=true.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';

import type { Mailer, OutgoingEmail, SendResult } from './mailer';

export type SmtpMailerConfig = {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
  from: string;
};

export class SmtpMailer implements Mailer {
  private readonly transporter: Transporter;

  constructor(private readonly config: SmtpMailerConfig) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      auth: config.user ? { user: config.user, pass: config.password } : undefined,
    });
  }

  async send(email: OutgoingEmail): Promise<SendResult> {
    try {
      await this.transporter.sendMail({
        from: this.config.from,
        to: email.to,
        subject: email.subject,
        html: email.html,
      });
      return { ok: true };
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }
  }

  close(): Promise<void> {
    this.transporter.close();
    return Promise.resolve();
  }
}
