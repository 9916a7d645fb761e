/**
 * src/shared/mail/log-mailer.ts
 *
 * WHY:
 * - Dev mode: when SMTP_HOST is unset, emails are logged instead of sent so
 *   local registration and password reset still work end to end.
 *
 * RULES:
 * - Never used in production (config requires SMTP_HOST there).
 * - Logs the body at debug level only; it may contain a reset code.
 */

import type { Logger } from '../logger/logger';
import type { Mailer, OutgoingEmail, SendResult } from './mailer';

export class LogMailer implements Mailer {
  constructor(private readonly logger: Logger) {}

  send(email: OutgoingEmail): Promise<SendResult> {
    this.logger.info('mail.dev_mode.send', {
      flow: 'mail',
      toDomain: email.to.split('@')[1] ?? null,
      subject: email.subject,
    });
    this.logger.debug('mail.dev_mode.body', { flow: 'mail', html: email.html });
    return Promise.resolve({ ok: true });
  }
}
