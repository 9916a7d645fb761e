/**
 * src/shared/messaging/mailer-queue.ts
 *
 * WHY:
 * - Production Queue: accepts a message immediately and delivers it through a
 *   Mailer in the background, so a slow SMTP server never slows a login.
 *
 * RULES:
 * - Delivery failures are logged and never reach the enqueuing flow.
 * - Logs carry the recipient's domain only.
 * - close() stops accepting messages and waits for in-flight deliveries.
 */

import type { Logger } from '../logger/logger';
import type { Mailer } from '../mail/mailer';
import type { Queue, QueueMessage } from './queue';
import { renderEmail } from './render-email';

export class MailerQueue implements Queue {
  private readonly pending = new Set<Promise<void>>();
  private closed = false;

  constructor(
    private readonly deps: {
      mailer: Mailer;
      logger: Logger;
      appName: string;
    },
  ) {}

  enqueue(message: QueueMessage): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('MailerQueue: closed'));
    }

    const delivery: Promise<void> = this.deliver(message).finally(() => {
      this.pending.delete(delivery);
    });
    this.pending.add(delivery);

    return Promise.resolve();
  }

  /** Resolves when every delivery started so far has settled. */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.idle();
    await this.deps.mailer.close?.();
  }

  private async deliver(message: QueueMessage): Promise<void> {
    const toDomain = message.email.split('@')[1] ?? null;

    try {
      const result = await this.deps.mailer.send(renderEmail(message, this.deps.appName));

      if (result.ok) {
        this.deps.logger.info('mail.sent', { flow: 'mail', type: message.type, toDomain });
      } else {
        this.deps.logger.error('mail.send_failed', {
          flow: 'mail',
          type: message.type,
          toDomain,
          reason: result.reason,
        });
      }
    } catch (err) {
      this.deps.logger.error('mail.send_failed', {
        flow: 'mail',
        type: message.type,
        toDomain,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
