import { describe, it, expect, vi } from 'vitest';
import type { Mailer, OutgoingEmail, SendResult } from '../../../../src/shared/mail/mailer';
import { MailerQueue } from '../../../../src/shared/messaging/mailer-queue';
import { createSilentLogger } from '../../../helpers/silent-logger';

function makeMailer(send: (email: OutgoingEmail) => Promise<SendResult>) {
  const mailer = {
    send: vi.fn(send),
    close: vi.fn(() => Promise.resolve()),
  } satisfies Mailer;
  return mailer;
}

describe('MailerQueue', () => {
  it('delivers a rendered email in the background', async () => {
    const logger = createSilentLogger();
    const info = vi.spyOn(logger, 'info');
    const mailer = makeMailer(() => Promise.resolve({ ok: true }));
    const queue = new MailerQueue({ mailer, logger, appName: 'Anki AI' });

    await queue.enqueue({ type: 'auth.welcome-email', email: 'alice@example.com' });
    await queue.idle();

    expect(mailer.send).toHaveBeenCalledTimes(1);
    expect(mailer.send.mock.calls[0][0]).toMatchObject({
      to: 'alice@example.com',
      subject: 'Welcome to Anki AI!',
    });
    expect(info).toHaveBeenCalledWith('mail.sent', {
      flow: 'mail',
      type: 'auth.welcome-email',
      toDomain: 'example.com',
    });
  });

  it('logs a failed send without rejecting the enqueue', async () => {
    const logger = createSilentLogger();
    const error = vi.spyOn(logger, 'error');
    const mailer = makeMailer(() => Promise.resolve({ ok: false, reason: 'relay denied' }));
    const queue = new MailerQueue({ mailer, logger, appName: 'Anki AI' });

    await expect(
      queue.enqueue({ type: 'auth.welcome-email', email: 'alice@example.com' }),
    ).resolves.toBeUndefined();
    await queue.idle();

    expect(error).toHaveBeenCalledWith('mail.send_failed', {
      flow: 'mail',
      type: 'auth.welcome-email',
      toDomain: 'example.com',
      reason: 'relay denied',
    });
  });

  it('logs a mailer that throws', async () => {
    const logger = createSilentLogger();
    const error = vi.spyOn(logger, 'error');
    const mailer = makeMailer(() => Promise.reject(new Error('socket hang up')));
    const queue = new MailerQueue({ mailer, logger, appName: 'Anki AI' });

    await queue.enqueue({
      type: 'auth.reset-code-email',
      email: 'alice@example.com',
      code: 'ABCD2345EF',
      expiresInMinutes: 15,
    });
    await queue.idle();

    expect(error).toHaveBeenCalledWith('mail.send_failed', {
      flow: 'mail',
      type: 'auth.reset-code-email',
      toDomain: 'example.com',
      reason: 'socket hang up',
    });
  });

  it('close() waits for deliveries, closes the mailer and refuses new messages', async () => {
    const mailer = makeMailer(() => Promise.resolve({ ok: true }));
    const queue = new MailerQueue({ mailer, logger: createSilentLogger(), appName: 'Anki AI' });

    await queue.enqueue({ type: 'auth.welcome-email', email: 'alice@example.com' });
    await queue.close();

    expect(mailer.send).toHaveBeenCalledTimes(1);
    expect(mailer.close).toHaveBeenCalledTimes(1);
    await expect(
      queue.enqueue({ type: 'auth.welcome-email', email: 'bob@example.com' }),
    ).rejects.toThrow('MailerQueue: closed');
  });
});
