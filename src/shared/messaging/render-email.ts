/**
 * src/shared/messaging/render-email.ts
 *
 * Turns a queue message into subject + HTML. Pure: no I/O.
 */

import type { QueueMessage } from './queue';

export type RenderedEmail = {
  to: string;
  subject: string;
  html: string;
};

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderEmail(message: QueueMessage, appName: string): RenderedEmail {
  const app = escapeHtml(appName);

  switch (message.type) {
    case 'auth.welcome-email':
      return {
        to: message.email,
        subject: `Welcome to ${appName}!`,
        html: [
          `<h1>Welcome to ${app}!</h1>`,
          '<p>Thank you for registering. We are excited to help you turn your medical PDFs into Anki cards.</p>',
          '<p>Get started by uploading a PDF in the Generator tab.</p>',
          '<p>Happy Studying!</p>',
          `<p><i>The ${app} Team</i></p>`,
        ].join('\n'),
      };

    case 'auth.reset-code-email':
      return {
        to: message.email,
        subject: `${appName} - Password Reset`,
        html: [
          '<h1>Password Reset Request</h1>',
          '<p>You requested to reset your password.</p>',
          '<p>Your verification code is:</p>',
          `<h2>${escapeHtml(message.code)}</h2>`,
          `<p>The code expires in ${message.expiresInMinutes} minutes and can be used once.</p>`,
          '<p>If you did not request this, please ignore this email.</p>',
        ].join('\n'),
      };
  }
}
