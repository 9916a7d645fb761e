/**
 * src/modules/settings/settings.controller.ts
 *
 * RULES:
 * - Every endpoint requires a session; the account is the session's email.
 * - Saved API key values are never echoed back by PUT.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import { saveApiKeysSchema, savePreferencesSchema } from './settings.schemas';
import type { SettingsService } from './settings.service';

export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  async getApiKeys(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const apiKeys = await this.settingsService.getApiKeys(session.email);
    return reply.status(200).send({ apiKeys });
  }

  async saveApiKeys(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = saveApiKeysSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const providers = await this.settingsService.saveApiKeys(session.email, parsed.data.apiKeys);
    return reply.status(200).send({ providers });
  }

  async getPreferences(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const preferences = await this.settingsService.getPreferences(session.email);
    return reply.status(200).send({ preferences });
  }

  async savePreferences(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = savePreferencesSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const preferences = await this.settingsService.savePreferences(
      session.email,
      parsed.data.preferences,
    );
    return reply.status(200).send({ preferences });
  }
}
