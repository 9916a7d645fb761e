/**
 * src/modules/settings/settings.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { SettingsController } from './settings.controller';

export function registerSettingsRoutes(app: FastifyInstance, controller: SettingsController) {
  app.get('/settings/api-keys', controller.getApiKeys.bind(controller));
  app.put('/settings/api-keys', controller.saveApiKeys.bind(controller));
  app.get('/settings/preferences', controller.getPreferences.bind(controller));
  app.put('/settings/preferences', controller.savePreferences.bind(controller));
}
