/**
 * src/modules/settings/settings.module.ts
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import type { StoreOpRunner } from '../../shared/db/store-timeout';
import type { Logger } from '../../shared/logger/logger';
import type { EncryptionService } from '../../shared/security/encryption';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { AccountStore } from '../accounts';
import { SettingsController } from './settings.controller';
import { registerSettingsRoutes } from './settings.routes';
import { SettingsService } from './settings.service';

export type SettingsModule = ReturnType<typeof createSettingsModule>;

export function createSettingsModule(deps: {
  accountStore: AccountStore;
  encryption: EncryptionService;
  emailHasher: TokenHasher;
  logger: Logger;
  store: StoreOpRunner;
  clock: () => Date;
}) {
  const settingsService = new SettingsService(deps);
  const controller = new SettingsController(settingsService);

  return {
    settingsService,
    registerRoutes(app: FastifyInstance) {
      registerSettingsRoutes(app, controller);
    },
  };
}
