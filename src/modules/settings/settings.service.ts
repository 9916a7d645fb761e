/**
 * src/modules/settings/settings.service.ts
 *
 * WHY:
 * - Users keep their LLM provider API keys and a few UI preferences on their
 *   account record.
 * - API keys are sealed with AES-256-GCM (`enc:` prefix) before they are stored.
 *
 * RULES:
 * - Writes go through modifyAccount() (optimistic read-modify-write).
 * - getApiKeys() migrates plaintext values found in storage by sealing them.
 *   A value that fails to decrypt (rotated key, tampering) is logged and
 *   returned as '' so the UI asks for it again.
 * - Never log key values; provider names only.
 */

import { StoreUnavailableError, type StoreOpRunner } from '../../shared/db/store-timeout';
import { AppError } from '../../shared/http/errors';
import type { Logger } from '../../shared/logger/logger';
import { isSealed, type EncryptionService } from '../../shared/security/encryption';
import type { TokenHasher } from '../../shared/security/token-hasher';
import { modifyAccount, type Account, type AccountStore, type PreferenceValue } from '../accounts';

export type ApiKeys = Record<string, string>;
export type Preferences = Record<string, PreferenceValue>;

export class SettingsService {
  constructor(
    private readonly deps: {
      accountStore: AccountStore;
      encryption: EncryptionService;
      emailHasher: TokenHasher;
      logger: Logger;
      store: StoreOpRunner;
      clock: () => Date;
    },
  ) {}

  async saveApiKeys(email: string, keys: ApiKeys): Promise<string[]> {
    const sealed: ApiKeys = {};
    for (const [provider, value] of Object.entries(keys)) {
      sealed[provider] = value && !isSealed(value) ? this.deps.encryption.seal(value) : value;
    }

    await this.modify('settings.api_keys.save', email, (current) => ({
      ...current,
      settings: { ...current.settings, apiKeys: { ...current.settings.apiKeys, ...sealed } },
    }));

    this.deps.logger.info({
      msg: 'settings.api_keys.saved',
      flow: 'settings',
      emailKey: this.deps.emailHasher.hash(email),
      providers: Object.keys(keys),
    });

    return Object.keys(keys);
  }

  async getApiKeys(email: string): Promise<ApiKeys> {
    const account = await this.load(email);

    const result: ApiKeys = {};
    const plaintextProviders: string[] = [];

    for (const [provider, stored] of Object.entries(account.settings.apiKeys)) {
      if (!stored) {
        result[provider] = stored;
        continue;
      }

      const opened = this.deps.encryption.open(stored);
      switch (opened.kind) {
        case 'decrypted':
          result[provider] = opened.value;
          break;
        case 'plaintext':
          result[provider] = opened.value;
          plaintextProviders.push(provider);
          break;
        case 'undecryptable':
          this.deps.logger.error({
            msg: 'settings.api_keys.decrypt_failed',
            flow: 'settings',
            emailKey: this.deps.emailHasher.hash(email),
            provider,
            reason: opened.reason,
          });
          result[provider] = '';
          break;
      }
    }

    if (plaintextProviders.length > 0) {
      await this.modify('settings.api_keys.migrate', email, (current) => {
        const apiKeys: ApiKeys = { ...current.settings.apiKeys };
        for (const provider of plaintextProviders) {
          const value = apiKeys[provider];
          if (value && !isSealed(value)) {
            apiKeys[provider] = this.deps.encryption.seal(value);
          }
        }
        return { ...current, settings: { ...current.settings, apiKeys } };
      });

      this.deps.logger.info({
        msg: 'settings.api_keys.migrated',
        flow: 'settings',
        emailKey: this.deps.emailHasher.hash(email),
        providers: plaintextProviders,
      });
    }

    return result;
  }

  async getPreferences(email: string): Promise<Preferences> {
    const account = await this.load(email);
    return account.settings.preferences;
  }

  async savePreferences(email: string, preferences: Preferences): Promise<Preferences> {
    const saved = await this.modify('settings.preferences.save', email, (current) => ({
      ...current,
      settings: {
        ...current.settings,
        preferences: { ...current.settings.preferences, ...preferences },
      },
    }));

    this.deps.logger.info({
      msg: 'settings.preferences.saved',
      flow: 'settings',
      emailKey: this.deps.emailHasher.hash(email),
      keys: Object.keys(preferences),
    });

    return saved.settings.preferences;
  }

  private async load(email: string): Promise<Account> {
    const account = await this.translate(() =>
      this.deps.store('accounts.get', () => this.deps.accountStore.get(email)),
    );
    if (!account) throw AppError.notFound('Account not found');
    return account;
  }

  private async modify(
    operation: string,
    email: string,
    mutate: (current: Account) => Account,
  ): Promise<Account> {
    const now = this.deps.clock();
    const saved = await this.translate(() =>
      this.deps.store(operation, () =>
        modifyAccount(this.deps.accountStore, email, (current) => ({
          ...mutate(current),
          updatedAt: now,
        })),
      ),
    );
    if (!saved) throw AppError.notFound('Account not found');
    return saved;
  }

  private async translate<T>(run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        this.deps.logger.error({
          msg: 'settings.store_unavailable',
          flow: 'settings',
          operation: err.operation,
          error: err.cause instanceof Error ? err.cause.message : String(err.cause),
        });
        throw AppError.serviceUnavailable('Service temporarily unavailable. Please try again.');
      }
      throw err;
    }
  }
}
