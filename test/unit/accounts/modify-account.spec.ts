import { describe, it, expect, vi } from 'vitest';
import {
  InMemAccountStore,
  modifyAccount,
  type Account,
  type AccountStore,
} from '../../../src/modules/accounts';
import { StoreUnavailableError } from '../../../src/shared/db/store-timeout';
import { makeAccount } from '../../helpers/accounts';

describe('modifyAccount', () => {
  it('applies the change and bumps the version', async () => {
    const store = new InMemAccountStore();
    await store.create(makeAccount());

    const saved = await modifyAccount(store, 'alice@example.com', (current) => ({
      ...current,
      settings: { ...current.settings, preferences: { theme: 'dark' } },
    }));

    expect(saved?.version).toBe(2);
    expect(saved?.settings.preferences).toEqual({ theme: 'dark' });
    expect((await store.get('alice@example.com'))?.version).toBe(2);
  });

  it('returns null for a missing account', async () => {
    const mutate = vi.fn((current: Account) => current);

    expect(await modifyAccount(new InMemAccountStore(), 'nobody@example.com', mutate)).toBeNull();
    expect(mutate).not.toHaveBeenCalled();
  });

  it('re-reads and re-applies the change after a version conflict', async () => {
    const inner = new InMemAccountStore();
    await inner.create(makeAccount());

    // The first update loses a race against a concurrent preferences write.
    let raced = false;
    const store: AccountStore = {
      get: (email) => inner.get(email),
      create: (account) => inner.create(account),
      update: async (account) => {
        if (!raced) {
          raced = true;
          const current = await inner.get(account.email);
          if (current) {
            await inner.update({ ...current, settings: { ...current.settings, preferences: { lang: 'de' } } });
          }
        }
        return inner.update(account);
      },
    };

    const saved = await modifyAccount(store, 'alice@example.com', (current) => ({
      ...current,
      settings: { ...current.settings, apiKeys: { openai: 'enc:x' } },
    }));

    expect(saved?.version).toBe(3);
    expect(saved?.settings).toEqual({ apiKeys: { openai: 'enc:x' }, preferences: { lang: 'de' } });
  });

  it('gives up with StoreUnavailableError after repeated conflicts', async () => {
    const inner = new InMemAccountStore();
    await inner.create(makeAccount());

    const store: AccountStore = {
      get: vi.fn((email: string) => inner.get(email)),
      create: (account) => inner.create(account),
      update: () => Promise.resolve(undefined),
    };

    await expect(
      modifyAccount(store, 'alice@example.com', (current) => current),
    ).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(store.get).toHaveBeenCalledTimes(3);
  });
});
