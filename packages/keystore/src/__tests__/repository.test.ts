import {
  createInMemoryStorageProvider,
  DbRepositoryError,
  type StorageProvider,
  type StoreHandle
} from '@kms-gateway/db';
import {describe, expect, it} from 'vitest';

import {createKeystoreRepositoryFactory, isKeystoreRepositoryError, type KeystoreRepository} from '../index';

const fixedNow = () => new Date('2026-01-01T00:00:00.000Z');

const yieldToEventLoop = () => new Promise<void>(resolve => setImmediate(resolve));

// Reads yield before resolving so overlapping read-modify-write cycles interleave.
const withSlowReads = (provider: StorageProvider): StorageProvider => ({
  createStore: name => provider.createStore(name),
  openStore: async name => {
    const store = await provider.openStore(name);
    const slowStore: StoreHandle = {
      ...store,
      get: async key => {
        const value = await store.get(key);
        await yieldToEventLoop();
        return value;
      }
    };
    return slowStore;
  }
});

const openRepository = (storageProvider: StorageProvider = createInMemoryStorageProvider()) =>
  createKeystoreRepositoryFactory({storageProvider, now: fixedNow}).open();

const captureErrorCode = async (operation: Promise<unknown>) => {
  try {
    await operation;
  } catch (error) {
    return isKeystoreRepositoryError(error) ? error.code : 'not_a_repository_error';
  }

  throw new Error('expected the operation to fail');
};

const appendMany = (repository: KeystoreRepository, keystoreId: string, keyIds: string[]) =>
  Promise.all(keyIds.map(keyId => repository.appendKeyId({keystoreId, keyId})));

describe('keystore repository', () => {
  it('creates keystores with fresh ids and an empty key list', async () => {
    const repository = await openRepository();

    const first = await repository.create('did:example:123');
    const second = await repository.create('did:example:123');

    expect(first).toMatch(/^ks_[0-9a-f]{32}$/u);
    expect(second).not.toBe(first);
    await expect(repository.get(first)).resolves.toEqual({
      id: first,
      controller: 'did:example:123',
      key_ids: [],
      created_at: '2026-01-01T00:00:00.000Z'
    });
  });

  it('rejects an empty controller', async () => {
    const repository = await openRepository();

    expect(await captureErrorCode(repository.create('  '))).toBe('invalid_input');
  });

  it('reports unknown and malformed ids as not found', async () => {
    const repository = await openRepository();

    expect(await captureErrorCode(repository.get('ks_missing'))).toBe('not_found');
    expect(await captureErrorCode(repository.get('../etc'))).toBe('not_found');
    await expect(repository.exists('ks_missing')).resolves.toBe(false);
  });

  it('reports undecodable records as decode failures', async () => {
    const storageProvider = createInMemoryStorageProvider();
    const repository = await openRepository(storageProvider);
    const store = await storageProvider.openStore('keystore');

    await store.put('ks_broken', new TextEncoder().encode('{not json'));
    await store.put('ks_partial', new TextEncoder().encode(JSON.stringify({id: 'ks_partial'})));

    expect(await captureErrorCode(repository.get('ks_broken'))).toBe('decode_failure');
    expect(await captureErrorCode(repository.get('ks_partial'))).toBe('decode_failure');
  });

  it('wraps storage errors as storage failures', async () => {
    const failingProvider: StorageProvider = {
      createStore: async () => {
        throw new DbRepositoryError('unexpected_error', 'Storage create-store failed: connection refused');
      },
      openStore: async () => {
        throw new DbRepositoryError('not_found', 'Store keystore does not exist');
      }
    };

    const failure = await createKeystoreRepositoryFactory({storageProvider: failingProvider})
      .open()
      .then(
        () => undefined,
        (error: unknown) => error
      );

    expect(isKeystoreRepositoryError(failure) ? [failure.code, failure.message] : []).toEqual([
      'storage_failure',
      'failed to open store keystore: Storage create-store failed: connection refused'
    ]);
  });

  it('overwrites records on update', async () => {
    const repository = await openRepository();
    const keystoreId = await repository.create('did:example:123');
    const keystore = await repository.get(keystoreId);

    await repository.update({...keystore, controller: 'did:example:456'});

    expect((await repository.get(keystoreId)).controller).toBe('did:example:456');
  });

  it('ignores an append of an id that is already present', async () => {
    const repository = await openRepository();
    const keystoreId = await repository.create('did:example:123');

    await repository.appendKeyId({keystoreId, keyId: 'kid_1'});
    const keystore = await repository.appendKeyId({keystoreId, keyId: 'kid_1'});

    expect(keystore.key_ids).toEqual(['kid_1']);
  });

  it('keeps every id when appends for one keystore overlap', async () => {
    const repository = await openRepository(withSlowReads(createInMemoryStorageProvider()));
    const keystoreId = await repository.create('did:example:123');
    await repository.appendKeyId({keystoreId, keyId: 'kid_0'});

    const keyIds = Array.from({length: 20}, (_, index) => `kid_${index + 1}`);
    await appendMany(repository, keystoreId, keyIds);

    const keystore = await repository.get(keystoreId);
    expect(keystore.key_ids).toHaveLength(21);
    expect([...keystore.key_ids].sort()).toEqual(['kid_0', ...keyIds].sort());
  });

  it('keeps every id when writers without a shared lock race on one store', async () => {
    const storageProvider = withSlowReads(createInMemoryStorageProvider());
    const first = await openRepository(storageProvider);
    const second = await openRepository(storageProvider);
    const keystoreId = await first.create('did:example:123');

    await Promise.all([
      appendMany(first, keystoreId, ['kid_a1', 'kid_a2', 'kid_a3', 'kid_a4']),
      appendMany(second, keystoreId, ['kid_b1', 'kid_b2', 'kid_b3', 'kid_b4'])
    ]);

    const keystore = await first.get(keystoreId);
    expect([...keystore.key_ids].sort()).toEqual([
      'kid_a1',
      'kid_a2',
      'kid_a3',
      'kid_a4',
      'kid_b1',
      'kid_b2',
      'kid_b3',
      'kid_b4'
    ]);
  });

  it('gives up with a conflict when the record never stops changing', async () => {
    const storageProvider = createInMemoryStorageProvider();
    let swapAttempts = 0;
    const contendedProvider: StorageProvider = {
      createStore: name => storageProvider.createStore(name),
      openStore: async name => {
        const store = await storageProvider.openStore(name);
        return {
          ...store,
          putIfUnchanged: async () => {
            swapAttempts += 1;
            return false;
          }
        };
      }
    };

    const repository = await createKeystoreRepositoryFactory({
      storageProvider: contendedProvider,
      maxAppendAttempts: 4
    }).open();
    const keystoreId = await repository.create('did:example:123');

    expect(await captureErrorCode(repository.appendKeyId({keystoreId, keyId: 'kid_1'}))).toBe('conflict');
    expect(swapAttempts).toBe(4);
  });
});
