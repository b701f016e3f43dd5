import {createDomainId, type StorageProvider, type StoreHandle} from '@kms-gateway/db';

import {
  ControllerSchema,
  KeystoreIdSchema,
  KeystoreSchema,
  type Keystore,
  type KeystoreRepository,
  type KeystoreRepositoryFactory
} from './contracts.js';
import {KeystoreRepositoryError, describeError} from './errors.js';
import {createKeyedLock, type KeyedLock} from './keyedLock.js';

export const DEFAULT_KEYSTORE_STORE_NAME = 'keystore';
export const DEFAULT_MAX_APPEND_ATTEMPTS = 16;

export type KeystoreRepositoryFactoryOptions = {
  storageProvider: StorageProvider;
  storeName?: string;
  /** Shared by every repository the factory opens so appends in this process queue per keystore. */
  appendLock?: KeyedLock;
  maxAppendAttempts?: number;
  now?: () => Date;
};

type StoredKeystore = {
  keystore: Keystore;
  raw: Uint8Array;
};

const encodeKeystore = (keystore: Keystore) => new TextEncoder().encode(JSON.stringify(keystore));

const decodeKeystore = ({keystoreId, raw}: {keystoreId: string; raw: Uint8Array}): Keystore => {
  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(new TextDecoder('utf-8', {fatal: true}).decode(raw));
  } catch (error) {
    throw new KeystoreRepositoryError(
      'decode_failure',
      `keystore ${keystoreId} record is not valid JSON: ${describeError(error)}`
    );
  }

  const parsed = KeystoreSchema.safeParse(parsedJson);
  if (!parsed.success) {
    throw new KeystoreRepositoryError('decode_failure', `keystore ${keystoreId} record is malformed`);
  }

  return parsed.data;
};

const withStorage = async <T>(operation: string, action: () => Promise<T>): Promise<T> => {
  try {
    return await action();
  } catch (error) {
    throw new KeystoreRepositoryError('storage_failure', `failed to ${operation}: ${describeError(error)}`);
  }
};

const parseKeystoreId = (keystoreId: string) => {
  const parsed = KeystoreIdSchema.safeParse(keystoreId);
  if (!parsed.success) {
    throw new KeystoreRepositoryError('not_found', `keystore ${keystoreId} not found`);
  }

  return parsed.data;
};

const createRepository = ({
  store,
  appendLock,
  maxAppendAttempts,
  now
}: {
  store: StoreHandle;
  appendLock: KeyedLock;
  maxAppendAttempts: number;
  now: () => Date;
}): KeystoreRepository => {
  const read = async (rawKeystoreId: string): Promise<StoredKeystore> => {
    const keystoreId = parseKeystoreId(rawKeystoreId);
    const raw = await withStorage('read keystore', () => store.get(keystoreId));
    if (raw === null) {
      throw new KeystoreRepositoryError('not_found', `keystore ${keystoreId} not found`);
    }

    return {keystore: decodeKeystore({keystoreId, raw}), raw};
  };

  const get = async (keystoreId: string) => (await read(keystoreId)).keystore;

  return {
    create: async rawController => {
      const controller = ControllerSchema.safeParse(rawController);
      if (!controller.success) {
        throw new KeystoreRepositoryError('invalid_input', 'controller must be a non-empty string');
      }

      const keystore: Keystore = {
        id: createDomainId('ks_'),
        controller: controller.data,
        key_ids: [],
        created_at: now().toISOString()
      };

      const written = await withStorage('create keystore', () =>
        store.putIfAbsent(keystore.id, encodeKeystore(keystore))
      );
      if (!written) {
        throw new KeystoreRepositoryError('conflict', `keystore ${keystore.id} already exists`);
      }

      return keystore.id;
    },
    get,
    exists: async keystoreId => {
      try {
        await get(keystoreId);
        return true;
      } catch (error) {
        if (error instanceof KeystoreRepositoryError && error.code === 'not_found') {
          return false;
        }

        throw error;
      }
    },
    update: async keystore => {
      const parsed = KeystoreSchema.safeParse(keystore);
      if (!parsed.success) {
        throw new KeystoreRepositoryError('invalid_input', 'keystore record is malformed');
      }

      await withStorage('update keystore', () => store.put(parsed.data.id, encodeKeystore(parsed.data)));
    },
    appendKeyId: ({keystoreId, keyId}) =>
      appendLock.runExclusive(keystoreId, async () => {
        for (let attempt = 0; attempt < maxAppendAttempts; attempt += 1) {
          const current = await read(keystoreId);
          if (current.keystore.key_ids.includes(keyId)) {
            return current.keystore;
          }

          const next: Keystore = {...current.keystore, key_ids: [...current.keystore.key_ids, keyId]};
          const swapped = await withStorage('update keystore', () =>
            store.putIfUnchanged({key: next.id, expected: current.raw, value: encodeKeystore(next)})
          );
          if (swapped) {
            return next;
          }
        }

        throw new KeystoreRepositoryError(
          'conflict',
          `keystore ${keystoreId} kept changing during ${maxAppendAttempts} append attempts`
        );
      })
  };
};

export const createKeystoreRepositoryFactory = ({
  storageProvider,
  storeName = DEFAULT_KEYSTORE_STORE_NAME,
  appendLock = createKeyedLock(),
  maxAppendAttempts = DEFAULT_MAX_APPEND_ATTEMPTS,
  now = () => new Date()
}: KeystoreRepositoryFactoryOptions): KeystoreRepositoryFactory => ({
  open: async () => {
    const store = await withStorage(`open store ${storeName}`, async () => {
      await storageProvider.createStore(storeName);
      return storageProvider.openStore(storeName);
    });

    return createRepository({store, appendLock, maxAppendAttempts, now});
  }
});
