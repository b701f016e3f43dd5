import type {StorageProvider, StoreHandle} from './contracts.js';
import {DbRepositoryError} from './errors.js';
import {copyBytes, equalBytes, parseStoreKey, parseStoreName} from './utils.js';

const createMemoryStoreHandle = (name: string, entries: Map<string, Uint8Array>): StoreHandle => ({
  name,
  get: async key => {
    const value = entries.get(parseStoreKey(key));
    return value ? copyBytes(value) : null;
  },
  put: async (key, value) => {
    entries.set(parseStoreKey(key), copyBytes(value));
  },
  putIfAbsent: async (key, value) => {
    const parsedKey = parseStoreKey(key);
    if (entries.has(parsedKey)) {
      return false;
    }

    entries.set(parsedKey, copyBytes(value));
    return true;
  },
  putIfUnchanged: async ({key, expected, value}) => {
    const parsedKey = parseStoreKey(key);
    const current = entries.get(parsedKey) ?? null;
    if (current === null || expected === null) {
      if (current !== expected) {
        return false;
      }
    } else if (!equalBytes(current, expected)) {
      return false;
    }

    entries.set(parsedKey, copyBytes(value));
    return true;
  }
});

export const createInMemoryStorageProvider = (): StorageProvider => {
  const stores = new Map<string, Map<string, Uint8Array>>();

  return {
    createStore: async name => {
      const storeName = parseStoreName(name);
      if (stores.has(storeName)) {
        return {created: false};
      }

      stores.set(storeName, new Map());
      return {created: true};
    },
    openStore: async name => {
      const storeName = parseStoreName(name);
      const entries = stores.get(storeName);
      if (!entries) {
        throw new DbRepositoryError('not_found', `Store ${storeName} does not exist`);
      }

      return createMemoryStoreHandle(storeName, entries);
    }
  };
};
