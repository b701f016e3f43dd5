import {z} from 'zod';

export const StoreNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9:_-]+$/u);

export const StoreKeySchema = z
  .string()
  .min(1)
  .max(512)
  .regex(/^[A-Za-z0-9:/._-]+$/u);

export type PutIfUnchangedInput = {
  key: string;
  /** `null` means the write only succeeds while the key is absent. */
  expected: Uint8Array | null;
  value: Uint8Array;
};

/**
 * Handle to a single named store. Values are opaque byte arrays.
 *
 * `putIfUnchanged` is the compare-and-swap primitive callers use to avoid
 * lost updates on read-modify-write cycles.
 */
export type StoreHandle = {
  readonly name: string;
  get: (key: string) => Promise<Uint8Array | null>;
  put: (key: string, value: Uint8Array) => Promise<void>;
  putIfAbsent: (key: string, value: Uint8Array) => Promise<boolean>;
  putIfUnchanged: (input: PutIfUnchangedInput) => Promise<boolean>;
};

export type CreateStoreResult = {
  created: boolean;
};

export type StorageProvider = {
  /** Idempotent: reports `created: false` when the store already exists. */
  createStore: (name: string) => Promise<CreateStoreResult>;
  /** Fails with `not_found` for a store that was never created. */
  openStore: (name: string) => Promise<StoreHandle>;
};
