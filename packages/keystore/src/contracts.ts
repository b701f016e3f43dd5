import type {CryptoEngine, KeyManager} from '@kms-gateway/crypto';
import {z} from 'zod';

export const KeystoreIdSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9_-]+$/u);

export const ControllerSchema = z.string().trim().min(1);

export const KeystoreSchema = z
  .object({
    id: KeystoreIdSchema,
    controller: ControllerSchema,
    key_ids: z.array(z.string().min(1)),
    created_at: z.string().datetime()
  })
  .strict();

export type Keystore = z.infer<typeof KeystoreSchema>;

export type AppendKeyIdInput = {
  keystoreId: string;
  keyId: string;
};

export type KeystoreRepository = {
  create: (controller: string) => Promise<string>;
  get: (keystoreId: string) => Promise<Keystore>;
  exists: (keystoreId: string) => Promise<boolean>;
  /** Unconditional overwrite. Key creation goes through `appendKeyId` instead. */
  update: (keystore: Keystore) => Promise<void>;
  appendKeyId: (input: AppendKeyIdInput) => Promise<Keystore>;
};

export type KeystoreRepositoryFactory = {
  open: () => Promise<KeystoreRepository>;
};

/** Request-scoped; built per request and dropped when the response is written. */
export type ProviderBundle = {
  keystoreRepository: KeystoreRepository;
  keyManager: KeyManager;
  crypto: CryptoEngine;
};

export type ServiceFailure = {
  ok: false;
  error: {
    code: string;
    message: string;
  };
};

export type ServiceResult<T> = {ok: true; value: T} | ServiceFailure;

export type VerifyOutcome =
  | {status: 'verified'}
  | {status: 'rejected'; reason: string}
  | {status: 'failed'; reason: string};
