import {
  createPrivateKey,
  createPublicKey,
  createSecretKey,
  generateKeyPairSync,
  randomBytes,
  scrypt,
  type KeyObject
} from 'node:crypto';

import {createDomainId, type StorageProvider, type StoreHandle} from '@kms-gateway/db';
import {z} from 'zod';

import {decodeBase64, encodeBase64} from './base64.js';
import {
  KeyIdSchema,
  KeyTypeSchema,
  SigningKeyTypeSchema,
  type AeadKeyType,
  type KeyHandle,
  type KeyManager,
  type KeyManagerCreator,
  type KeyType,
  type SigningKeyType
} from './contracts.js';
import {KeyManagerError, type CryptoResult} from './errors.js';
import {WRAPPING_KEY_BYTES, openSealedBytes, sealBytes} from './sealing.js';

export const DEFAULT_KEY_STORE_NAME = 'kms_keys';
export const DEFAULT_SCRYPT_COST = 16_384;

const SCRYPT_BLOCK_SIZE = 8;
const SCRYPT_PARALLELIZATION = 1;
const SCRYPT_MAX_MEMORY_BYTES = 256 * 1024 * 1024;
const SALT_BYTES = 16;
const SEAL_CHECK_VALUE = 'kms-gateway:seal-check:v1';

const aeadKeyLengths = {
  AES128GCM: 16,
  AES256GCM: 32
} as const satisfies Record<AeadKeyType, number>;

const SealRecordSchema = z
  .object({
    version: z.literal(1),
    kdf: z.literal('scrypt'),
    cost: z.number().int().positive(),
    salt_b64: z.string().min(1),
    check_b64: z.string().min(1)
  })
  .strict();

type SealRecord = z.infer<typeof SealRecordSchema>;

const KeyRecordSchema = z
  .object({
    version: z.literal(1),
    key_id: KeyIdSchema,
    key_type: KeyTypeSchema,
    created_at: z.string().datetime(),
    sealed_b64: z.string().min(1)
  })
  .strict();

type KeyRecord = z.infer<typeof KeyRecordSchema>;

export type LocalKeyManagerCreatorOptions = {
  storageProvider: StorageProvider;
  keystoreExists: (keystoreId: string) => Promise<boolean>;
  storeName?: string;
  scryptCost?: number;
  now?: () => Date;
};

const encodeJson = (value: unknown) => new TextEncoder().encode(JSON.stringify(value));

const decodeJson = <TSchema extends z.ZodTypeAny>({
  bytes,
  schema,
  description
}: {
  bytes: Uint8Array;
  schema: TSchema;
  description: string;
}): z.infer<TSchema> => {
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder().decode(bytes));
  } catch {
    throw new KeyManagerError('key_record_invalid', `${description} is not valid JSON`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new KeyManagerError('key_record_invalid', `${description} is malformed`);
  }

  return parsed.data;
};

const unwrap = <T>(result: CryptoResult<T>): T => {
  if (!result.ok) {
    throw new KeyManagerError(result.error.code, result.error.message);
  }

  return result.value;
};

const decodeStoredBase64 = (value: string, description: string) => {
  const decoded = decodeBase64(value);
  if (!decoded) {
    throw new KeyManagerError('key_record_invalid', `${description} is not valid base64`);
  }

  return decoded;
};

const deriveWrappingKey = ({passphrase, salt, cost}: {passphrase: string; salt: Uint8Array; cost: number}) =>
  new Promise<Buffer>((resolve, reject) => {
    scrypt(
      passphrase,
      salt,
      WRAPPING_KEY_BYTES,
      {N: cost, r: SCRYPT_BLOCK_SIZE, p: SCRYPT_PARALLELIZATION, maxmem: SCRYPT_MAX_MEMORY_BYTES},
      (error, derivedKey) => {
        if (error) {
          reject(error);
          return;
        }

        resolve(derivedKey);
      }
    );
  });

const sealCheckAad = (keystoreId: string) => new TextEncoder().encode(`seal-check:${keystoreId}`);

const keyMaterialAad = ({keystoreId, keyId, keyType}: {keystoreId: string; keyId: string; keyType: KeyType}) =>
  new TextEncoder().encode(`key-material:${keystoreId}:${keyId}:${keyType}`);

const sealRecordKey = (keystoreId: string) => `${keystoreId}/seal`;

const keyRecordKey = (keystoreId: string, keyId: string) => `${keystoreId}/keys/${keyId}`;

const mintKeyId = (): string => {
  const parsed = KeyIdSchema.safeParse(createDomainId('kid_'));
  if (!parsed.success) {
    throw new KeyManagerError('invalid_key_id', 'generated key id is invalid');
  }

  return parsed.data;
};

const generateKeyMaterial = (keyType: KeyType): Buffer => {
  switch (keyType) {
    case 'ED25519':
      return generateKeyPairSync('ed25519').privateKey.export({format: 'der', type: 'pkcs8'});
    case 'ECDSAP256DER':
      return generateKeyPairSync('ec', {namedCurve: 'P-256'}).privateKey.export({format: 'der', type: 'pkcs8'});
    case 'ECDSAP384DER':
      return generateKeyPairSync('ec', {namedCurve: 'P-384'}).privateKey.export({format: 'der', type: 'pkcs8'});
    case 'AES128GCM':
    case 'AES256GCM':
      return randomBytes(aeadKeyLengths[keyType]);
  }
};

const toKeyHandle = ({keyId, keyType, material}: {keyId: string; keyType: KeyType; material: Buffer}): KeyHandle => {
  const signingType = SigningKeyTypeSchema.safeParse(keyType);
  if (signingType.success) {
    const privateKey: KeyObject = createPrivateKey({key: material, format: 'der', type: 'pkcs8'});
    return {
      kind: 'signing',
      key_id: keyId,
      key_type: signingType.data satisfies SigningKeyType,
      private_key: privateKey,
      public_key: createPublicKey(privateKey)
    };
  }

  if (keyType === 'AES128GCM' || keyType === 'AES256GCM') {
    return {
      kind: 'aead',
      key_id: keyId,
      key_type: keyType,
      secret_key: createSecretKey(material)
    };
  }

  throw new KeyManagerError('key_type_unsupported', `unsupported key type: ${keyType}`);
};

const openOrEstablishSeal = async ({
  store,
  keystoreId,
  passphrase,
  cost
}: {
  store: StoreHandle;
  keystoreId: string;
  passphrase: string;
  cost: number;
}): Promise<Buffer> => {
  const existing = await store.get(sealRecordKey(keystoreId));
  if (existing) {
    const record: SealRecord = decodeJson({bytes: existing, schema: SealRecordSchema, description: 'seal record'});
    const wrappingKey = await deriveWrappingKey({
      passphrase,
      salt: decodeStoredBase64(record.salt_b64, 'seal salt'),
      cost: record.cost
    });
    const check = openSealedBytes({
      wrappingKey,
      sealed: decodeStoredBase64(record.check_b64, 'seal check'),
      aad: sealCheckAad(keystoreId)
    });
    if (!check.ok || check.value.toString('utf8') !== SEAL_CHECK_VALUE) {
      throw new KeyManagerError('passphrase_invalid', `invalid passphrase for keystore ${keystoreId}`);
    }

    return wrappingKey;
  }

  const salt = randomBytes(SALT_BYTES);
  const wrappingKey = await deriveWrappingKey({passphrase, salt, cost});
  const check = unwrap(
    sealBytes({
      wrappingKey,
      plaintext: Buffer.from(SEAL_CHECK_VALUE, 'utf8'),
      aad: sealCheckAad(keystoreId)
    })
  );
  const record: SealRecord = {
    version: 1,
    kdf: 'scrypt',
    cost,
    salt_b64: encodeBase64(salt),
    check_b64: encodeBase64(check)
  };

  const written = await store.putIfAbsent(sealRecordKey(keystoreId), encodeJson(record));
  if (!written) {
    // Another request sealed this keystore first; its passphrase is authoritative.
    return openOrEstablishSeal({store, keystoreId, passphrase, cost});
  }

  return wrappingKey;
};

/**
 * Key manager backed by the shared storage provider. Key material is sealed
 * with a wrapping key derived from the keystore passphrase; the first
 * passphrase used for a keystore becomes its passphrase.
 */
export const createLocalKeyManagerCreator = ({
  storageProvider,
  keystoreExists,
  storeName = DEFAULT_KEY_STORE_NAME,
  scryptCost = DEFAULT_SCRYPT_COST,
  now = () => new Date()
}: LocalKeyManagerCreatorOptions): KeyManagerCreator => {
  return async ({keystoreId, passphrase}) => {
    if (!(await keystoreExists(keystoreId))) {
      throw new KeyManagerError('keystore_not_found', `keystore ${keystoreId} not found`);
    }

    await storageProvider.createStore(storeName);
    const store = await storageProvider.openStore(storeName);
    const wrappingKey = await openOrEstablishSeal({store, keystoreId, passphrase, cost: scryptCost});

    const keyManager: KeyManager = {
      keystoreId,
      createKey: async rawKeyType => {
        const parsedKeyType = KeyTypeSchema.safeParse(rawKeyType);
        if (!parsedKeyType.success) {
          throw new KeyManagerError('key_type_unsupported', `unsupported key type: ${rawKeyType}`);
        }

        const keyType = parsedKeyType.data;
        const keyId = mintKeyId();
        const material = generateKeyMaterial(keyType);
        try {
          const sealed = unwrap(
            sealBytes({wrappingKey, plaintext: material, aad: keyMaterialAad({keystoreId, keyId, keyType})})
          );
          const record: KeyRecord = {
            version: 1,
            key_id: keyId,
            key_type: keyType,
            created_at: now().toISOString(),
            sealed_b64: encodeBase64(sealed)
          };

          const written = await store.putIfAbsent(keyRecordKey(keystoreId, keyId), encodeJson(record));
          if (!written) {
            throw new KeyManagerError('invalid_key_id', `key ${keyId} already exists`);
          }
        } finally {
          material.fill(0);
        }

        return keyId;
      },
      getKey: async rawKeyId => {
        const parsedKeyId = KeyIdSchema.safeParse(rawKeyId);
        if (!parsedKeyId.success) {
          throw new KeyManagerError('invalid_key_id', `invalid key id: ${rawKeyId}`);
        }

        const keyId = parsedKeyId.data;
        const stored = await store.get(keyRecordKey(keystoreId, keyId));
        if (!stored) {
          throw new KeyManagerError('key_not_found', `key ${keyId} not found in keystore ${keystoreId}`);
        }

        const record: KeyRecord = decodeJson({bytes: stored, schema: KeyRecordSchema, description: 'key record'});
        const material = unwrap(
          openSealedBytes({
            wrappingKey,
            sealed: decodeStoredBase64(record.sealed_b64, 'key material'),
            aad: keyMaterialAad({keystoreId, keyId, keyType: record.key_type})
          })
        );

        try {
          return toKeyHandle({keyId, keyType: record.key_type, material});
        } finally {
          material.fill(0);
        }
      }
    };

    return keyManager;
  };
};
