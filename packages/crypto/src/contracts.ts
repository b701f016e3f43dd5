import type {KeyObject} from 'node:crypto';

import {z} from 'zod';

import type {CryptoResult} from './errors.js';

export const KeyIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9._:-]+$/u);

export const SigningKeyTypeSchema = z.enum(['ED25519', 'ECDSAP256DER', 'ECDSAP384DER']);
export const AeadKeyTypeSchema = z.enum(['AES128GCM', 'AES256GCM']);
export const KeyTypeSchema = z.union([SigningKeyTypeSchema, AeadKeyTypeSchema]);

export type SigningKeyType = z.infer<typeof SigningKeyTypeSchema>;
export type AeadKeyType = z.infer<typeof AeadKeyTypeSchema>;
export type KeyType = z.infer<typeof KeyTypeSchema>;

export type SigningKeyHandle = {
  kind: 'signing';
  key_id: string;
  key_type: SigningKeyType;
  private_key: KeyObject;
  public_key: KeyObject;
};

export type AeadKeyHandle = {
  kind: 'aead';
  key_id: string;
  key_type: AeadKeyType;
  secret_key: KeyObject;
};

export type KeyHandle = SigningKeyHandle | AeadKeyHandle;

export type KeyManager = {
  readonly keystoreId: string;
  createKey: (keyType: string) => Promise<string>;
  getKey: (keyId: string) => Promise<KeyHandle>;
};

export type KeyManagerCreatorContext = {
  keystoreId: string;
  passphrase: string;
};

/**
 * Supplied by the embedding system. Unseals or derives the key manager for one
 * keystore; a bad passphrase, a missing keystore and a storage outage all
 * surface as a rejected promise.
 */
export type KeyManagerCreator = (context: KeyManagerCreatorContext) => Promise<KeyManager>;

export type SignInput = {
  key: KeyHandle;
  message: Uint8Array;
};

export type VerifyInput = {
  key: KeyHandle;
  signature: Uint8Array;
  message: Uint8Array;
};

export type EncryptInput = {
  key: KeyHandle;
  plaintext: Uint8Array;
  aad: Uint8Array;
};

export type EncryptOutput = {
  ciphertext: Uint8Array;
  nonce: Uint8Array;
};

export type DecryptInput = {
  key: KeyHandle;
  ciphertext: Uint8Array;
  aad: Uint8Array;
  nonce: Uint8Array;
};

/**
 * Stateless; one instance is shared by every request. A rejected signature is
 * reported as the `signature_invalid` failure code.
 */
export type CryptoEngine = {
  sign: (input: SignInput) => CryptoResult<Uint8Array>;
  verify: (input: VerifyInput) => CryptoResult<null>;
  encrypt: (input: EncryptInput) => CryptoResult<EncryptOutput>;
  decrypt: (input: DecryptInput) => CryptoResult<Uint8Array>;
};
