import type {CryptoResult, EncryptOutput, KeyHandle} from '@kms-gateway/crypto';

import type {ProviderBundle, ServiceResult, VerifyOutcome} from './contracts.js';
import {describeError, toServiceFailure} from './errors.js';

export type KeyService = {
  createKey: (keyType: string) => Promise<ServiceResult<string>>;
  sign: (input: {keyId: string; message: Uint8Array}) => Promise<ServiceResult<Uint8Array>>;
  verify: (input: {keyId: string; signature: Uint8Array; message: Uint8Array}) => Promise<VerifyOutcome>;
  encrypt: (input: {keyId: string; plaintext: Uint8Array; aad: Uint8Array}) => Promise<ServiceResult<EncryptOutput>>;
  decrypt: (input: {
    keyId: string;
    ciphertext: Uint8Array;
    aad: Uint8Array;
    nonce: Uint8Array;
  }) => Promise<ServiceResult<Uint8Array>>;
};

type KeyLookup = {ok: true; key: KeyHandle} | {ok: false; reason: unknown};

export const createKeyService = ({keystoreRepository, keyManager, crypto}: ProviderBundle): KeyService => {
  const lookupKey = async (keyId: string): Promise<KeyLookup> => {
    try {
      return {ok: true, key: await keyManager.getKey(keyId)};
    } catch (error) {
      return {ok: false, reason: error};
    }
  };

  const withKey = async <T>(
    keyId: string,
    operation: (key: KeyHandle) => CryptoResult<T>
  ): Promise<ServiceResult<T>> => {
    const lookup = await lookupKey(keyId);
    if (!lookup.ok) {
      return toServiceFailure(lookup.reason);
    }

    const result = operation(lookup.key);
    return result.ok ? {ok: true, value: result.value} : {ok: false, error: result.error};
  };

  return {
    createKey: async keyType => {
      try {
        const keyId = await keyManager.createKey(keyType);
        await keystoreRepository.appendKeyId({keystoreId: keyManager.keystoreId, keyId});
        return {ok: true, value: keyId};
      } catch (error) {
        return toServiceFailure(error);
      }
    },
    sign: ({keyId, message}) => withKey(keyId, key => crypto.sign({key, message})),
    verify: async ({keyId, signature, message}) => {
      const lookup = await lookupKey(keyId);
      if (!lookup.ok) {
        return {status: 'failed', reason: describeError(lookup.reason)};
      }

      const result = crypto.verify({key: lookup.key, signature, message});
      if (result.ok) {
        return {status: 'verified'};
      }

      // The only outcome that is a cryptographic rejection rather than an operational failure.
      if (result.error.code === 'signature_invalid') {
        return {status: 'rejected', reason: result.error.message};
      }

      return {status: 'failed', reason: result.error.message};
    },
    encrypt: ({keyId, plaintext, aad}) => withKey(keyId, key => crypto.encrypt({key, plaintext, aad})),
    decrypt: ({keyId, ciphertext, aad, nonce}) =>
      withKey(keyId, key => crypto.decrypt({key, ciphertext, aad, nonce}))
  };
};
