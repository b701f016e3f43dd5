import {createCipheriv, createDecipheriv, randomBytes, sign, verify} from 'node:crypto';

import type {AeadKeyType, CryptoEngine, KeyHandle, SigningKeyType} from './contracts.js';
import {err, ok} from './errors.js';

const AEAD_NONCE_BYTES = 12;
const AEAD_TAG_BYTES = 16;
const MAX_MESSAGE_BYTES = 1_048_576;
const MAX_AAD_BYTES = 16_384;

const aeadAlgorithms = {
  AES128GCM: 'aes-128-gcm',
  AES256GCM: 'aes-256-gcm'
} as const satisfies Record<AeadKeyType, string>;

// Ed25519 hashes internally, so node:crypto takes no digest for it.
const signingDigests = {
  ED25519: null,
  ECDSAP256DER: 'sha256',
  ECDSAP384DER: 'sha384'
} as const satisfies Record<SigningKeyType, string | null>;

const describeKey = (key: KeyHandle) => `key ${key.key_id} of type ${key.key_type}`;

export const createCryptoEngine = (): CryptoEngine => ({
  sign: ({key, message}) => {
    if (key.kind !== 'signing') {
      return err('key_type_unsupported', `${describeKey(key)} cannot sign`);
    }

    if (message.length > MAX_MESSAGE_BYTES) {
      return err('invalid_input', `message must be at most ${MAX_MESSAGE_BYTES} bytes`);
    }

    try {
      return ok(new Uint8Array(sign(signingDigests[key.key_type], message, key.private_key)));
    } catch {
      return err('sign_failed', `Unable to sign with ${describeKey(key)}`);
    }
  },
  verify: ({key, signature, message}) => {
    if (key.kind !== 'signing') {
      return err('key_type_unsupported', `${describeKey(key)} cannot verify`);
    }

    let valid: boolean;
    try {
      valid = verify(signingDigests[key.key_type], message, key.public_key, signature);
    } catch {
      return err('verify_failed', `Unable to verify with ${describeKey(key)}`);
    }

    return valid ? ok(null) : err('signature_invalid', 'invalid signature');
  },
  encrypt: ({key, plaintext, aad}) => {
    if (key.kind !== 'aead') {
      return err('key_type_unsupported', `${describeKey(key)} cannot encrypt`);
    }

    if (plaintext.length > MAX_MESSAGE_BYTES) {
      return err('invalid_input', `message must be at most ${MAX_MESSAGE_BYTES} bytes`);
    }

    if (aad.length > MAX_AAD_BYTES) {
      return err('invalid_input', `aad must be at most ${MAX_AAD_BYTES} bytes`);
    }

    try {
      const nonce = randomBytes(AEAD_NONCE_BYTES);
      const cipher = createCipheriv(aeadAlgorithms[key.key_type], key.secret_key, nonce);
      cipher.setAAD(aad);
      const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
      return ok({
        ciphertext: new Uint8Array(Buffer.concat([encrypted, cipher.getAuthTag()])),
        nonce: new Uint8Array(nonce)
      });
    } catch {
      return err('encrypt_failed', `Unable to encrypt with ${describeKey(key)}`);
    }
  },
  decrypt: ({key, ciphertext, aad, nonce}) => {
    if (key.kind !== 'aead') {
      return err('key_type_unsupported', `${describeKey(key)} cannot decrypt`);
    }

    if (nonce.length !== AEAD_NONCE_BYTES) {
      return err('invalid_nonce', `nonce must be exactly ${AEAD_NONCE_BYTES} bytes`);
    }

    if (ciphertext.length < AEAD_TAG_BYTES) {
      return err('invalid_input', 'cipher text is too short');
    }

    const payload = Buffer.from(ciphertext);
    const encrypted = payload.subarray(0, payload.length - AEAD_TAG_BYTES);
    const authTag = payload.subarray(payload.length - AEAD_TAG_BYTES);

    try {
      const decipher = createDecipheriv(aeadAlgorithms[key.key_type], key.secret_key, nonce);
      decipher.setAAD(aad);
      decipher.setAuthTag(authTag);
      return ok(new Uint8Array(Buffer.concat([decipher.update(encrypted), decipher.final()])));
    } catch {
      return err('decrypt_auth_failed', 'message authentication failed');
    }
  }
});
