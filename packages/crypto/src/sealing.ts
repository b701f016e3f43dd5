import {createCipheriv, createDecipheriv, randomBytes} from 'node:crypto';

import {err, ok, type CryptoResult} from './errors.js';

export const WRAPPING_KEY_BYTES = 32;
const SEAL_IV_BYTES = 12;
const SEAL_TAG_BYTES = 16;

// Layout: iv || auth tag || ciphertext, AES-256-GCM under the wrapping key.
export const sealBytes = ({
  wrappingKey,
  plaintext,
  aad
}: {
  wrappingKey: Uint8Array;
  plaintext: Uint8Array;
  aad: Uint8Array;
}): CryptoResult<Buffer> => {
  if (wrappingKey.length !== WRAPPING_KEY_BYTES) {
    return err('invalid_input', `wrapping key must be exactly ${WRAPPING_KEY_BYTES} bytes`);
  }

  try {
    const iv = randomBytes(SEAL_IV_BYTES);
    const cipher = createCipheriv('aes-256-gcm', wrappingKey, iv);
    cipher.setAAD(aad);
    const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return ok(Buffer.concat([iv, cipher.getAuthTag(), encrypted]));
  } catch {
    return err('seal_failed', 'Unable to seal key material');
  }
};

export const openSealedBytes = ({
  wrappingKey,
  sealed,
  aad
}: {
  wrappingKey: Uint8Array;
  sealed: Uint8Array;
  aad: Uint8Array;
}): CryptoResult<Buffer> => {
  if (sealed.length <= SEAL_IV_BYTES + SEAL_TAG_BYTES) {
    return err('unseal_failed', 'sealed payload is too short');
  }

  const payload = Buffer.from(sealed);
  const iv = payload.subarray(0, SEAL_IV_BYTES);
  const authTag = payload.subarray(SEAL_IV_BYTES, SEAL_IV_BYTES + SEAL_TAG_BYTES);
  const encrypted = payload.subarray(SEAL_IV_BYTES + SEAL_TAG_BYTES);

  try {
    const decipher = createDecipheriv('aes-256-gcm', wrappingKey, iv);
    decipher.setAAD(aad);
    decipher.setAuthTag(authTag);
    return ok(Buffer.concat([decipher.update(encrypted), decipher.final()]));
  } catch {
    return err('unseal_failed', 'Unable to unseal key material');
  }
};
