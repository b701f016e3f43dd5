import {z} from 'zod';

export const cryptoErrorCodeSchema = z.enum([
  'invalid_input',
  'invalid_base64',
  'invalid_key_id',
  'invalid_nonce',
  'key_type_unsupported',
  'keystore_not_found',
  'key_not_found',
  'key_record_invalid',
  'passphrase_invalid',
  'seal_failed',
  'unseal_failed',
  'sign_failed',
  'verify_failed',
  'signature_invalid',
  'encrypt_failed',
  'decrypt_auth_failed'
]);

export type CryptoErrorCode = z.infer<typeof cryptoErrorCodeSchema>;

export type CryptoError = {
  code: CryptoErrorCode;
  message: string;
};

export type CryptoSuccess<T> = {
  ok: true;
  value: T;
};

export type CryptoFailure = {
  ok: false;
  error: CryptoError;
};

export type CryptoResult<T> = CryptoSuccess<T> | CryptoFailure;

export const ok = <T>(value: T): CryptoSuccess<T> => ({ok: true, value});

export const err = (code: CryptoErrorCode, message: string): CryptoFailure => ({
  ok: false,
  error: {code, message}
});

/**
 * Thrown by key managers, whose contract is promise-based rather than
 * result-based.
 */
export class KeyManagerError extends Error {
  public readonly code: CryptoErrorCode;

  public constructor(code: CryptoErrorCode, message: string) {
    super(message);
    this.name = 'KeyManagerError';
    this.code = code;
  }
}

export const isKeyManagerError = (value: unknown): value is KeyManagerError => value instanceof KeyManagerError;
