const BASE64URL_REGEX = /^[A-Za-z0-9_-]*={0,2}$/u;
const BASE64_PAD_MOD = 4;

/**
 * Accepts padded and unpadded base64url, rejects the standard alphabet and
 * any non-canonical encoding.
 */
export const decodeBase64Url = (value: string): Buffer | null => {
  if (!BASE64URL_REGEX.test(value)) {
    return null;
  }

  const unpadded = value.replace(/=+$/u, '');
  const remainder = unpadded.length % BASE64_PAD_MOD;
  if (remainder === 1) {
    return null;
  }

  if (value.length !== unpadded.length && value.length % BASE64_PAD_MOD !== 0) {
    return null;
  }

  const decoded = Buffer.from(unpadded, 'base64url');
  if (decoded.toString('base64url') !== unpadded) {
    return null;
  }

  return decoded;
};

/** Padded base64url, matching the URL-safe alphabet with `=` padding. */
export const encodeBase64Url = (value: Uint8Array): string => {
  const unpadded = Buffer.from(value).toString('base64url');
  const remainder = unpadded.length % BASE64_PAD_MOD;
  return remainder === 0 ? unpadded : `${unpadded}${'='.repeat(BASE64_PAD_MOD - remainder)}`;
};

export const encodeBase64 = (value: Uint8Array) => Buffer.from(value).toString('base64');

export const decodeBase64 = (value: string): Buffer | null => {
  if (!/^[A-Za-z0-9+/]+={0,2}$/u.test(value) || value.length % BASE64_PAD_MOD !== 0) {
    return null;
  }

  const decoded = Buffer.from(value, 'base64');
  return decoded.toString('base64') === value ? decoded : null;
};
