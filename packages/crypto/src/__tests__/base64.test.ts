import {describe, expect, it} from 'vitest';

import {decodeBase64, decodeBase64Url, encodeBase64, encodeBase64Url} from '../index';

describe('base64url codec', () => {
  it('accepts padded and unpadded input', () => {
    expect(decodeBase64Url('aGk=')?.toString('utf8')).toBe('hi');
    expect(decodeBase64Url('aGk')?.toString('utf8')).toBe('hi');
  });

  it('rejects the standard alphabet', () => {
    expect(decodeBase64Url('a+8=')).toBeNull();
    expect(decodeBase64Url('a/8=')).toBeNull();
  });

  it('rejects non-canonical and truncated encodings', () => {
    expect(decodeBase64Url('aGl=')).toBeNull();
    expect(decodeBase64Url('a')).toBeNull();
    expect(decodeBase64Url('aGk==')).toBeNull();
    expect(decodeBase64Url('a Gk=')).toBeNull();
  });

  it('encodes with padding in the url-safe alphabet', () => {
    expect(encodeBase64Url(Buffer.from('hi'))).toBe('aGk=');
    expect(encodeBase64Url(new Uint8Array([0xfb, 0xff]))).toBe('-_8=');
    expect(encodeBase64Url(Buffer.from('abc'))).toBe('YWJj');
  });
});

describe('standard base64', () => {
  it('round trips stored values', () => {
    const encoded = encodeBase64(new Uint8Array([0xfb, 0xff]));
    expect(encoded).toBe('+/8=');
    expect(decodeBase64(encoded)).toEqual(Buffer.from([0xfb, 0xff]));
  });

  it('rejects unpadded or url-safe input', () => {
    expect(decodeBase64('+/8')).toBeNull();
    expect(decodeBase64('-_8=')).toBeNull();
    expect(decodeBase64('')).toBeNull();
  });
});
