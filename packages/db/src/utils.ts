import {randomUUID, timingSafeEqual} from 'node:crypto';

import {DbRepositoryError} from './errors.js';
import {StoreKeySchema, StoreNameSchema} from './contracts.js';

export const createDomainId = (prefix: string): string => `${prefix}${randomUUID().replace(/-/gu, '')}`;

export const parseStoreName = (value: string): string => {
  const parsed = StoreNameSchema.safeParse(value);
  if (!parsed.success) {
    throw new DbRepositoryError('validation_error', `Invalid store name: ${value}`);
  }

  return parsed.data;
};

export const parseStoreKey = (value: string): string => {
  const parsed = StoreKeySchema.safeParse(value);
  if (!parsed.success) {
    throw new DbRepositoryError('validation_error', `Invalid store key: ${value}`);
  }

  return parsed.data;
};

export const equalBytes = (left: Uint8Array, right: Uint8Array): boolean => {
  if (left.length !== right.length) {
    return false;
  }

  return timingSafeEqual(left, right);
};

export const copyBytes = (value: Uint8Array): Uint8Array => Uint8Array.from(value);
