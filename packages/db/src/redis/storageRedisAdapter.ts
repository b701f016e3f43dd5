import {z} from 'zod';

import type {StorageProvider, StoreHandle} from '../contracts.js';
import {DbRepositoryError, mapStorageError} from '../errors.js';
import {parseStoreKey, parseStoreName} from '../utils.js';
import type {RedisEvalClient} from './types.js';

const PUT_IF_UNCHANGED_SCRIPT = `
local current = redis.call("GET", KEYS[1])
if ARGV[1] == "absent" then
  if current then
    return 0
  end
elseif current ~= ARGV[2] then
  return 0
end
redis.call("SET", KEYS[1], ARGV[3])
return 1
`;

const StoredValueSchema = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/u);

type StorageRedisAdapterOptions = {
  redisClient: RedisEvalClient;
  keyPrefix?: string;
};

const normalizeKeyPrefix = (prefix?: string): string => {
  const trimmed = prefix?.trim();
  if (!trimmed) {
    return 'kms:storage:';
  }

  return trimmed.endsWith(':') ? trimmed : `${trimmed}:`;
};

const encodeValue = (value: Uint8Array) => Buffer.from(value).toString('base64');

const decodeValue = ({raw, key}: {raw: string; key: string}): Uint8Array => {
  const parsed = StoredValueSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DbRepositoryError('unexpected_error', `Stored value for ${key} is not valid base64`);
  }

  return new Uint8Array(Buffer.from(parsed.data, 'base64'));
};

const storeMarkerKey = (prefix: string, storeName: string) => `${prefix}stores:v1:${storeName}`;

const entryKey = (prefix: string, storeName: string, key: string) => `${prefix}store:v1:${storeName}:${key}`;

const createRedisStoreHandle = ({
  redis,
  prefix,
  storeName
}: {
  redis: RedisEvalClient;
  prefix: string;
  storeName: string;
}): StoreHandle => ({
  name: storeName,
  get: async key => {
    const redisKey = entryKey(prefix, storeName, parseStoreKey(key));
    let raw: string | null;
    try {
      raw = await redis.get(redisKey);
    } catch (error) {
      return mapStorageError(error, 'read');
    }

    return raw === null ? null : decodeValue({raw, key});
  },
  put: async (key, value) => {
    const redisKey = entryKey(prefix, storeName, parseStoreKey(key));
    try {
      await redis.set(redisKey, encodeValue(value));
    } catch (error) {
      mapStorageError(error, 'write');
    }
  },
  putIfAbsent: async (key, value) => {
    const redisKey = entryKey(prefix, storeName, parseStoreKey(key));
    try {
      const result = await redis.set(redisKey, encodeValue(value), {NX: true});
      return result !== null;
    } catch (error) {
      return mapStorageError(error, 'write');
    }
  },
  putIfUnchanged: async ({key, expected, value}) => {
    const redisKey = entryKey(prefix, storeName, parseStoreKey(key));
    try {
      const result = await redis.eval(
        PUT_IF_UNCHANGED_SCRIPT,
        [redisKey],
        expected === null ? ['absent', '', encodeValue(value)] : ['match', encodeValue(expected), encodeValue(value)]
      );
      return Number(result) === 1;
    } catch (error) {
      return mapStorageError(error, 'compare-and-swap');
    }
  }
});

export const createRedisStorageProvider = ({redisClient, keyPrefix}: StorageRedisAdapterOptions): StorageProvider => {
  const prefix = normalizeKeyPrefix(keyPrefix);

  return {
    createStore: async name => {
      const storeName = parseStoreName(name);
      try {
        const result = await redisClient.set(storeMarkerKey(prefix, storeName), '1', {NX: true});
        return {created: result !== null};
      } catch (error) {
        return mapStorageError(error, 'create-store');
      }
    },
    openStore: async name => {
      const storeName = parseStoreName(name);
      let marker: string | null;
      try {
        marker = await redisClient.get(storeMarkerKey(prefix, storeName));
      } catch (error) {
        return mapStorageError(error, 'open-store');
      }

      if (marker === null) {
        throw new DbRepositoryError('not_found', `Store ${storeName} does not exist`);
      }

      return createRedisStoreHandle({redis: redisClient, prefix, storeName});
    }
  };
};
