export * from './contracts.js';
export * from './errors.js';
export {createInMemoryStorageProvider} from './memory.js';
export {createRedisStorageProvider} from './redis/storageRedisAdapter.js';
export type {RedisClient, RedisEvalClient, RedisSetOptions} from './redis/types.js';
export {copyBytes, createDomainId, equalBytes} from './utils.js';
