import {createInMemoryStorageProvider, createRedisStorageProvider, type RedisEvalClient, type StorageProvider} from '@kms-gateway/db'
import type {StructuredLogger} from '@kms-gateway/logging'
import {createClient} from 'redis'

import type {ServiceConfig} from './config'

export type KmsRedisClient = ReturnType<typeof createClient>

export type ProcessInfrastructure = {
  driver: ServiceConfig['storage']['driver']
  redis: KmsRedisClient | null
  storageProvider: StorageProvider
  close: () => Promise<void>
}

export const toRedisEvalClient = (redis: KmsRedisClient): RedisEvalClient => ({
  get: key => redis.get(key),
  set: (key, value, options) => (options?.NX ? redis.set(key, value, {NX: true}) : redis.set(key, value)),
  eval: (script, keys, args) => redis.eval(script, {keys, arguments: args.map(String)})
})

export const createProcessInfrastructure = async ({
  config,
  logger
}: {
  config: ServiceConfig
  logger: StructuredLogger
}): Promise<ProcessInfrastructure> => {
  const storageConfig = config.storage
  if (storageConfig.driver === 'memory') {
    return {
      driver: 'memory',
      redis: null,
      storageProvider: createInMemoryStorageProvider(),
      close: () => Promise.resolve()
    }
  }

  const redis = createClient({
    url: storageConfig.redisUrl,
    socket: {
      connectTimeout: storageConfig.redisConnectTimeoutMs
    }
  })

  redis.on('error', (error: unknown) => {
    logger.error({
      event: 'dependency.redis.error',
      component: 'redis.client',
      message: error instanceof Error ? error.message : 'redis client error',
      reason_code: 'redis_error'
    })
  })

  try {
    await redis.connect()
  } catch (error) {
    await Promise.allSettled([redis.quit()])
    throw error
  }

  return {
    driver: 'redis',
    redis,
    storageProvider: createRedisStorageProvider({
      redisClient: toRedisEvalClient(redis),
      keyPrefix: storageConfig.redisKeyPrefix
    }),
    close: async () => {
      await Promise.allSettled([redis.quit()])
    }
  }
}
