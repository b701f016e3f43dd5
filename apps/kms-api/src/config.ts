import {LogLevelSchema, type LogLevel} from '@kms-gateway/logging'
import {z} from 'zod'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().positive())

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') {
    return true
  }
  if (normalized === 'false' || normalized === '0') {
    return false
  }

  return value
}, z.boolean())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const isPowerOfTwo = (value: number) => value > 1 && (value & (value - 1)) === 0

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    KMS_API_HOST: z.string().default('0.0.0.0'),
    KMS_API_PORT: numberFromEnv.default(8076),
    KMS_API_MAX_BODY_BYTES: numberFromEnv.default(1024 * 1024),
    KMS_API_LOG_LEVEL: z.preprocess(
      value => (typeof value === 'string' && value.trim().length > 0 ? value.trim().toLowerCase() : undefined),
      LogLevelSchema.optional()
    ),
    KMS_API_LOG_REDACT_EXTRA_KEYS: optionalString,
    KMS_API_STORAGE_DRIVER: z.enum(['memory', 'redis']).default('memory'),
    KMS_API_REDIS_URL: optionalString,
    KMS_API_REDIS_CONNECT_TIMEOUT_MS: numberFromEnv.default(2_000),
    KMS_API_REDIS_KEY_PREFIX: z.string().trim().min(1).default('kms-api'),
    KMS_API_SCRYPT_COST: numberFromEnv
      .refine(isPowerOfTwo, {message: 'KMS_API_SCRYPT_COST must be a power of two'})
      .default(16_384),
    KMS_API_TLS_ENABLED: booleanFromEnv.default(false),
    KMS_API_TLS_KEY_PATH: optionalString,
    KMS_API_TLS_CERT_PATH: optionalString
  })
  .strict()

export type StorageConfig =
  | {driver: 'memory'}
  | {
      driver: 'redis'
      redisUrl: string
      redisConnectTimeoutMs: number
      redisKeyPrefix: string
    }

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  maxBodyBytes: number
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
  storage: StorageConfig
  keyManager: {
    scryptCost: number
  }
  tls?: {
    enabled: true
    keyPath: string
    certPath: string
  }
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  KMS_API_HOST: env.KMS_API_HOST,
  KMS_API_PORT: env.KMS_API_PORT,
  KMS_API_MAX_BODY_BYTES: env.KMS_API_MAX_BODY_BYTES,
  KMS_API_LOG_LEVEL: env.KMS_API_LOG_LEVEL,
  KMS_API_LOG_REDACT_EXTRA_KEYS: env.KMS_API_LOG_REDACT_EXTRA_KEYS,
  KMS_API_STORAGE_DRIVER: env.KMS_API_STORAGE_DRIVER,
  KMS_API_REDIS_URL: env.KMS_API_REDIS_URL,
  KMS_API_REDIS_CONNECT_TIMEOUT_MS: env.KMS_API_REDIS_CONNECT_TIMEOUT_MS,
  KMS_API_REDIS_KEY_PREFIX: env.KMS_API_REDIS_KEY_PREFIX,
  KMS_API_SCRYPT_COST: env.KMS_API_SCRYPT_COST,
  KMS_API_TLS_ENABLED: env.KMS_API_TLS_ENABLED,
  KMS_API_TLS_KEY_PATH: env.KMS_API_TLS_KEY_PATH,
  KMS_API_TLS_CERT_PATH: env.KMS_API_TLS_CERT_PATH
})

const parseRedactExtraKeys = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  if (parsed.NODE_ENV === 'production' && parsed.KMS_API_STORAGE_DRIVER === 'memory') {
    throw new Error('Production requires KMS_API_STORAGE_DRIVER=redis')
  }

  let storage: StorageConfig = {driver: 'memory'}
  if (parsed.KMS_API_STORAGE_DRIVER === 'redis') {
    if (!parsed.KMS_API_REDIS_URL) {
      throw new Error('KMS_API_REDIS_URL is required when KMS_API_STORAGE_DRIVER is redis')
    }

    storage = {
      driver: 'redis',
      redisUrl: parsed.KMS_API_REDIS_URL,
      redisConnectTimeoutMs: parsed.KMS_API_REDIS_CONNECT_TIMEOUT_MS,
      redisKeyPrefix: parsed.KMS_API_REDIS_KEY_PREFIX
    }
  }

  let tls: ServiceConfig['tls']
  if (parsed.KMS_API_TLS_ENABLED) {
    if (!parsed.KMS_API_TLS_KEY_PATH || !parsed.KMS_API_TLS_CERT_PATH) {
      throw new Error('KMS_API_TLS_KEY_PATH and KMS_API_TLS_CERT_PATH are required when TLS is enabled')
    }

    tls = {
      enabled: true,
      keyPath: parsed.KMS_API_TLS_KEY_PATH,
      certPath: parsed.KMS_API_TLS_CERT_PATH
    }
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.KMS_API_HOST,
    port: parsed.KMS_API_PORT,
    maxBodyBytes: parsed.KMS_API_MAX_BODY_BYTES,
    logging: {
      level: parsed.KMS_API_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
      redactExtraKeys: parseRedactExtraKeys(parsed.KMS_API_LOG_REDACT_EXTRA_KEYS)
    },
    storage,
    keyManager: {
      scryptCost: parsed.KMS_API_SCRYPT_COST
    },
    ...(tls ? {tls} : {})
  }
}
