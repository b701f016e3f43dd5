import 'reflect-metadata'

import type {Server} from 'node:http'
import {promises as fs} from 'node:fs'

import helmet from 'helmet'
import express from 'express'
import type {NestApplicationOptions} from '@nestjs/common'
import {NestFactory} from '@nestjs/core'
import {ExpressAdapter} from '@nestjs/platform-express'

import {
  createCryptoEngine,
  createLocalKeyManagerCreator,
  type CryptoEngine,
  type KeyManagerCreator
} from '@kms-gateway/crypto'
import type {StorageProvider} from '@kms-gateway/db'
import {createKeystoreRepositoryFactory, createKeystoreService, type KeystoreService} from '@kms-gateway/keystore'
import {createStructuredLogger, type StructuredLogger} from '@kms-gateway/logging'

import type {ServiceConfig} from './config'
import {createProcessInfrastructure, type ProcessInfrastructure} from './infrastructure'
import {KmsApiNestModule} from './nest/kmsApiNestModule'
import {createProviderFactory} from './provider'

export type KmsApiAppDependencies = {
  storageProvider?: StorageProvider
  createKeyManager?: KeyManagerCreator
  crypto?: CryptoEngine
  keystoreService?: KeystoreService
  logger?: StructuredLogger
  now?: () => Date
}

const loadHttpsOptions = async ({
  config
}: {
  config: ServiceConfig
}): Promise<NonNullable<NestApplicationOptions['httpsOptions']> | undefined> => {
  const tlsConfig = config.tls
  if (!tlsConfig?.enabled) {
    return undefined
  }

  try {
    const [key, cert] = await Promise.all([fs.readFile(tlsConfig.keyPath), fs.readFile(tlsConfig.certPath)])
    return {key, cert}
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'unknown error'
    throw new Error(`Unable to load TLS configuration for kms-api: ${reason}`)
  }
}

export const createKmsApiApp = async ({
  config,
  dependencies = {}
}: {
  config: ServiceConfig
  dependencies?: KmsApiAppDependencies
}) => {
  const logger =
    dependencies.logger ??
    createStructuredLogger({
      service: 'kms-api',
      env: config.nodeEnv,
      level: config.logging.level,
      extraSensitiveKeys: config.logging.redactExtraKeys
    })

  let infrastructure: ProcessInfrastructure | null = null
  try {
    infrastructure = await createProcessInfrastructure({config, logger})
    const processInfrastructure = infrastructure
    const storageProvider = dependencies.storageProvider ?? processInfrastructure.storageProvider

    const repositoryFactory = createKeystoreRepositoryFactory({
      storageProvider,
      ...(dependencies.now ? {now: dependencies.now} : {})
    })
    const crypto = dependencies.crypto ?? createCryptoEngine()
    const createKeyManager =
      dependencies.createKeyManager ??
      createLocalKeyManagerCreator({
        storageProvider,
        keystoreExists: async keystoreId => (await repositoryFactory.open()).exists(keystoreId),
        scryptCost: config.keyManager.scryptCost,
        ...(dependencies.now ? {now: dependencies.now} : {})
      })
    const keystoreService = dependencies.keystoreService ?? createKeystoreService({repositoryFactory})
    const providerFactory = createProviderFactory({repositoryFactory, createKeyManager, crypto})

    const expressApp = express()
    expressApp.disable('x-powered-by')
    expressApp.use(
      helmet({
        contentSecurityPolicy: false
      })
    )

    const httpsOptions = await loadHttpsOptions({config})

    const nestApp = await NestFactory.create(
      KmsApiNestModule.register({
        config,
        logger,
        keystoreService,
        providerFactory,
        ...(dependencies.now ? {now: dependencies.now} : {})
      }),
      new ExpressAdapter(expressApp),
      {
        bodyParser: false,
        logger: config.nodeEnv === 'test' ? false : ['error', 'warn', 'log'],
        ...(httpsOptions ? {httpsOptions} : {})
      }
    )

    await nestApp.init()

    const server: Server = nestApp.getHttpServer()

    const start = async () => {
      await nestApp.listen(config.port, config.host)
      logger.info({
        event: 'process.started',
        component: 'process.entrypoint',
        message: 'KMS API listening',
        metadata: {host: config.host, port: config.port, storage: processInfrastructure.driver}
      })
    }

    const stop = async () => {
      await Promise.allSettled([nestApp.close(), processInfrastructure.close()])
    }

    return {
      server,
      start,
      stop,
      logger,
      keystoreService,
      providerFactory,
      infrastructure: processInfrastructure
    }
  } catch (error) {
    if (infrastructure) {
      await infrastructure.close()
    }

    throw error
  }
}

export type KmsApiApp = Awaited<ReturnType<typeof createKmsApiApp>>
