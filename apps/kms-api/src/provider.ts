import type {CryptoEngine, KeyManager, KeyManagerCreator} from '@kms-gateway/crypto'
import {
  describeError,
  type KeystoreRepository,
  type KeystoreRepositoryFactory,
  type ProviderBundle
} from '@kms-gateway/keystore'

export type ProviderBuildResult = {ok: true; bundle: ProviderBundle} | {ok: false; reason: string}

export type ProviderFactory = {
  build: (input: {keystoreId: string; passphrase: string}) => Promise<ProviderBuildResult>
}

/**
 * Composes a fresh bundle for every request. Nothing is cached: the key
 * manager may hold unsealed material for the duration of one request only.
 */
export const createProviderFactory = ({
  repositoryFactory,
  createKeyManager,
  crypto
}: {
  repositoryFactory: KeystoreRepositoryFactory
  createKeyManager: KeyManagerCreator
  crypto: CryptoEngine
}): ProviderFactory => ({
  build: async ({keystoreId, passphrase}) => {
    let keystoreRepository: KeystoreRepository
    try {
      keystoreRepository = await repositoryFactory.open()
    } catch (error) {
      return {ok: false, reason: describeError(error)}
    }

    let keyManager: KeyManager
    try {
      keyManager = await createKeyManager({keystoreId, passphrase})
    } catch (error) {
      return {ok: false, reason: describeError(error)}
    }

    return {
      ok: true,
      bundle: {keystoreRepository, keyManager, crypto}
    }
  }
})
