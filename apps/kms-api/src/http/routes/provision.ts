import {createKeyService, type KeyService} from '@kms-gateway/keystore'

import {operationFailed} from '../../errors'
import type {RouteRuntime} from './types'

export const provisionKeyService = async ({
  runtime,
  keystoreId,
  passphrase
}: {
  runtime: RouteRuntime
  keystoreId: string
  passphrase: string
}): Promise<KeyService> => {
  const built = await runtime.providerFactory.build({keystoreId, passphrase})
  if (!built.ok) {
    throw operationFailed({code: 'provider_creation_failed', operation: 'create a kms provider', reason: built.reason})
  }

  return createKeyService(built.bundle)
}

export const encodeUtf8 = (value: string) => new TextEncoder().encode(value)
