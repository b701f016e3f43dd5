import {setLogContextFields} from '@kms-gateway/logging'

import {operationFailed} from '../../errors'
import {parseJsonBody, sendCreated} from '../../http'
import {keyUrlPath, parseKeysCollectionPath} from './paths'
import {provisionKeyService} from './provision'
import {CreateKeyRequestSchema} from './schemas'
import type {KmsApiRouteLogicHandler} from './types'

export const handleCreateKeyRoute: KmsApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  method,
  pathname,
  runtime
}) => {
  const {keystoreId} = parseKeysCollectionPath({method, pathname})
  const body = await parseJsonBody({
    request,
    schema: CreateKeyRequestSchema,
    maxBodyBytes: runtime.config.maxBodyBytes
  })

  const keyService = await provisionKeyService({runtime, keystoreId, passphrase: body.passphrase})
  const created = await keyService.createKey(body.keyType)
  if (!created.ok) {
    throw operationFailed({code: created.error.code, operation: 'create a key', reason: created.error.message})
  }

  const keyId = created.value
  setLogContextFields({key_id: keyId})
  runtime.logger.info({
    event: 'key.created',
    component: 'kms.key',
    message: 'Key created',
    metadata: {
      key_type: body.keyType
    }
  })

  sendCreated({
    response,
    correlationId,
    location: runtime.buildResourceUrl({request, pathname: keyUrlPath({keystoreId, keyId})}),
    logger: runtime.logger
  })
}
