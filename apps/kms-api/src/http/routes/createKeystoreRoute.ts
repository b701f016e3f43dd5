import {setLogContextFields} from '@kms-gateway/logging'

import {operationFailed} from '../../errors'
import {parseJsonBody, sendCreated} from '../../http'
import {keystoreUrlPath} from './paths'
import {CreateKeystoreRequestSchema} from './schemas'
import type {KmsApiRouteLogicHandler} from './types'

export const handleCreateKeystoreRoute: KmsApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  runtime
}) => {
  const body = await parseJsonBody({
    request,
    schema: CreateKeystoreRequestSchema,
    maxBodyBytes: runtime.config.maxBodyBytes
  })

  const created = await runtime.keystoreService.create(body.controller)
  if (!created.ok) {
    throw operationFailed({code: created.error.code, operation: 'create a keystore', reason: created.error.message})
  }

  const keystoreId = created.value
  setLogContextFields({keystore_id: keystoreId})
  runtime.logger.info({
    event: 'keystore.created',
    component: 'kms.keystore',
    message: 'Keystore created',
    metadata: {
      controller: body.controller
    }
  })

  sendCreated({
    response,
    correlationId,
    location: runtime.buildResourceUrl({request, pathname: keystoreUrlPath(keystoreId)}),
    logger: runtime.logger
  })
}
