import {encodeBase64Url} from '@kms-gateway/crypto'

import {operationFailed} from '../../errors'
import {parseJsonBody, sendJson} from '../../http'
import {parseKeyOperationPath} from './paths'
import {encodeUtf8, provisionKeyService} from './provision'
import {SignRequestSchema, type SignResponse} from './schemas'
import type {KmsApiRouteLogicHandler} from './types'

export const handleSignRoute: KmsApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  method,
  pathname,
  runtime
}) => {
  const {keystoreId, keyId} = parseKeyOperationPath({method, pathname, operation: 'sign'})
  const body = await parseJsonBody({request, schema: SignRequestSchema, maxBodyBytes: runtime.config.maxBodyBytes})

  const keyService = await provisionKeyService({runtime, keystoreId, passphrase: body.passphrase})
  const signed = await keyService.sign({keyId, message: encodeUtf8(body.message)})
  if (!signed.ok) {
    throw operationFailed({code: signed.error.code, operation: 'sign a message', reason: signed.error.message})
  }

  const payload: SignResponse = {signature: encodeBase64Url(signed.value)}
  sendJson({response, status: 200, correlationId, payload, logger: runtime.logger})
}
