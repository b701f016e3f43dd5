import {encodeBase64Url} from '@kms-gateway/crypto'

import {operationFailed} from '../../errors'
import {parseJsonBody, sendJson} from '../../http'
import {parseKeyOperationPath} from './paths'
import {encodeUtf8, provisionKeyService} from './provision'
import {EncryptRequestSchema, type EncryptResponse} from './schemas'
import type {KmsApiRouteLogicHandler} from './types'

export const handleEncryptRoute: KmsApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  method,
  pathname,
  runtime
}) => {
  const {keystoreId, keyId} = parseKeyOperationPath({method, pathname, operation: 'encrypt'})
  const body = await parseJsonBody({request, schema: EncryptRequestSchema, maxBodyBytes: runtime.config.maxBodyBytes})

  const keyService = await provisionKeyService({runtime, keystoreId, passphrase: body.passphrase})
  const encrypted = await keyService.encrypt({
    keyId,
    plaintext: encodeUtf8(body.message),
    aad: encodeUtf8(body.aad)
  })
  if (!encrypted.ok) {
    throw operationFailed({code: encrypted.error.code, operation: 'encrypt a message', reason: encrypted.error.message})
  }

  const payload: EncryptResponse = {
    cipherText: encodeBase64Url(encrypted.value.ciphertext),
    nonce: encodeBase64Url(encrypted.value.nonce)
  }
  sendJson({response, status: 200, correlationId, payload, logger: runtime.logger})
}
