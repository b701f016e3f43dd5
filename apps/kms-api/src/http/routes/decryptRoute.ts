import {operationFailed} from '../../errors'
import {decodeBase64UrlField, parseJsonBody, sendJson} from '../../http'
import {parseKeyOperationPath} from './paths'
import {encodeUtf8, provisionKeyService} from './provision'
import {DecryptRequestSchema, type DecryptResponse} from './schemas'
import type {KmsApiRouteLogicHandler} from './types'

export const handleDecryptRoute: KmsApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  method,
  pathname,
  runtime
}) => {
  const {keystoreId, keyId} = parseKeyOperationPath({method, pathname, operation: 'decrypt'})
  const body = await parseJsonBody({request, schema: DecryptRequestSchema, maxBodyBytes: runtime.config.maxBodyBytes})
  const ciphertext = decodeBase64UrlField({field: 'cipherText', value: body.cipherText})
  const nonce = decodeBase64UrlField({field: 'nonce', value: body.nonce})

  const keyService = await provisionKeyService({runtime, keystoreId, passphrase: body.passphrase})
  const decrypted = await keyService.decrypt({keyId, ciphertext, nonce, aad: encodeUtf8(body.aad)})
  if (!decrypted.ok) {
    throw operationFailed({code: decrypted.error.code, operation: 'decrypt a message', reason: decrypted.error.message})
  }

  const payload: DecryptResponse = {plainText: Buffer.from(decrypted.value).toString('utf8')}
  sendJson({response, status: 200, correlationId, payload, logger: runtime.logger})
}
