import {formatOperationFailure, operationFailed} from '../../errors'
import {decodeBase64UrlField, parseJsonBody, sendJson} from '../../http'
import {parseKeyOperationPath} from './paths'
import {encodeUtf8, provisionKeyService} from './provision'
import {VerifyRequestSchema} from './schemas'
import type {KmsApiRouteLogicHandler} from './types'

export const handleVerifyRoute: KmsApiRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  method,
  pathname,
  runtime
}) => {
  const {keystoreId, keyId} = parseKeyOperationPath({method, pathname, operation: 'verify'})
  const body = await parseJsonBody({request, schema: VerifyRequestSchema, maxBodyBytes: runtime.config.maxBodyBytes})
  const signature = decodeBase64UrlField({field: 'signature', value: body.signature})

  const keyService = await provisionKeyService({runtime, keystoreId, passphrase: body.passphrase})
  const outcome = await keyService.verify({keyId, signature, message: encodeUtf8(body.message)})

  switch (outcome.status) {
    case 'verified':
      sendJson({response, status: 200, correlationId, payload: {}, logger: runtime.logger})
      return
    case 'rejected':
      runtime.logger.info({
        event: 'verify.rejected',
        component: 'kms.key',
        message: 'Signature rejected',
        reason_code: 'signature_invalid'
      })
      sendJson({
        response,
        status: 200,
        correlationId,
        payload: {errMessage: formatOperationFailure('verify a message', outcome.reason)},
        logger: runtime.logger
      })
      return
    case 'failed':
      throw operationFailed({code: 'verify_failed', operation: 'verify a message', reason: outcome.reason})
  }
}
