import {setLogContextFields} from '@kms-gateway/logging'

import {badRequest} from '../../errors'
import {decodePathParam} from '../../http'

export const KMS_BASE_PATH = '/kms'

export type KeyOperation = 'sign' | 'verify' | 'encrypt' | 'decrypt'

const KEYS_COLLECTION_PATTERN = /^\/kms\/keystores\/([^/]+)\/keys\/?$/u
const KEY_OPERATION_PATTERN = /^\/kms\/keystores\/([^/]+)\/keys\/([^/]+)\/(sign|verify|encrypt|decrypt)\/?$/u

const unsupportedRoute = (method: string, pathname: string) =>
  badRequest('route_not_found', `unsupported route ${method} ${pathname}`)

export const keystoreUrlPath = (keystoreId: string) => `${KMS_BASE_PATH}/keystores/${encodeURIComponent(keystoreId)}`

export const keyUrlPath = ({keystoreId, keyId}: {keystoreId: string; keyId: string}) =>
  `${keystoreUrlPath(keystoreId)}/keys/${encodeURIComponent(keyId)}`

export const parseKeysCollectionPath = ({method, pathname}: {method: string; pathname: string}) => {
  const match = KEYS_COLLECTION_PATTERN.exec(pathname)
  const rawKeystoreId = match?.[1]
  if (!rawKeystoreId) {
    throw unsupportedRoute(method, pathname)
  }

  const keystoreId = decodePathParam(rawKeystoreId)
  setLogContextFields({keystore_id: keystoreId})
  return {keystoreId}
}

export const parseKeyOperationPath = ({
  method,
  pathname,
  operation
}: {
  method: string
  pathname: string
  operation: KeyOperation
}) => {
  const match = KEY_OPERATION_PATTERN.exec(pathname)
  if (!match || match[3] !== operation) {
    throw unsupportedRoute(method, pathname)
  }

  const [, rawKeystoreId, rawKeyId] = match
  if (!rawKeystoreId || !rawKeyId) {
    throw unsupportedRoute(method, pathname)
  }

  const keystoreId = decodePathParam(rawKeystoreId)
  const keyId = decodePathParam(rawKeyId)
  setLogContextFields({keystore_id: keystoreId, key_id: keyId})
  return {keystoreId, keyId}
}
