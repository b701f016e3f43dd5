import type {IncomingMessage, ServerResponse} from 'node:http'

import type {KeystoreService} from '@kms-gateway/keystore'
import type {StructuredLogger} from '@kms-gateway/logging'

import type {ServiceConfig} from '../../config'
import type {ProviderFactory} from '../../provider'

export type RouteRuntime = {
  config: ServiceConfig
  logger: StructuredLogger
  keystoreService: KeystoreService
  providerFactory: ProviderFactory
  buildResourceUrl: (input: {request: IncomingMessage; pathname: string}) => string
}

export type RouteHandlerContext = {
  request: IncomingMessage
  response: ServerResponse
  correlationId: string
  method: string
  pathname: string
  runtime: RouteRuntime
}

export type KmsApiRouteKind =
  | 'health'
  | 'createKeystore'
  | 'createKey'
  | 'sign'
  | 'verify'
  | 'encrypt'
  | 'decrypt'
  | 'fallback'

export type KmsApiRouteLogicHandler = (context: RouteHandlerContext) => void | Promise<void>

export type KmsApiRouteHandler = (request: IncomingMessage, response: ServerResponse) => Promise<void>

export type KmsApiRouteHandlers = Record<KmsApiRouteKind, KmsApiRouteHandler>
