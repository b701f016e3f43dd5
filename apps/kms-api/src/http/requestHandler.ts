import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import type {KeystoreService} from '@kms-gateway/keystore'
import {
  createNoopLogger,
  runWithLogContext,
  setLogContextFields,
  type StructuredLogger
} from '@kms-gateway/logging'

import type {ServiceConfig} from '../config'
import {isAppError} from '../errors'
import {extractCorrelationId, sendError} from '../http'
import type {ProviderFactory} from '../provider'
import {handleCreateKeyRoute} from './routes/createKeyRoute'
import {handleCreateKeystoreRoute} from './routes/createKeystoreRoute'
import {handleDecryptRoute} from './routes/decryptRoute'
import {handleEncryptRoute} from './routes/encryptRoute'
import {handleFallbackRoute} from './routes/fallbackRoute'
import {handleHealthRoute} from './routes/healthRoute'
import {handleSignRoute} from './routes/signRoute'
import type {KmsApiRouteHandlers, KmsApiRouteLogicHandler, RouteRuntime} from './routes/types'
import {handleVerifyRoute} from './routes/verifyRoute'

const getRawRequestUrl = (request: IncomingMessage) => {
  // Express rewrites `url` inside mounted routers but keeps the original on `originalUrl`.
  if ('originalUrl' in request && typeof request.originalUrl === 'string' && request.originalUrl.length > 0) {
    return request.originalUrl
  }

  return request.url ?? '/'
}

const parsePathname = (request: IncomingMessage) => new URL(getRawRequestUrl(request), 'http://localhost').pathname

const sanitizeRouteForLog = ({rawUrl}: {rawUrl: string}) => {
  const routeWithoutQuery = rawUrl.split('?', 1)[0] ?? ''
  return routeWithoutQuery.length > 0 ? routeWithoutQuery : '/'
}

export type CreateKmsApiRouteHandlersInput = {
  config: ServiceConfig
  keystoreService: KeystoreService
  providerFactory: ProviderFactory
  logger?: StructuredLogger
  now?: () => Date
}

export const createKmsApiRouteHandlers = ({
  config,
  keystoreService,
  providerFactory,
  logger = createNoopLogger(),
  now = () => new Date()
}: CreateKmsApiRouteHandlersInput): KmsApiRouteHandlers => {
  const scheme = config.tls?.enabled ? 'https' : 'http'

  const runtime: RouteRuntime = {
    config,
    logger,
    keystoreService,
    providerFactory,
    buildResourceUrl: ({request, pathname}) => `${scheme}://${request.headers.host ?? 'localhost'}${pathname}`
  }

  const createRouteHandler = (routeLogicHandler: KmsApiRouteLogicHandler) => {
    const executeRoute = (request: IncomingMessage, response: ServerResponse) => {
      const correlationId = extractCorrelationId(request)
      const requestId = randomUUID()
      const startedAtMs = now().getTime()
      const method = request.method ?? 'GET'

      return runWithLogContext(
        {
          correlation_id: correlationId,
          request_id: requestId,
          method
        },
        async () => {
          let pathname = '/'
          let responseReasonCode: string | undefined

          logger.info({
            event: 'request.received',
            component: 'http.server',
            message: 'Request received',
            route: sanitizeRouteForLog({rawUrl: getRawRequestUrl(request)}),
            method
          })

          try {
            pathname = parsePathname(request)
            setLogContextFields({route: pathname})

            await routeLogicHandler({
              request,
              response,
              correlationId,
              method,
              pathname,
              runtime
            })
          } catch (error) {
            if (isAppError(error)) {
              responseReasonCode = error.code
              const rejection = {
                event: error.status >= 500 ? 'request.failed' : 'request.rejected',
                component: 'http.server',
                message: error.message,
                reason_code: error.code,
                route: pathname,
                method
              }
              if (error.status >= 500) {
                logger.error(rejection)
              } else {
                logger.warn(rejection)
              }

              sendError({
                response,
                status: error.status,
                message: error.message,
                correlationId,
                logger
              })
              return
            }

            responseReasonCode = 'internal_error'
            logger.error({
              event: 'request.failed',
              component: 'http.server',
              message: 'Unexpected internal error',
              reason_code: 'internal_error',
              route: pathname,
              method,
              metadata: {
                error
              }
            })

            sendError({
              response,
              status: 500,
              message: 'Unexpected internal error',
              correlationId,
              logger
            })
          } finally {
            const durationMs = Math.max(0, now().getTime() - startedAtMs)
            const statusCode = response.statusCode
            const baseLog = {
              event: 'request.completed',
              component: 'http.server',
              message: 'Request completed',
              route: pathname,
              method,
              status_code: statusCode,
              duration_ms: durationMs,
              ...(responseReasonCode ? {reason_code: responseReasonCode} : {})
            }

            if (statusCode >= 500) {
              logger.error(baseLog)
            } else if (statusCode >= 400) {
              logger.warn(baseLog)
            } else {
              logger.info(baseLog)
            }
          }
        }
      )
    }

    return executeRoute
  }

  return {
    health: createRouteHandler(handleHealthRoute),
    createKeystore: createRouteHandler(handleCreateKeystoreRoute),
    createKey: createRouteHandler(handleCreateKeyRoute),
    sign: createRouteHandler(handleSignRoute),
    verify: createRouteHandler(handleVerifyRoute),
    encrypt: createRouteHandler(handleEncryptRoute),
    decrypt: createRouteHandler(handleDecryptRoute),
    fallback: createRouteHandler(handleFallbackRoute)
  }
}
