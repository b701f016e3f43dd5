import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {decodeBase64Url} from '@kms-gateway/crypto'
import {createNoopLogger, type StructuredLogger} from '@kms-gateway/logging'
import {z} from 'zod'

import {badRequest} from './errors'

const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'referrer-policy': 'no-referrer',
  'cross-origin-resource-policy': 'same-origin',
  'cache-control': 'no-store'
}

export type ErrorPayload = {
  errMessage: string
}

export const extractCorrelationId = (request: IncomingMessage) => {
  const header = request.headers['x-correlation-id']
  const value = Array.isArray(header) ? header[0] : header
  if (typeof value !== 'string') {
    return randomUUID()
  }

  const trimmed = value.trim()
  if (trimmed.length === 0 || trimmed.length > 128) {
    return randomUUID()
  }

  return trimmed
}

const readBodyBuffer = async ({
  request,
  maxBodyBytes
}: {
  request: IncomingMessage
  maxBodyBytes: number
}) => {
  const chunks: Buffer[] = []
  let size = 0

  for await (const chunk of request) {
    let bufferChunk: Buffer
    if (typeof chunk === 'string') {
      bufferChunk = Buffer.from(chunk, 'utf8')
    } else if (chunk instanceof Uint8Array) {
      bufferChunk = Buffer.from(chunk)
    } else {
      throw badRequest('request_body_invalid', 'request body contains an invalid chunk type')
    }

    size += bufferChunk.length
    if (size > maxBodyBytes) {
      throw badRequest('request_body_too_large', `request body exceeds ${maxBodyBytes} bytes`)
    }

    chunks.push(bufferChunk)
  }

  return Buffer.concat(chunks)
}

const describeIssues = (error: z.ZodError) =>
  error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')

export const parseJsonBody = async <TSchema extends z.ZodTypeAny>({
  request,
  schema,
  maxBodyBytes
}: {
  request: IncomingMessage
  schema: TSchema
  maxBodyBytes: number
}): Promise<z.infer<TSchema>> => {
  const raw = await readBodyBuffer({request, maxBodyBytes})
  if (raw.length === 0) {
    throw badRequest('request_body_missing', 'request body is required')
  }

  let parsedBody: unknown
  try {
    parsedBody = JSON.parse(raw.toString('utf8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'invalid JSON'
    throw badRequest('request_body_invalid_json', reason)
  }

  const parsed = schema.safeParse(parsedBody)
  if (!parsed.success) {
    throw badRequest('request_body_schema_invalid', describeIssues(parsed.error))
  }

  return parsed.data
}

export const decodeBase64UrlField = ({field, value}: {field: string; value: string}) => {
  const decoded = decodeBase64Url(value)
  if (!decoded) {
    throw badRequest('base64_invalid', `${field} is not valid base64url`)
  }

  return new Uint8Array(decoded)
}

export const decodePathParam = (value: string) => {
  try {
    return decodeURIComponent(value)
  } catch {
    throw badRequest('path_param_invalid', 'path parameter encoding is invalid')
  }
}

type WriteInput = {
  response: ServerResponse
  status: number
  correlationId: string
  headers: Record<string, string>
  body?: Buffer
  logger?: StructuredLogger
}

// Writes at most once per response; later attempts and transport failures are logged, never thrown.
const writeOnce = ({response, status, correlationId, headers, body, logger = createNoopLogger()}: WriteInput) => {
  if (response.headersSent || response.writableEnded) {
    logger.warn({
      event: 'response.already_sent',
      component: 'http.codec',
      message: 'Response already written; dropping second write',
      status_code: status
    })
    return false
  }

  try {
    response.writeHead(status, {
      ...DEFAULT_SECURITY_HEADERS,
      'x-correlation-id': correlationId,
      ...headers
    })
    response.end(body)
    return true
  } catch (error) {
    logger.error({
      event: 'response.write_failed',
      component: 'http.codec',
      message: 'Failed to write response',
      status_code: status,
      metadata: {
        error
      }
    })
    return false
  }
}

const serialize = (value: unknown) => Buffer.from(JSON.stringify(value), 'utf8')

export const sendJson = ({
  response,
  status,
  correlationId,
  payload,
  headers,
  logger
}: {
  response: ServerResponse
  status: number
  correlationId: string
  payload: unknown
  headers?: Record<string, string>
  logger?: StructuredLogger
}) => {
  const body = serialize(payload)

  return writeOnce({
    response,
    status,
    correlationId,
    body,
    logger,
    headers: {
      'content-type': 'application/json; charset=utf-8',
      'content-length': String(body.length),
      ...(headers ?? {})
    }
  })
}

export const sendError = ({
  response,
  status,
  message,
  correlationId,
  logger
}: {
  response: ServerResponse
  status: number
  message: string
  correlationId: string
  logger?: StructuredLogger
}) => {
  const payload: ErrorPayload = {errMessage: message}

  return sendJson({response, status, payload, correlationId, logger})
}

export const sendCreated = ({
  response,
  correlationId,
  location,
  logger
}: {
  response: ServerResponse
  correlationId: string
  location: string
  logger?: StructuredLogger
}) =>
  writeOnce({
    response,
    status: 201,
    correlationId,
    logger,
    headers: {
      location,
      'content-length': '0'
    }
  })
