import {IncomingMessage, ServerResponse, type OutgoingHttpHeaders} from 'node:http'
import {Socket} from 'node:net'

import {vi} from 'vitest'

import type {ServiceConfig} from '../config'

export const makeConfig = (overrides: Partial<ServiceConfig> = {}): ServiceConfig => ({
  nodeEnv: 'test',
  host: '127.0.0.1',
  port: 0,
  maxBodyBytes: 64 * 1024,
  logging: {
    level: 'silent',
    redactExtraKeys: []
  },
  storage: {driver: 'memory'},
  keyManager: {
    scryptCost: 1024
  },
  ...overrides
})

export const makeRequest = ({
  method = 'POST',
  url,
  headers = {},
  body
}: {
  method?: string
  url: string
  headers?: Record<string, string>
  body?: string
}) => {
  const request = new IncomingMessage(new Socket())
  request.method = method
  request.url = url
  request.httpVersionMajor = 1
  request.httpVersionMinor = 1
  request.headers = {host: 'kms.test', ...headers}
  if (body !== undefined && body.length > 0) {
    request.push(body)
  }
  request.push(null)
  return request
}

export const makeResponse = (request: IncomingMessage) => {
  const response = new ServerResponse(request)
  const writeHead = vi.spyOn(response, 'writeHead')
  const end = vi.spyOn(response, 'end')

  const headers = (): OutgoingHttpHeaders => {
    const value = writeHead.mock.calls[0]?.[1]
    return value && !Array.isArray(value) ? value : {}
  }

  const text = () => {
    const chunk: unknown = end.mock.calls[0]?.[0]
    return Buffer.isBuffer(chunk) ? chunk.toString('utf8') : ''
  }

  return {
    response,
    writeHead,
    end,
    headers,
    text,
    json: (): unknown => JSON.parse(text())
  }
}
