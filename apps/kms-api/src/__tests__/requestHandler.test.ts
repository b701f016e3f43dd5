import {describe, expect, it, vi} from 'vitest'

import {createCryptoEngine, createLocalKeyManagerCreator, decodeBase64Url, encodeBase64Url} from '@kms-gateway/crypto'
import {createInMemoryStorageProvider} from '@kms-gateway/db'
import {createKeystoreRepositoryFactory, createKeystoreService, type KeystoreService} from '@kms-gateway/keystore'
import {createNoopLogger} from '@kms-gateway/logging'

import {createKmsApiRouteHandlers} from '../http/requestHandler'
import type {KmsApiRouteKind} from '../http/routes/types'
import {createProviderFactory} from '../provider'
import {makeConfig, makeRequest, makeResponse} from './fixtures'

const PASSPHRASE = 'test-secret'

const makeHarness = ({keystoreService}: {keystoreService?: KeystoreService} = {}) => {
  const storageProvider = createInMemoryStorageProvider()
  const repositoryFactory = createKeystoreRepositoryFactory({storageProvider})
  const createKeyManager = createLocalKeyManagerCreator({
    storageProvider,
    keystoreExists: async keystoreId => (await repositoryFactory.open()).exists(keystoreId),
    scryptCost: 1024
  })
  const logger = createNoopLogger()
  const handlers = createKmsApiRouteHandlers({
    config: makeConfig(),
    keystoreService: keystoreService ?? createKeystoreService({repositoryFactory}),
    providerFactory: createProviderFactory({repositoryFactory, createKeyManager, crypto: createCryptoEngine()}),
    logger
  })

  const call = async (
    kind: KmsApiRouteKind,
    {method = 'POST', url, body, headers}: {method?: string; url: string; body?: unknown; headers?: Record<string, string>}
  ) => {
    const request = makeRequest({
      method,
      url,
      ...(headers ? {headers} : {}),
      ...(body === undefined ? {} : {body: typeof body === 'string' ? body : JSON.stringify(body)})
    })
    const recorded = makeResponse(request)
    await handlers[kind](request, recorded.response)
    return {
      status: recorded.response.statusCode,
      headers: recorded.headers(),
      text: recorded.text(),
      writes: recorded.writeHead.mock.calls.length
    }
  }

  const lastSegment = (location: unknown) => {
    if (typeof location !== 'string') {
      throw new Error('expected a location header')
    }

    const segment = location.split('/').pop()
    if (!segment) {
      throw new Error(`no id in ${location}`)
    }

    return segment
  }

  const createKeystore = async () => {
    const created = await call('createKeystore', {url: '/kms/keystores', body: {controller: 'did:example:123'}})
    return lastSegment(created.headers.location)
  }

  const createKey = async (keystoreId: string, keyType: string) => {
    const created = await call('createKey', {
      url: `/kms/keystores/${keystoreId}/keys`,
      body: {keyType, passphrase: PASSPHRASE}
    })
    return lastSegment(created.headers.location)
  }

  return {call, createKeystore, createKey, repositoryFactory, logger}
}

const parseJson = (text: string): unknown => JSON.parse(text)

const readField = (text: string, field: string) => {
  const parsed = parseJson(text)
  if (typeof parsed !== 'object' || parsed === null || !(field in parsed)) {
    throw new Error(`missing ${field} in ${text}`)
  }

  const value: unknown = Reflect.get(parsed, field)
  if (typeof value !== 'string') {
    throw new Error(`${field} is not a string`)
  }

  return value
}

const tamper = (encoded: string) => {
  const bytes = decodeBase64Url(encoded)
  if (!bytes) {
    throw new Error('expected base64url input')
  }

  bytes[0] = (bytes[0] ?? 0) ^ 0xff
  return encodeBase64Url(bytes)
}

describe('kms-api operation dispatcher', () => {
  it('creates a keystore and an ED25519 key, then signs and verifies a message', async () => {
    const harness = makeHarness()

    const keystore = await harness.call('createKeystore', {
      url: '/kms/keystores',
      body: {controller: 'did:example:123'}
    })
    expect(keystore.status).toBe(201)
    expect(keystore.text).toBe('')
    expect(keystore.headers.location).toMatch(/^http:\/\/kms\.test\/kms\/keystores\/ks_[0-9a-f]{32}$/u)
    const keystoreId = String(keystore.headers.location).split('/').pop() ?? ''

    const key = await harness.call('createKey', {
      url: `/kms/keystores/${keystoreId}/keys`,
      body: {keyType: 'ED25519', passphrase: PASSPHRASE}
    })
    expect(key.status).toBe(201)
    expect(String(key.headers.location).startsWith(`http://kms.test/kms/keystores/${keystoreId}/keys/kid_`)).toBe(true)
    expect(key.headers.location).toMatch(/\/keys\/kid_[0-9a-f]{32}$/u)
    const keyId = String(key.headers.location).split('/').pop() ?? ''

    const stored = await (await harness.repositoryFactory.open()).get(keystoreId)
    expect(stored.controller).toBe('did:example:123')
    expect(stored.key_ids).toEqual([keyId])

    const signed = await harness.call('sign', {
      url: `/kms/keystores/${keystoreId}/keys/${keyId}/sign`,
      body: {message: 'test message', passphrase: PASSPHRASE}
    })
    expect(signed.status).toBe(200)
    const signature = readField(signed.text, 'signature')
    expect(signature).toMatch(/^[A-Za-z0-9_-]{86}==$/u)

    const verified = await harness.call('verify', {
      url: `/kms/keystores/${keystoreId}/keys/${keyId}/verify`,
      body: {signature, message: 'test message', passphrase: PASSPHRASE}
    })
    expect(verified.status).toBe(200)
    expect(verified.text).toBe('{}')
  })

  it('answers 200 with an errMessage when the signature does not match', async () => {
    const harness = makeHarness()
    const keystoreId = await harness.createKeystore()
    const keyId = await harness.createKey(keystoreId, 'ECDSAP256DER')

    const signed = await harness.call('sign', {
      url: `/kms/keystores/${keystoreId}/keys/${keyId}/sign`,
      body: {message: 'original', passphrase: PASSPHRASE}
    })
    const signature = readField(signed.text, 'signature')

    const rejected = await harness.call('verify', {
      url: `/kms/keystores/${keystoreId}/keys/${keyId}/verify`,
      body: {signature, message: 'altered', passphrase: PASSPHRASE}
    })

    expect(rejected.status).toBe(200)
    expect(rejected.text).toBe('{"errMessage":"Failed to verify a message: invalid signature"}')
  })

  it('answers 500 when verification cannot run', async () => {
    const harness = makeHarness()
    const keystoreId = await harness.createKeystore()
    const keyId = await harness.createKey(keystoreId, 'AES256GCM')

    const failed = await harness.call('verify', {
      url: `/kms/keystores/${keystoreId}/keys/${keyId}/verify`,
      body: {signature: 'AAAA', message: 'hello', passphrase: PASSPHRASE}
    })

    expect(failed.status).toBe(500)
    expect(failed.text).toBe(
      JSON.stringify({errMessage: `Failed to verify a message: key ${keyId} of type AES256GCM cannot verify`})
    )
  })

  it('round-trips a message through encrypt and decrypt', async () => {
    const harness = makeHarness()
    const keystoreId = await harness.createKeystore()
    const keyId = await harness.createKey(keystoreId, 'AES128GCM')

    const encrypted = await harness.call('encrypt', {
      url: `/kms/keystores/${keystoreId}/keys/${keyId}/encrypt`,
      body: {message: 'hello kms', aad: 'context-1', passphrase: PASSPHRASE}
    })
    expect(encrypted.status).toBe(200)
    const cipherText = readField(encrypted.text, 'cipherText')
    const nonce = readField(encrypted.text, 'nonce')
    expect(nonce).toBe(nonce.replace(/[^A-Za-z0-9_-]/gu, ''))
    expect(decodeBase64Url(nonce)?.length).toBe(12)
    expect(decodeBase64Url(cipherText)?.length).toBe('hello kms'.length + 16)

    const decrypted = await harness.call('decrypt', {
      url: `/kms/keystores/${keystoreId}/keys/${keyId}/decrypt`,
      body: {cipherText, aad: 'context-1', nonce, passphrase: PASSPHRASE}
    })
    expect(decrypted.status).toBe(200)
    expect(decrypted.text).toBe('{"plainText":"hello kms"}')
  })

  it('fails decryption when the cipher text, aad or nonce is altered', async () => {
    const harness = makeHarness()
    const keystoreId = await harness.createKeystore()
    const keyId = await harness.createKey(keystoreId, 'AES256GCM')
    const url = `/kms/keystores/${keystoreId}/keys/${keyId}/decrypt`

    const encrypted = await harness.call('encrypt', {
      url: `/kms/keystores/${keystoreId}/keys/${keyId}/encrypt`,
      body: {message: 'secret payload', aad: 'context-1', passphrase: PASSPHRASE}
    })
    const cipherText = readField(encrypted.text, 'cipherText')
    const nonce = readField(encrypted.text, 'nonce')
    const expected = '{"errMessage":"Failed to decrypt a message: message authentication failed"}'

    const variants = [
      {cipherText: tamper(cipherText), aad: 'context-1', nonce},
      {cipherText, aad: 'context-2', nonce},
      {cipherText, aad: 'context-1', nonce: tamper(nonce)}
    ]

    for (const variant of variants) {
      const failed = await harness.call('decrypt', {url, body: {...variant, passphrase: PASSPHRASE}})
      expect(failed.status).toBe(500)
      expect(failed.text).toBe(expected)
    }
  })

  it.each<[KmsApiRouteKind, string]>([
    ['createKeystore', '/kms/keystores'],
    ['createKey', '/kms/keystores/ks_missing/keys'],
    ['sign', '/kms/keystores/ks_missing/keys/kid_missing/sign'],
    ['verify', '/kms/keystores/ks_missing/keys/kid_missing/verify'],
    ['encrypt', '/kms/keystores/ks_missing/keys/kid_missing/encrypt'],
    ['decrypt', '/kms/keystores/ks_missing/keys/kid_missing/decrypt']
  ])('rejects malformed JSON on %s with the parser message', async (kind, url) => {
    const harness = makeHarness()
    const malformed = '{"message":'
    let parserMessage = ''
    try {
      JSON.parse(malformed)
    } catch (error) {
      parserMessage = error instanceof Error ? error.message : ''
    }

    const response = await harness.call(kind, {url, body: malformed})

    expect(response.status).toBe(400)
    expect(response.text).toBe(JSON.stringify({errMessage: `Received bad request: ${parserMessage}`}))
  })

  it.each([
    ['cipherText', {cipherText: 'not base64!', aad: 'a', nonce: 'AAAA'}],
    ['nonce', {cipherText: 'AAAA', aad: 'a', nonce: 'not base64!'}]
  ])('rejects a %s that is not base64url before touching the keystore', async (field, body) => {
    const harness = makeHarness()

    const response = await harness.call('decrypt', {
      url: '/kms/keystores/ks_missing/keys/kid_missing/decrypt',
      body
    })

    expect(response.status).toBe(400)
    expect(response.text).toBe(`{"errMessage":"Received bad request: ${field} is not valid base64url"}`)
  })

  it('accepts controllers of any length', async () => {
    const harness = makeHarness()
    const controller = `did:example:${'a'.repeat(3000)}`

    const created = await harness.call('createKeystore', {url: '/kms/keystores', body: {controller}})

    expect(created.status).toBe(201)
    const keystoreId = String(created.headers.location).split('/').pop() ?? ''
    expect((await (await harness.repositoryFactory.open()).get(keystoreId)).controller).toBe(controller)
  })

  it('rejects a missing controller', async () => {
    const harness = makeHarness()

    const response = await harness.call('createKeystore', {url: '/kms/keystores', body: {}})

    expect(response.status).toBe(400)
    expect(response.text).toBe('{"errMessage":"Received bad request: controller: Required"}')
  })

  it('rejects a signature that is not base64url before touching the keystore', async () => {
    const harness = makeHarness()

    const response = await harness.call('verify', {
      url: '/kms/keystores/ks_missing/keys/kid_missing/verify',
      body: {signature: 'not base64!', message: 'hello'}
    })

    expect(response.status).toBe(400)
    expect(response.text).toBe('{"errMessage":"Received bad request: signature is not valid base64url"}')
  })

  it('reports provider failures for a wrong passphrase and an unknown keystore', async () => {
    const harness = makeHarness()
    const keystoreId = await harness.createKeystore()
    const keyId = await harness.createKey(keystoreId, 'ED25519')

    const wrongPassphrase = await harness.call('sign', {
      url: `/kms/keystores/${keystoreId}/keys/${keyId}/sign`,
      body: {message: 'hello', passphrase: 'wrong-secret'}
    })
    expect(wrongPassphrase.status).toBe(500)
    expect(wrongPassphrase.text).toBe(
      JSON.stringify({errMessage: `Failed to create a kms provider: invalid passphrase for keystore ${keystoreId}`})
    )

    const unknownKeystore = await harness.call('createKey', {
      url: '/kms/keystores/ks_missing/keys',
      body: {keyType: 'ED25519', passphrase: PASSPHRASE}
    })
    expect(unknownKeystore.status).toBe(500)
    expect(unknownKeystore.text).toBe(
      '{"errMessage":"Failed to create a kms provider: keystore ks_missing not found"}'
    )
  })

  it('reports unsupported key types and unknown keys', async () => {
    const harness = makeHarness()
    const keystoreId = await harness.createKeystore()

    const unsupported = await harness.call('createKey', {
      url: `/kms/keystores/${keystoreId}/keys`,
      body: {keyType: 'RSA2048', passphrase: PASSPHRASE}
    })
    expect(unsupported.status).toBe(500)
    expect(unsupported.text).toBe('{"errMessage":"Failed to create a key: unsupported key type: RSA2048"}')

    const unknownKey = await harness.call('sign', {
      url: `/kms/keystores/${keystoreId}/keys/kid_missing/sign`,
      body: {message: 'hello', passphrase: PASSPHRASE}
    })
    expect(unknownKey.status).toBe(500)
    expect(unknownKey.text).toBe(
      JSON.stringify({errMessage: `Failed to sign a message: key kid_missing not found in keystore ${keystoreId}`})
    )
  })

  it('records every key created concurrently in the same keystore', async () => {
    const harness = makeHarness()
    const keystoreId = await harness.createKeystore()

    const keyIds = await Promise.all(
      Array.from({length: 6}, () => harness.createKey(keystoreId, 'ED25519'))
    )

    const stored = await (await harness.repositoryFactory.open()).get(keystoreId)
    expect(stored.key_ids).toHaveLength(6)
    expect([...stored.key_ids].sort()).toEqual([...keyIds].sort())
  })

  it('echoes the correlation id and builds locations from the host header', async () => {
    const harness = makeHarness()

    const response = await harness.call('createKeystore', {
      url: '/kms/keystores',
      headers: {host: 'kms.internal:8443', 'x-correlation-id': 'corr-test-1'},
      body: {controller: 'did:example:456'}
    })

    expect(response.headers['x-correlation-id']).toBe('corr-test-1')
    expect(response.headers.location).toMatch(/^http:\/\/kms\.internal:8443\/kms\/keystores\/ks_[0-9a-f]{32}$/u)
  })

  it('maps keystore service failures and unexpected errors to 500', async () => {
    const failing = makeHarness({
      keystoreService: {
        create: () => Promise.resolve({ok: false, error: {code: 'storage_failure', message: 'redis unavailable'}})
      }
    })
    const failed = await failing.call('createKeystore', {url: '/kms/keystores', body: {controller: 'did:example:1'}})
    expect(failed.status).toBe(500)
    expect(failed.text).toBe('{"errMessage":"Failed to create a keystore: redis unavailable"}')

    const throwing = makeHarness({
      keystoreService: {
        create: () => Promise.reject(new Error('boom'))
      }
    })
    const unexpected = await throwing.call('createKeystore', {url: '/kms/keystores', body: {controller: 'did:example:1'}})
    expect(unexpected.status).toBe(500)
    expect(unexpected.text).toBe('{"errMessage":"Unexpected internal error"}')
  })

  it('rejects unsupported routes and serves health checks', async () => {
    const harness = makeHarness()

    const fallback = await harness.call('fallback', {method: 'GET', url: '/kms/unknown?debug=1'})
    expect(fallback.status).toBe(400)
    expect(fallback.text).toBe('{"errMessage":"Received bad request: unsupported route GET /kms/unknown"}')

    const health = await harness.call('health', {method: 'GET', url: '/healthz'})
    expect(health.status).toBe(200)
    expect(health.text).toBe('{"status":"ok"}')
  })

  it('logs the request lifecycle with the final status', async () => {
    const harness = makeHarness()
    const info = vi.spyOn(harness.logger, 'info')
    const warn = vi.spyOn(harness.logger, 'warn')

    await harness.call('createKeystore', {url: '/kms/keystores', body: {}})

    expect(info).toHaveBeenCalledWith(expect.objectContaining({event: 'request.received', route: '/kms/keystores'}))
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({event: 'request.rejected', reason_code: 'request_body_schema_invalid'})
    )
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({event: 'request.completed', status_code: 400, reason_code: 'request_body_schema_invalid'})
    )
  })
})
