export type KeystoreRepositoryErrorCode =
  | 'invalid_input'
  | 'not_found'
  | 'storage_failure'
  | 'decode_failure'
  | 'conflict'

export class KeystoreRepositoryError extends Error {
  public readonly code: KeystoreRepositoryErrorCode

  public constructor(code: KeystoreRepositoryErrorCode, message: string) {
    super(message)
    this.name = 'KeystoreRepositoryError'
    this.code = code
  }
}

export const isKeystoreRepositoryError = (value: unknown): value is KeystoreRepositoryError =>
  value instanceof KeystoreRepositoryError

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : 'unknown error')

const readErrorCode = (error: unknown): string => {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code
  }

  return 'unexpected_error'
}

export const toServiceFailure = (error: unknown) => ({
  ok: false as const,
  error: {
    code: readErrorCode(error),
    message: describeError(error)
  }
})
