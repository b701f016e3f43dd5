export type ErrorStatus = 400 | 500

export class AppError extends Error {
  public readonly code: string
  public readonly status: ErrorStatus

  public constructor({code, message, status}: {code: string; message: string; status: ErrorStatus}) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
  }
}

export const badRequest = (code: string, reason: string) =>
  new AppError({code, message: `Received bad request: ${reason}`, status: 400})

export const internal = (code: string, message: string) => new AppError({code, message, status: 500})

export type KmsOperation =
  | 'create a keystore'
  | 'create a kms provider'
  | 'create a key'
  | 'sign a message'
  | 'verify a message'
  | 'encrypt a message'
  | 'decrypt a message'

export const formatOperationFailure = (operation: KmsOperation, reason: string) => `Failed to ${operation}: ${reason}`

export const operationFailed = ({code, operation, reason}: {code: string; operation: KmsOperation; reason: string}) =>
  internal(code, formatOperationFailure(operation, reason))

export const isAppError = (value: unknown): value is AppError => value instanceof AppError
