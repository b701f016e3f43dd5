export type DbErrorCode =
  | 'validation_error'
  | 'not_found'
  | 'conflict'
  | 'unexpected_error'

export class DbRepositoryError extends Error {
  public readonly code: DbErrorCode

  public constructor(code: DbErrorCode, message: string) {
    super(message)
    this.name = 'DbRepositoryError'
    this.code = code
  }
}

export const isDbRepositoryError = (value: unknown): value is DbRepositoryError =>
  value instanceof DbRepositoryError

export const mapStorageError = (error: unknown, operation: string): never => {
  if (error instanceof DbRepositoryError) {
    throw error
  }

  const reason = error instanceof Error ? error.message : 'unknown error'
  throw new DbRepositoryError('unexpected_error', `Storage ${operation} failed: ${reason}`)
}
