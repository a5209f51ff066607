import type { DispatchAttempt, ErrorKind } from '../types/rotation'

/**
 * Base class for errors that map onto an HTTP status in errorHandler
 */
export class AppError extends Error {
  readonly statusCode: number
  readonly code: string

  constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR') {
    super(message)
    this.name = new.target.name
    this.statusCode = statusCode
    this.code = code
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400, 'BAD_REQUEST')
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code = 'NOT_FOUND') {
    super(message, 404, code)
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code = 'CONFLICT') {
    super(message, 409, code)
  }
}

export class PoolNotConfiguredError extends NotFoundError {
  readonly brandId: string
  readonly platform: string

  constructor(brandId: string, platform: string) {
    super(`No active account pool for brand ${brandId} on ${platform}`, 'POOL_NOT_CONFIGURED')
    this.brandId = brandId
    this.platform = platform
  }
}

/**
 * Raised when no eligible member remains; the attempts made before running dry are kept for the caller
 */
export class PoolExhaustedError extends AppError {
  readonly poolId: string
  readonly attempts: DispatchAttempt[]

  constructor(poolId: string, attempts: DispatchAttempt[] = []) {
    super(`No eligible account available in pool ${poolId}`, 503, 'POOL_EXHAUSTED')
    this.poolId = poolId
    this.attempts = attempts
  }
}

export class ConcurrencyError extends AppError {
  constructor(entity: string, id: string) {
    super(`Concurrent update conflict on ${entity} ${id}`, 409, 'CONCURRENT_UPDATE')
  }
}

/**
 * Failure reported by the publish capability, already classified
 */
export class PublishError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string) {
    super(message)
    this.name = 'PublishError'
    this.kind = kind
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
