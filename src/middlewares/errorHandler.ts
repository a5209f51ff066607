import type { NextFunction, Request } from 'express'
import { ENV } from '../config/env'
import type { JsonReply } from '../controllers/types'
import { AppError, errorMessage } from '../utils/errors'
import logger from '../utils/logger'

export const errorHandler = (
  err: unknown,
  req: Pick<Request, 'method' | 'url'>,
  res: JsonReply,
  _next: NextFunction,
) => {
  const statusCode = err instanceof AppError ? err.statusCode : 500
  const code = err instanceof AppError ? err.code : 'INTERNAL_ERROR'
  const message = errorMessage(err) || 'Internal Server Error'

  if (statusCode >= 500) {
    logger.error(`[${req.method}] ${req.url} - ${statusCode} - ${message}`, err)
  } else {
    logger.warn(`[${req.method}] ${req.url} - ${statusCode} - ${message}`)
  }

  res.status(statusCode).json({
    success: false,
    code,
    message,
    // Hide stack trace in production
    stack: ENV.NODE_ENV === 'production' || !(err instanceof Error) ? undefined : err.stack,
  })
}
