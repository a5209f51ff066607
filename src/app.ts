import express, { Request, Response, NextFunction } from 'express'
import cors from 'cors'
import { randomUUID } from 'crypto'
import { createAccountPoolRoutes } from './routes/accountPool.routes'
import { createDispatchRoutes } from './routes/dispatch.routes'
import { createSocialAccountRoutes } from './routes/socialAccount.routes'
import type { Engine } from './services'
import logger from './utils/logger'
import { errorHandler } from './middlewares/errorHandler'

// NOTE: All infrastructure initialization (DB/Redis/Queues/Crons) is done in `server.ts`.
// `app.ts` stays side-effect free so tests can build an app over an in-memory engine.

// Extend Express Request type with requestId for logging/tracing
declare global {
  namespace Express {
    interface Request {
      requestId?: string
    }
  }
}

export function createApp(engine: Engine) {
  const app = express()
  app.use(cors())
  app.use(express.json())

  // Request ID (Correlation ID)
  app.use((req: Request, res: Response, next: NextFunction) => {
    const headerId = req.headers['x-request-id']
    const requestId = typeof headerId === 'string' && headerId.trim().length > 0 ? headerId : randomUUID()
    req.requestId = requestId
    res.setHeader('X-Request-Id', requestId)
    next()
  })

  // Request Logger
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now()
    const { method, url } = req

    res.on('finish', () => {
      const duration = Date.now() - start
      logger.info(`[${req.requestId}] [${method}] ${url} ${res.statusCode} - ${duration}ms`)
    })

    next()
  })

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ success: true, data: { status: 'ok', uptime: process.uptime() } })
  })

  app.use('/api/dispatch', createDispatchRoutes(engine))
  app.use('/api/account-pools', createAccountPoolRoutes(engine))
  app.use('/api/social-accounts', createSocialAccountRoutes(engine))

  // 404 Handler (must be after all routes, before errorHandler)
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      message: `Route ${req.method} ${req.path} not found`,
    })
  })

  app.use(errorHandler)

  return app
}
