// Must be first: load environment variables
import { ENV } from './config/env'

import type { Server } from 'http'
import { createApp } from './app'
import connectDB, { disconnectDB } from './config/db'
import { closeRedis, initRedis } from './config/redis'
import initCronJobs from './cron'
import { HttpPublisher } from './integration/publisher/httpPublisher'
import { closeDispatchQueue } from './queue/dispatch.queue'
import { startDispatchWorker, stopDispatchWorker } from './queue/dispatch.worker'
import { createEngine } from './services'
import { createStore } from './store'
import logger from './utils/logger'

// Handle Uncaught Exceptions
process.on('uncaughtException', (err) => {
  logger.error('UNCAUGHT EXCEPTION! Shutting down...', err)
  process.exit(1)
})

// Handle Unhandled Rejections
process.on('unhandledRejection', (err) => {
  logger.error('UNHANDLED REJECTION! Shutting down...', err)
  process.exit(1)
})

async function bootstrap() {
  // 1) Store
  if (ENV.STORE_DRIVER === 'mongo') {
    await connectDB()
  } else {
    logger.warn('[Bootstrap] Using the in-memory store; state is lost on restart')
  }
  const store = createStore(ENV.STORE_DRIVER)

  // 2) Redis (optional)
  initRedis()

  // 3) Engine
  const publisher = new HttpPublisher({
    baseURL: ENV.PUBLISHER_BASE_URL,
    apiKey: ENV.PUBLISHER_API_KEY,
    timeoutMs: ENV.PUBLISH_TIMEOUT_MS,
  })
  const engine = createEngine(store, publisher)

  // 4) Worker (only if Redis is configured)
  startDispatchWorker(engine.dispatcher)

  // 5) Cron Jobs (start once per process)
  const tasks = initCronJobs(engine)

  // 6) HTTP Server
  const server: Server = createApp(engine).listen(ENV.PORT, () => {
    logger.info(`Account rotation engine running on port ${ENV.PORT}`)
  })

  const shutdown = async (signal: string) => {
    logger.info(`[Bootstrap] ${signal} received, shutting down`)
    tasks.forEach((task) => task.stop())
    server.close()
    await stopDispatchWorker()
    await closeDispatchQueue()
    await closeRedis()
    if (ENV.STORE_DRIVER === 'mongo') await disconnectDB()
    process.exit(0)
  }

  for (const signal of ['SIGINT', 'SIGTERM']) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error('[Bootstrap] Shutdown failed:', err)
        process.exit(1)
      })
    })
  }
}

bootstrap().catch((err) => {
  logger.error('[Bootstrap] Failed to start server:', err)
  process.exit(1)
})
