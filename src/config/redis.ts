import Redis from 'ioredis'
import { ENV } from './env'
import logger from '../utils/logger'

let redisClient: Redis | null = null
let redisInitialized = false

/**
 * Shared connection for BullMQ. Returns null when REDIS_URL is not configured.
 */
export const initRedis = (): Redis | null => {
  if (redisClient) {
    return redisClient
  }

  // Already tried and not configured; warn only once
  if (redisInitialized) {
    return null
  }
  redisInitialized = true

  if (!ENV.REDIS_URL) {
    logger.warn('[Redis] REDIS_URL not configured, dispatch queue will be disabled')
    return null
  }

  redisClient = new Redis(ENV.REDIS_URL, {
    retryStrategy: (times) => Math.min(times * 50, 2000),
    // Required by BullMQ workers
    maxRetriesPerRequest: null,
  })

  redisClient.on('connect', () => {
    logger.info('[Redis] Connected')
  })

  redisClient.on('error', (err) => {
    logger.error('[Redis] Connection error:', err)
  })

  return redisClient
}

export const getRedisClient = (): Redis | null => redisClient ?? initRedis()

export const getRedisConnection = (): Redis => {
  const client = getRedisClient()
  if (!client) {
    throw new Error('Redis connection not available. Please configure REDIS_URL environment variable.')
  }
  return client
}

export const closeRedis = async (): Promise<void> => {
  if (!redisClient) return
  await redisClient.quit()
  redisClient = null
  redisInitialized = false
}
