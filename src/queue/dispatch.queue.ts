import { Job, Queue } from 'bullmq'
import { getRedisClient, getRedisConnection } from '../config/redis'
import type { Content, Platform } from '../types/rotation'
import logger from '../utils/logger'

export const DISPATCH_QUEUE_NAME = 'pool-dispatch'

export interface DispatchJobData {
  brandId: string
  platform: Platform
  content: Content
  /** Correlation id of the request that enqueued the job */
  requestId?: string
  timestamp: number
}

let dispatchQueue: Queue<DispatchJobData> | null = null

/**
 * Creates the queue on first use. Null when Redis is not configured.
 */
export const getDispatchQueue = (): Queue<DispatchJobData> | null => {
  if (dispatchQueue) return dispatchQueue
  if (!getRedisClient()) return null

  dispatchQueue = new Queue<DispatchJobData>(DISPATCH_QUEUE_NAME, {
    connection: getRedisConnection(),
    defaultJobOptions: {
      // Pool-exhausted dispatches are retried once members free up
      attempts: 5,
      backoff: {
        type: 'exponential',
        delay: 30_000,
      },
      removeOnComplete: {
        count: 500,
        age: 86400,
      },
      removeOnFail: {
        count: 1000,
        age: 604800,
      },
    },
  })
  logger.info('[DispatchQueue] Queue initialized')
  return dispatchQueue
}

export const addDispatchJob = async (
  data: Omit<DispatchJobData, 'timestamp'>,
): Promise<Job<DispatchJobData> | null> => {
  const queue = getDispatchQueue()
  if (!queue) {
    logger.warn('[DispatchQueue] Queue not available, skipping job')
    return null
  }

  const job = await queue.add('dispatch', { ...data, timestamp: Date.now() })
  logger.info(`[DispatchQueue] Job added: ${job.id} (${data.brandId}/${data.platform})`)
  return job
}

export const closeDispatchQueue = async (): Promise<void> => {
  if (!dispatchQueue) return
  await dispatchQueue.close()
  dispatchQueue = null
}
