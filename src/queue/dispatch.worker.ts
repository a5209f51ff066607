import { Job, UnrecoverableError, Worker } from 'bullmq'
import { getRedisClient, getRedisConnection } from '../config/redis'
import type { DispatchCoordinator } from '../services/dispatch.service'
import { DispatchResult, isPlatform } from '../types/rotation'
import { PoolExhaustedError, PoolNotConfiguredError, errorMessage } from '../utils/errors'
import logger from '../utils/logger'
import { DISPATCH_QUEUE_NAME, DispatchJobData } from './dispatch.queue'

type DispatchJob = Pick<Job<DispatchJobData>, 'id' | 'data' | 'attemptsMade'>

/**
 * Runs one queued dispatch.
 * A missing pool will not fix itself and fails the job for good; an exhausted pool is thrown back for retry.
 */
export const processDispatchJob = async (
  dispatcher: DispatchCoordinator,
  job: DispatchJob,
): Promise<DispatchResult> => {
  const { brandId, platform, content } = job.data
  if (!brandId || !isPlatform(platform)) {
    throw new UnrecoverableError(`Invalid dispatch job ${job.id}: brandId and a supported platform are required`)
  }

  logger.info(`[DispatchWorker] Processing job ${job.id}: ${brandId}/${platform} (attempt ${job.attemptsMade + 1})`)
  try {
    const result = await dispatcher.dispatch(brandId, platform, content)
    logger.info(`[DispatchWorker] Job ${job.id} finished: success=${result.success}`)
    return result
  } catch (error) {
    if (error instanceof PoolNotConfiguredError) {
      throw new UnrecoverableError(error.message)
    }
    if (error instanceof PoolExhaustedError) {
      logger.warn(`[DispatchWorker] Job ${job.id}: pool ${error.poolId} exhausted, will retry`)
    }
    throw error
  }
}

let dispatchWorker: Worker<DispatchJobData, DispatchResult> | null = null

export const startDispatchWorker = (dispatcher: DispatchCoordinator): Worker<DispatchJobData, DispatchResult> | null => {
  if (dispatchWorker) return dispatchWorker
  if (!getRedisClient()) {
    logger.warn('[DispatchWorker] Worker not initialized (Redis unavailable)')
    return null
  }

  dispatchWorker = new Worker<DispatchJobData, DispatchResult>(
    DISPATCH_QUEUE_NAME,
    (job) => processDispatchJob(dispatcher, job),
    {
      connection: getRedisConnection(),
      concurrency: 5,
    },
  )

  dispatchWorker.on('failed', (job, error) => {
    logger.error(`[DispatchWorker] Job ${job?.id} failed: ${errorMessage(error)}`)
  })
  dispatchWorker.on('error', (error) => {
    logger.error('[DispatchWorker] Worker error:', error)
  })
  dispatchWorker.on('stalled', (jobId) => {
    logger.warn(`[DispatchWorker] Job ${jobId} stalled`)
  })

  logger.info('[DispatchWorker] Dispatch worker initialized')
  return dispatchWorker
}

export const stopDispatchWorker = async (): Promise<void> => {
  if (!dispatchWorker) return
  await dispatchWorker.close()
  dispatchWorker = null
}
