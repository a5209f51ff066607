/**
 * Daily counter reset
 *
 * - Zeroes postsToday on every membership and account at the configured time
 * - Safe to run more than once a day
 */

import cron, { ScheduledTask } from 'node-cron'
import { ENV } from '../config/env'
import type { DailyResetResult, HealthManager } from '../services/health.service'
import { errorMessage } from '../utils/errors'
import logger from '../utils/logger'

export async function runDailyReset(health: HealthManager): Promise<DailyResetResult | null> {
  logger.cron('[DailyReset] Starting daily counter reset...')
  try {
    const result = await health.resetDailyCounters()
    logger.cron(`[DailyReset] Completed: ${result.memberships} memberships, ${result.accounts} accounts`)
    return result
  } catch (error) {
    logger.cronError(`[DailyReset] Failed: ${errorMessage(error)}`)
    return null
  }
}

export function initDailyResetCron(health: HealthManager): ScheduledTask {
  const task = cron.schedule(ENV.DAILY_RESET_CRON, () => runDailyReset(health), { timezone: ENV.CRON_TIMEZONE })
  logger.cron(`[DailyReset] Initialized with schedule: ${ENV.DAILY_RESET_CRON} (${ENV.CRON_TIMEZONE})`)
  return task
}

export default initDailyResetCron
