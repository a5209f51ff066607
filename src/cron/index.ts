import type { ScheduledTask } from 'node-cron'
import type { Engine } from '../services'
import logger from '../utils/logger'
import { initDailyResetCron } from './dailyReset.cron'
import { initSweepCron } from './sweep.cron'

const initCronJobs = (engine: Engine): ScheduledTask[] => {
  const tasks = [
    // Midnight reset of postsToday
    initDailyResetCron(engine.health),

    // Stale reservations and expired cooldowns
    ...initSweepCron(engine),
  ]

  logger.info('Cron jobs initialized')
  return tasks
}

export default initCronJobs
