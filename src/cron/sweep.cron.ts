/**
 * Housekeeping for memberships
 *
 * - Every minute: force-release reservations left behind by crashed or hung dispatches
 * - Every 5 minutes: rewrite expired cooldowns as active
 */

import cron, { ScheduledTask } from 'node-cron'
import { Engine, staleReservationAgeMs } from '../services'
import { errorMessage } from '../utils/errors'
import logger from '../utils/logger'

export async function runReservationSweep(engine: Engine): Promise<number> {
  try {
    const released = await engine.health.releaseStaleReservations(staleReservationAgeMs(engine.config))
    if (released > 0) {
      logger.cron(`[Sweep] Released ${released} stale reservation(s)`)
    }
    return released
  } catch (error) {
    logger.cronError(`[Sweep] Reservation sweep failed: ${errorMessage(error)}`)
    return 0
  }
}

export async function runCooldownSweep(engine: Engine): Promise<number> {
  try {
    const normalized = await engine.health.normalizeExpiredCooldowns()
    if (normalized > 0) {
      logger.cron(`[Sweep] Normalised ${normalized} expired cooldown(s)`)
    }
    return normalized
  } catch (error) {
    logger.cronError(`[Sweep] Cooldown sweep failed: ${errorMessage(error)}`)
    return 0
  }
}

export function initSweepCron(engine: Engine): ScheduledTask[] {
  const tasks = [
    cron.schedule('* * * * *', () => runReservationSweep(engine)),
    cron.schedule('*/5 * * * *', () => runCooldownSweep(engine)),
  ]
  logger.cron('[Sweep] Sweep cron initialized (reservations every minute, cooldowns every 5 minutes)')
  return tasks
}

export default initSweepCron
