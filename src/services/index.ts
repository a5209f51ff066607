import { ENV } from '../config/env'
import type { Publisher } from '../integration/publisher/types'
import type { RotationStore } from '../store/types'
import { Clock, systemClock } from '../utils/clock'
import { DispatchConfig, DispatchCoordinator } from './dispatch.service'
import { HealthPolicy } from './health.policy'
import { HealthManager } from './health.service'
import { PoolRegistry } from './poolRegistry.service'

export interface EngineConfig {
  policy: HealthPolicy
  dispatch: DispatchConfig
  /** Multiple of the publish timeout after which a reservation counts as stale */
  reservationStaleFactor: number
}

export interface Engine {
  store: RotationStore
  registry: PoolRegistry
  health: HealthManager
  dispatcher: DispatchCoordinator
  config: EngineConfig
  now: Clock
}

export const engineConfigFromEnv = (): EngineConfig => ({
  policy: {
    maxCooldownMinutes: ENV.COOLDOWN_MAX_MINUTES,
    authSuspendThreshold: ENV.AUTH_SUSPEND_THRESHOLD,
    transientCooldownThreshold: ENV.TRANSIENT_COOLDOWN_THRESHOLD,
  },
  dispatch: {
    maxAttempts: ENV.DISPATCH_MAX_ATTEMPTS,
    publishTimeoutMs: ENV.PUBLISH_TIMEOUT_MS,
    reservationWaitMs: ENV.RESERVATION_WAIT_MS,
    reservationPollMs: ENV.RESERVATION_POLL_MS,
  },
  reservationStaleFactor: ENV.RESERVATION_STALE_FACTOR,
})

export interface EngineDeps {
  clock?: Clock
  random?: () => number
}

/**
 * Wires registry, health manager and dispatcher over one store
 */
export function createEngine(
  store: RotationStore,
  publisher: Publisher,
  config: EngineConfig = engineConfigFromEnv(),
  deps: EngineDeps = {},
): Engine {
  const clock = deps.clock ?? systemClock
  const registry = new PoolRegistry(store, clock)
  const health = new HealthManager(store, config.policy, clock)
  const dispatcher = new DispatchCoordinator(registry, health, publisher, store.dispatchLogs, config.dispatch, {
    clock,
    random: deps.random,
  })
  return { store, registry, health, dispatcher, config, now: clock }
}

export const staleReservationAgeMs = (config: EngineConfig): number =>
  config.dispatch.publishTimeoutMs * config.reservationStaleFactor
