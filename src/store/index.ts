import type { StoreDriver } from '../config/env'
import logger from '../utils/logger'
import { createMemoryStore } from './memory.store'
import { createMongoStore } from './mongo.store'
import type { RotationStore } from './types'

export const createStore = (driver: StoreDriver): RotationStore => {
  if (driver === 'memory') {
    logger.warn('[Store] Using in-process memory store, state is lost on restart')
    return createMemoryStore()
  }
  return createMongoStore()
}

export * from './types'
export { casUpdate } from './mutate'
export { createMemoryStore } from './memory.store'
export { createMongoStore } from './mongo.store'
