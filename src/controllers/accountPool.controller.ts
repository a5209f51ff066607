import type { Engine } from '../services'
import type { AccountPoolPatch } from '../store/types'
import { BadRequestError } from '../utils/errors'
import {
  asFields,
  Fields,
  optionalBoolean,
  optionalNumber,
  optionalStrategy,
  optionalString,
  queryBoolean,
  queryValue,
  requirePlatform,
  requireString,
} from '../utils/validation'
import type { ApiHandler } from './types'

const LOG_LIMIT_DEFAULT = 50
const LOG_LIMIT_MAX = 200

const readLogQuery = (query: Record<string, unknown>) => {
  const type = queryValue(query.type) ?? 'dispatch'
  if (type !== 'dispatch' && type !== 'status') {
    throw new BadRequestError('type must be dispatch or status')
  }

  const rawLimit = queryValue(query.limit)
  const limit = rawLimit === undefined ? LOG_LIMIT_DEFAULT : Number(rawLimit)
  if (!Number.isInteger(limit) || limit < 1) {
    throw new BadRequestError('limit must be a positive integer')
  }

  const rawSince = queryValue(query.since)
  const since = rawSince === undefined ? undefined : new Date(rawSince)
  if (since && Number.isNaN(since.getTime())) {
    throw new BadRequestError('since must be an ISO date')
  }
  return { type, limit: Math.min(limit, LOG_LIMIT_MAX), since }
}

// Only the fields present in the body end up in the patch
const readPoolPatch = (fields: Fields): AccountPoolPatch => {
  const name = optionalString(fields, 'name')
  const description = optionalString(fields, 'description')
  const rotationStrategy = optionalStrategy(fields, 'rotationStrategy')
  const cooldownMinutes = optionalNumber(fields, 'cooldownMinutes')
  const maxPostsPerDay = optionalNumber(fields, 'maxPostsPerDay')
  const autoFailover = optionalBoolean(fields, 'autoFailover')
  const isActive = optionalBoolean(fields, 'isActive')
  return {
    ...(name !== undefined && { name }),
    ...(description !== undefined && { description }),
    ...(rotationStrategy !== undefined && { rotationStrategy }),
    ...(cooldownMinutes !== undefined && { cooldownMinutes }),
    ...(maxPostsPerDay !== undefined && { maxPostsPerDay }),
    ...(autoFailover !== undefined && { autoFailover }),
    ...(isActive !== undefined && { isActive }),
  }
}

export const createAccountPoolController = (engine: Engine) => {
  const { registry, health, store } = engine

  const listPools: ApiHandler = async (req, res, next) => {
    try {
      const platform = queryValue(req.query.platform)
      const pools = await registry.listPools({
        brandId: queryValue(req.query.brandId),
        platform: platform === undefined ? undefined : requirePlatform(platform),
        isActive: queryBoolean(req.query.isActive),
      })
      res.json({ success: true, data: pools })
    } catch (error) {
      next(error)
    }
  }

  const getPool: ApiHandler = async (req, res, next) => {
    try {
      const pool = await registry.getPoolById(req.params.id)
      const members = await registry.listMembers(pool.id)
      res.json({ success: true, data: { ...pool, members } })
    } catch (error) {
      next(error)
    }
  }

  const createPool: ApiHandler = async (req, res, next) => {
    try {
      const fields = asFields(req.body)
      const pool = await registry.createPool({
        brandId: requireString(fields, 'brandId'),
        platform: requirePlatform(fields.platform),
        name: requireString(fields, 'name'),
        description: optionalString(fields, 'description'),
        rotationStrategy: optionalStrategy(fields, 'rotationStrategy'),
        cooldownMinutes: optionalNumber(fields, 'cooldownMinutes'),
        maxPostsPerDay: optionalNumber(fields, 'maxPostsPerDay'),
        autoFailover: optionalBoolean(fields, 'autoFailover'),
      })
      res.status(201).json({ success: true, data: pool })
    } catch (error) {
      next(error)
    }
  }

  const updatePool: ApiHandler = async (req, res, next) => {
    try {
      const patch = readPoolPatch(asFields(req.body))
      const pool = await registry.updatePool(req.params.id, patch)
      res.json({ success: true, data: pool })
    } catch (error) {
      next(error)
    }
  }

  const deactivatePool: ApiHandler = async (req, res, next) => {
    try {
      const pool = await registry.deactivatePool(req.params.id)
      res.json({ success: true, data: pool })
    } catch (error) {
      next(error)
    }
  }

  const getHealth: ApiHandler = async (req, res, next) => {
    try {
      res.json({ success: true, data: await health.getPoolHealth(req.params.id) })
    } catch (error) {
      next(error)
    }
  }

  const healthReport: ApiHandler = async (req, res, next) => {
    try {
      const hours = queryValue(req.query.hours)
      const report = await health.getHealthReport(hours === undefined ? undefined : Number(hours))
      res.json({ success: true, data: report })
    } catch (error) {
      next(error)
    }
  }

  const previewNext: ApiHandler = async (req, res, next) => {
    try {
      const membership = await registry.previewNext(req.params.id)
      res.json({ success: true, data: membership })
    } catch (error) {
      next(error)
    }
  }

  const getLogs: ApiHandler = async (req, res, next) => {
    try {
      const pool = await registry.getPoolById(req.params.id)
      const { type, limit, since } = readLogQuery(req.query)
      const logs =
        type === 'status'
          ? await store.statusLogs.listByPool(pool.id, { limit, since })
          : await store.dispatchLogs.listByPool(pool.id, { limit, since })
      res.json({ success: true, data: logs })
    } catch (error) {
      next(error)
    }
  }

  const addMember: ApiHandler = async (req, res, next) => {
    try {
      const fields = asFields(req.body)
      const membership = await registry.addMember(req.params.id, {
        accountId: requireString(fields, 'accountId'),
        priority: optionalNumber(fields, 'priority'),
        weight: optionalNumber(fields, 'weight'),
      })
      res.status(201).json({ success: true, data: membership })
    } catch (error) {
      next(error)
    }
  }

  const updateMember: ApiHandler = async (req, res, next) => {
    try {
      const fields = asFields(req.body)
      const membership = await registry.updateMember(req.params.id, req.params.membershipId, {
        priority: optionalNumber(fields, 'priority'),
        weight: optionalNumber(fields, 'weight'),
      })
      res.json({ success: true, data: membership })
    } catch (error) {
      next(error)
    }
  }

  const removeMember: ApiHandler = async (req, res, next) => {
    try {
      await registry.removeMember(req.params.id, req.params.membershipId)
      res.json({ success: true, message: 'Member removed' })
    } catch (error) {
      next(error)
    }
  }

  const resetMember: ApiHandler = async (req, res, next) => {
    try {
      await registry.getMembershipInPool(req.params.id, req.params.membershipId)
      const membership = await health.resetMembership(req.params.membershipId)
      res.json({ success: true, data: membership })
    } catch (error) {
      next(error)
    }
  }

  const resetDailyCounters: ApiHandler = async (_req, res, next) => {
    try {
      res.json({ success: true, data: await health.resetDailyCounters('user') })
    } catch (error) {
      next(error)
    }
  }

  return {
    listPools,
    getPool,
    createPool,
    updatePool,
    deactivatePool,
    getHealth,
    healthReport,
    previewNext,
    getLogs,
    addMember,
    updateMember,
    removeMember,
    resetMember,
    resetDailyCounters,
  }
}
