import { casUpdate } from '../store/mutate'
import type {
  AccountFilter,
  AccountPoolPatch,
  NewAccountPool,
  NewSocialAccount,
  PoolFilter,
  RotationStore,
} from '../store/types'
import type {
  AccountPoolRecord,
  Platform,
  PoolMembershipRecord,
  SocialAccountRecord,
} from '../types/rotation'
import { Clock, systemClock } from '../utils/clock'
import { BadRequestError, ConflictError, NotFoundError, PoolNotConfiguredError } from '../utils/errors'
import logger from '../utils/logger'
import { effectiveStatus } from './health.policy'
import { orderForStrategy, selectNext } from './rotation.selector'

export const POOL_LIMITS = {
  cooldownMinutes: { min: 0, max: 1440 },
  maxPostsPerDay: { min: 1, max: 100 },
  weight: { min: 1, max: 1000 },
} as const

export const DEFAULT_WEIGHT = 100

export interface MemberInput {
  accountId: string
  priority?: number
  weight?: number
}

export interface MemberUpdate {
  priority?: number
  weight?: number
}

export interface PoolSnapshot {
  pool: AccountPoolRecord
  memberships: PoolMembershipRecord[]
}

export interface PoolMemberView extends PoolMembershipRecord {
  account: Pick<SocialAccountRecord, 'id' | 'displayName' | 'handle' | 'isActive'> | null
}

const assertRange = (field: string, value: number | undefined, range: { min: number; max: number }) => {
  if (value === undefined) return
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new BadRequestError(`${field} must be an integer between ${range.min} and ${range.max}`)
  }
}

const validatePoolSettings = (settings: Partial<Pick<AccountPoolRecord, 'cooldownMinutes' | 'maxPostsPerDay'>>) => {
  assertRange('cooldownMinutes', settings.cooldownMinutes, POOL_LIMITS.cooldownMinutes)
  assertRange('maxPostsPerDay', settings.maxPostsPerDay, POOL_LIMITS.maxPostsPerDay)
}

/**
 * Memberships of the pool whose account is still active
 */
export async function loadActiveMemberships(store: RotationStore, poolId: string): Promise<PoolMembershipRecord[]> {
  const memberships = await store.memberships.findByPool(poolId)
  if (memberships.length === 0) return []

  const accounts = await store.accounts.findByIds(memberships.map((m) => m.accountId))
  const active = new Set(accounts.filter((a) => a.isActive).map((a) => a.id))
  return memberships.filter((m) => active.has(m.accountId))
}

/**
 * Pools per (brand, platform) and their memberships.
 * Everything the dispatcher reads comes back as a fresh snapshot; nothing is cached.
 */
export class PoolRegistry {
  constructor(
    private readonly store: RotationStore,
    private readonly clock: Clock = systemClock,
  ) {}

  async getPool(brandId: string, platform: Platform): Promise<PoolSnapshot> {
    const pool = await this.store.pools.findActive(brandId, platform)
    if (!pool) {
      throw new PoolNotConfiguredError(brandId, platform)
    }
    return { pool, memberships: await this.snapshot(pool.id) }
  }

  async getPoolById(poolId: string): Promise<AccountPoolRecord> {
    const pool = await this.store.pools.findById(poolId)
    if (!pool) {
      throw new NotFoundError(`Pool ${poolId} not found`)
    }
    return pool
  }

  /**
   * Current memberships of the pool, minus those whose account was deactivated
   */
  async snapshot(poolId: string): Promise<PoolMembershipRecord[]> {
    return loadActiveMemberships(this.store, poolId)
  }

  /**
   * Members that could ever be picked, in the strategy's listing order
   */
  async listCandidates(poolId: string): Promise<PoolMembershipRecord[]> {
    const pool = await this.getPoolById(poolId)
    const now = this.clock()
    const candidates = (await this.snapshot(poolId)).filter((m) => {
      const status = effectiveStatus(m, now)
      return status !== 'banned' && status !== 'suspended'
    })
    return orderForStrategy(pool.rotationStrategy, candidates)
  }

  /**
   * Member the next dispatch would pick right now. Nothing is reserved, so a concurrent dispatch may take it first.
   */
  async previewNext(poolId: string): Promise<PoolMembershipRecord | null> {
    const pool = await this.getPoolById(poolId)
    return selectNext(pool, await this.snapshot(poolId), new Set(), { now: this.clock() })
  }

  async listMembers(poolId: string): Promise<PoolMemberView[]> {
    const pool = await this.getPoolById(poolId)
    const memberships = orderForStrategy(pool.rotationStrategy, await this.store.memberships.findByPool(poolId))
    const accounts = new Map(
      (await this.store.accounts.findByIds(memberships.map((m) => m.accountId))).map((a) => [a.id, a]),
    )
    return memberships.map((m) => {
      const account = accounts.get(m.accountId)
      return {
        ...m,
        account: account
          ? { id: account.id, displayName: account.displayName, handle: account.handle, isActive: account.isActive }
          : null,
      }
    })
  }

  async createPool(input: NewAccountPool): Promise<AccountPoolRecord> {
    validatePoolSettings(input)
    const pool = await this.store.pools.create(input)
    logger.info(`[PoolRegistry] Created pool ${pool.id} (${pool.brandId}/${pool.platform}, ${pool.rotationStrategy})`)
    return pool
  }

  async updatePool(poolId: string, patch: AccountPoolPatch): Promise<AccountPoolRecord> {
    validatePoolSettings(patch)
    const pool = await this.store.pools.update(poolId, patch)
    if (!pool) {
      throw new NotFoundError(`Pool ${poolId} not found`)
    }
    return pool
  }

  async deactivatePool(poolId: string): Promise<AccountPoolRecord> {
    const pool = await this.updatePool(poolId, { isActive: false })
    logger.info(`[PoolRegistry] Deactivated pool ${poolId}`)
    return pool
  }

  async listPools(filter: PoolFilter): Promise<AccountPoolRecord[]> {
    return this.store.pools.list(filter)
  }

  async addMember(poolId: string, input: MemberInput): Promise<PoolMembershipRecord> {
    assertRange('weight', input.weight, POOL_LIMITS.weight)
    if (input.priority !== undefined && (!Number.isInteger(input.priority) || input.priority < 0)) {
      throw new BadRequestError('priority must be a non-negative integer')
    }

    const pool = await this.getPoolById(poolId)
    const account = await this.store.accounts.findById(input.accountId)
    if (!account) {
      throw new NotFoundError(`Account ${input.accountId} not found`)
    }
    if (account.brandId !== pool.brandId) {
      throw new BadRequestError(`Account brand ${account.brandId} does not match pool brand ${pool.brandId}`)
    }
    if (account.platform !== pool.platform) {
      throw new BadRequestError(`Account platform ${account.platform} does not match pool platform ${pool.platform}`)
    }
    if (!account.isActive) {
      throw new BadRequestError(`Account ${account.id} is deactivated`)
    }
    if (await this.store.memberships.findByPoolAndAccount(poolId, account.id)) {
      throw new ConflictError(`Account ${account.id} is already a member of pool ${poolId}`)
    }

    let priority = input.priority
    if (priority === undefined) {
      const max = await this.store.memberships.maxPriority(poolId)
      priority = max === null ? 0 : max + 1
    }

    const membership = await this.store.memberships.create({
      poolId,
      accountId: account.id,
      priority,
      weight: input.weight ?? DEFAULT_WEIGHT,
    })
    logger.info(`[PoolRegistry] Added account ${account.id} to pool ${poolId} (priority ${priority})`)
    return membership
  }

  async updateMember(poolId: string, membershipId: string, update: MemberUpdate): Promise<PoolMembershipRecord> {
    assertRange('weight', update.weight, POOL_LIMITS.weight)
    if (update.priority !== undefined && (!Number.isInteger(update.priority) || update.priority < 0)) {
      throw new BadRequestError('priority must be a non-negative integer')
    }
    await this.getMembershipInPool(poolId, membershipId)

    const result = await casUpdate(this.store.memberships, 'PoolMembership', membershipId, () => ({
      ...(update.priority !== undefined && { priority: update.priority }),
      ...(update.weight !== undefined && { weight: update.weight }),
    }))
    if (!result) {
      throw new NotFoundError(`Membership ${membershipId} not found`)
    }
    return result.after
  }

  async removeMember(poolId: string, membershipId: string): Promise<void> {
    await this.getMembershipInPool(poolId, membershipId)
    await this.store.memberships.delete(membershipId)
    logger.info(`[PoolRegistry] Removed membership ${membershipId} from pool ${poolId}`)
  }

  async getMembershipInPool(poolId: string, membershipId: string): Promise<PoolMembershipRecord> {
    const membership = await this.store.memberships.findById(membershipId)
    if (!membership || membership.poolId !== poolId) {
      throw new NotFoundError(`Membership ${membershipId} not found in pool ${poolId}`)
    }
    return membership
  }

  async linkAccount(input: NewSocialAccount): Promise<SocialAccountRecord> {
    if (!input.displayName.trim()) {
      throw new BadRequestError('displayName is required')
    }
    const account = await this.store.accounts.create(input)
    logger.info(`[PoolRegistry] Linked ${account.platform} account ${account.id} to brand ${account.brandId}`)
    return account
  }

  /**
   * Soft-deactivation; the record and its history stay
   */
  async deactivateAccount(accountId: string): Promise<SocialAccountRecord> {
    const now = this.clock()
    const result = await casUpdate(this.store.accounts, 'SocialAccount', accountId, (account) =>
      account.isActive ? { isActive: false, deactivatedAt: now } : null,
    )
    if (result) {
      logger.info(`[PoolRegistry] Deactivated account ${accountId}`)
      return result.after
    }
    // Already inactive
    const account = await this.store.accounts.findById(accountId)
    if (!account) {
      throw new NotFoundError(`SocialAccount ${accountId} not found`)
    }
    return account
  }

  async listAccounts(filter: AccountFilter): Promise<SocialAccountRecord[]> {
    return this.store.accounts.list(filter)
  }
}
