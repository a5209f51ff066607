import { v4 as uuidv4 } from 'uuid'
import type {
  AccountPoolRecord,
  DispatchLogEntry,
  Platform,
  PoolMembershipRecord,
  SocialAccountRecord,
  StatusLogEntry,
} from '../types/rotation'
import { ConflictError } from '../utils/errors'
import type {
  AccountFilter,
  AccountPoolPatch,
  AccountRepository,
  AppendOnlyLog,
  LogQuery,
  MembershipRepository,
  NewAccountPool,
  NewPoolMembership,
  NewSocialAccount,
  PoolFilter,
  PoolMembershipPatch,
  PoolRepository,
  RotationStore,
  SocialAccountPatch,
} from './types'

/**
 * In-process store. Every method body runs without awaiting between read and write,
 * so a compare-and-swap is atomic on the event loop.
 */

const copy = <T>(value: T): T => structuredClone(value)

const byCreatedAt = (a: { createdAt: Date }, b: { createdAt: Date }) =>
  a.createdAt.getTime() - b.createdAt.getTime()

class MemoryAccountRepository implements AccountRepository {
  private rows = new Map<string, SocialAccountRecord>()

  async create(input: NewSocialAccount): Promise<SocialAccountRecord> {
    const now = new Date()
    const row: SocialAccountRecord = {
      id: uuidv4(),
      platform: input.platform,
      brandId: input.brandId,
      displayName: input.displayName,
      handle: input.handle,
      isActive: true,
      lastUsedAt: null,
      postsToday: 0,
      successCount: 0,
      failureCount: 0,
      consecutiveFailures: 0,
      lastError: null,
      cooldownUntil: null,
      bannedAt: null,
      suspendedAt: null,
      deactivatedAt: null,
      version: 0,
      createdAt: now,
      updatedAt: now,
    }
    this.rows.set(row.id, row)
    return copy(row)
  }

  async findById(id: string): Promise<SocialAccountRecord | null> {
    const row = this.rows.get(id)
    return row ? copy(row) : null
  }

  async findByIds(ids: string[]): Promise<SocialAccountRecord[]> {
    return ids.flatMap((id) => {
      const row = this.rows.get(id)
      return row ? [copy(row)] : []
    })
  }

  async list(filter: AccountFilter): Promise<SocialAccountRecord[]> {
    return [...this.rows.values()]
      .filter(
        (row) =>
          (filter.brandId === undefined || row.brandId === filter.brandId) &&
          (filter.platform === undefined || row.platform === filter.platform) &&
          (filter.isActive === undefined || row.isActive === filter.isActive),
      )
      .sort(byCreatedAt)
      .map(copy)
  }

  async compareAndSwap(
    id: string,
    expectedVersion: number,
    patch: SocialAccountPatch,
  ): Promise<SocialAccountRecord | null> {
    const row = this.rows.get(id)
    if (!row || row.version !== expectedVersion) return null
    const next: SocialAccountRecord = { ...row, ...copy(patch), version: row.version + 1, updatedAt: new Date() }
    this.rows.set(id, next)
    return copy(next)
  }

  async resetDailyCounters(): Promise<number> {
    let updated = 0
    for (const row of this.rows.values()) {
      if (row.postsToday === 0) continue
      this.rows.set(row.id, { ...row, postsToday: 0, version: row.version + 1, updatedAt: new Date() })
      updated++
    }
    return updated
  }
}

class MemoryPoolRepository implements PoolRepository {
  private rows = new Map<string, AccountPoolRecord>()

  async create(input: NewAccountPool): Promise<AccountPoolRecord> {
    const duplicate = [...this.rows.values()].some(
      (row) => row.brandId === input.brandId && row.platform === input.platform && row.name === input.name,
    )
    if (duplicate) {
      throw new ConflictError('Pool with this name already exists for this brand and platform')
    }

    const now = new Date()
    const row: AccountPoolRecord = {
      id: uuidv4(),
      brandId: input.brandId,
      platform: input.platform,
      name: input.name,
      description: input.description,
      rotationStrategy: input.rotationStrategy ?? 'round_robin',
      cooldownMinutes: input.cooldownMinutes ?? 30,
      maxPostsPerDay: input.maxPostsPerDay ?? 10,
      autoFailover: input.autoFailover ?? true,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    }
    this.rows.set(row.id, row)
    return copy(row)
  }

  async findById(id: string): Promise<AccountPoolRecord | null> {
    const row = this.rows.get(id)
    return row ? copy(row) : null
  }

  async findActive(brandId: string, platform: Platform): Promise<AccountPoolRecord | null> {
    const [oldest] = await this.list({ brandId, platform, isActive: true })
    return oldest ?? null
  }

  async list(filter: PoolFilter): Promise<AccountPoolRecord[]> {
    return [...this.rows.values()]
      .filter(
        (row) =>
          (filter.brandId === undefined || row.brandId === filter.brandId) &&
          (filter.platform === undefined || row.platform === filter.platform) &&
          (filter.isActive === undefined || row.isActive === filter.isActive),
      )
      .sort(byCreatedAt)
      .map(copy)
  }

  async update(id: string, patch: AccountPoolPatch): Promise<AccountPoolRecord | null> {
    const row = this.rows.get(id)
    if (!row) return null
    if (patch.name !== undefined && patch.name !== row.name) {
      const clash = [...this.rows.values()].some(
        (other) =>
          other.id !== id &&
          other.brandId === row.brandId &&
          other.platform === row.platform &&
          other.name === patch.name,
      )
      if (clash) {
        throw new ConflictError('Pool with this name already exists for this brand and platform')
      }
    }
    const next = { ...row, ...copy(patch), updatedAt: new Date() }
    this.rows.set(id, next)
    return copy(next)
  }
}

class MemoryMembershipRepository implements MembershipRepository {
  private rows = new Map<string, PoolMembershipRecord>()

  async create(input: NewPoolMembership): Promise<PoolMembershipRecord> {
    if (await this.findByPoolAndAccount(input.poolId, input.accountId)) {
      throw new ConflictError('Account already in this pool')
    }

    const now = new Date()
    const row: PoolMembershipRecord = {
      id: uuidv4(),
      poolId: input.poolId,
      accountId: input.accountId,
      priority: input.priority,
      weight: input.weight,
      status: 'active',
      cooldownUntil: null,
      lastUsedAt: null,
      postsToday: 0,
      totalPosts: 0,
      successCount: 0,
      failureCount: 0,
      consecutiveFailures: 0,
      consecutiveRateLimits: 0,
      lastError: null,
      lastFailureAt: null,
      reservationId: null,
      reservedAt: null,
      version: 0,
      createdAt: now,
      updatedAt: now,
    }
    this.rows.set(row.id, row)
    return copy(row)
  }

  async findById(id: string): Promise<PoolMembershipRecord | null> {
    const row = this.rows.get(id)
    return row ? copy(row) : null
  }

  async findByPool(poolId: string): Promise<PoolMembershipRecord[]> {
    return [...this.rows.values()].filter((row) => row.poolId === poolId).sort(byCreatedAt).map(copy)
  }

  async findByPoolAndAccount(poolId: string, accountId: string): Promise<PoolMembershipRecord | null> {
    const row = [...this.rows.values()].find((r) => r.poolId === poolId && r.accountId === accountId)
    return row ? copy(row) : null
  }

  async maxPriority(poolId: string): Promise<number | null> {
    const priorities = [...this.rows.values()].filter((r) => r.poolId === poolId).map((r) => r.priority)
    return priorities.length > 0 ? Math.max(...priorities) : null
  }

  async compareAndSwap(
    id: string,
    expectedVersion: number,
    patch: PoolMembershipPatch,
  ): Promise<PoolMembershipRecord | null> {
    const row = this.rows.get(id)
    if (!row || row.version !== expectedVersion) return null
    const next: PoolMembershipRecord = { ...row, ...copy(patch), version: row.version + 1, updatedAt: new Date() }
    this.rows.set(id, next)
    return copy(next)
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id)
  }

  async resetDailyCounters(): Promise<number> {
    let updated = 0
    for (const row of this.rows.values()) {
      if (row.postsToday === 0) continue
      this.rows.set(row.id, { ...row, postsToday: 0, version: row.version + 1, updatedAt: new Date() })
      updated++
    }
    return updated
  }

  async findReservedBefore(cutoff: Date): Promise<PoolMembershipRecord[]> {
    return [...this.rows.values()]
      .filter((row) => row.reservedAt !== null && row.reservedAt.getTime() < cutoff.getTime())
      .map(copy)
  }

  async findExpiredCooldowns(now: Date): Promise<PoolMembershipRecord[]> {
    return [...this.rows.values()]
      .filter(
        (row) =>
          row.status === 'cooldown' &&
          (row.cooldownUntil === null || row.cooldownUntil.getTime() <= now.getTime()),
      )
      .map(copy)
  }
}

class MemoryLog<E extends { poolId?: string; createdAt: Date }> implements AppendOnlyLog<E> {
  private entries: E[] = []

  async append(entry: E): Promise<void> {
    this.entries.push(copy(entry))
  }

  async listByPool(poolId: string, query: LogQuery): Promise<E[]> {
    return this.entries
      .filter((e) => e.poolId === poolId && (!query.since || e.createdAt.getTime() >= query.since.getTime()))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, query.limit)
      .map(copy)
  }

  async listSince(since: Date): Promise<E[]> {
    return this.entries
      .filter((e) => e.createdAt.getTime() >= since.getTime())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(copy)
  }
}

export const createMemoryStore = (): RotationStore => ({
  accounts: new MemoryAccountRepository(),
  pools: new MemoryPoolRepository(),
  memberships: new MemoryMembershipRepository(),
  dispatchLogs: new MemoryLog<DispatchLogEntry>(),
  statusLogs: new MemoryLog<StatusLogEntry>(),
})
