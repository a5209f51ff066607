import type {
  AccountPoolRecord,
  DispatchLogEntry,
  Platform,
  PoolMembershipRecord,
  SocialAccountRecord,
  StatusLogEntry,
} from '../types/rotation'

type Managed = 'id' | 'version' | 'createdAt' | 'updatedAt'

export type NewSocialAccount = Pick<SocialAccountRecord, 'platform' | 'brandId' | 'displayName'> & {
  handle?: string
}
export type SocialAccountPatch = Partial<Omit<SocialAccountRecord, Managed | 'platform' | 'brandId'>>

export type NewAccountPool = Pick<AccountPoolRecord, 'brandId' | 'platform' | 'name'> &
  Partial<
    Pick<
      AccountPoolRecord,
      'description' | 'rotationStrategy' | 'cooldownMinutes' | 'maxPostsPerDay' | 'autoFailover'
    >
  >
export type AccountPoolPatch = Partial<Omit<AccountPoolRecord, Managed | 'brandId' | 'platform'>>

export type NewPoolMembership = Pick<PoolMembershipRecord, 'poolId' | 'accountId' | 'priority' | 'weight'>
export type PoolMembershipPatch = Partial<Omit<PoolMembershipRecord, Managed | 'poolId' | 'accountId'>>

export interface AccountFilter {
  brandId?: string
  platform?: Platform
  isActive?: boolean
}

export interface PoolFilter {
  brandId?: string
  platform?: Platform
  isActive?: boolean
}

export interface LogQuery {
  since?: Date
  limit: number
}

/**
 * Records that are only ever mutated through compare-and-swap on `version`
 */
export interface VersionedRepository<T extends { version: number }, P> {
  findById(id: string): Promise<T | null>
  compareAndSwap(id: string, expectedVersion: number, patch: P): Promise<T | null>
}

export interface AccountRepository extends VersionedRepository<SocialAccountRecord, SocialAccountPatch> {
  create(input: NewSocialAccount): Promise<SocialAccountRecord>
  findByIds(ids: string[]): Promise<SocialAccountRecord[]>
  list(filter: AccountFilter): Promise<SocialAccountRecord[]>
  resetDailyCounters(): Promise<number>
}

export interface PoolRepository {
  create(input: NewAccountPool): Promise<AccountPoolRecord>
  findById(id: string): Promise<AccountPoolRecord | null>
  /** Oldest active pool for the pair */
  findActive(brandId: string, platform: Platform): Promise<AccountPoolRecord | null>
  list(filter: PoolFilter): Promise<AccountPoolRecord[]>
  update(id: string, patch: AccountPoolPatch): Promise<AccountPoolRecord | null>
}

export interface MembershipRepository extends VersionedRepository<PoolMembershipRecord, PoolMembershipPatch> {
  create(input: NewPoolMembership): Promise<PoolMembershipRecord>
  findByPool(poolId: string): Promise<PoolMembershipRecord[]>
  findByPoolAndAccount(poolId: string, accountId: string): Promise<PoolMembershipRecord | null>
  maxPriority(poolId: string): Promise<number | null>
  delete(id: string): Promise<boolean>
  resetDailyCounters(): Promise<number>
  findReservedBefore(cutoff: Date): Promise<PoolMembershipRecord[]>
  findExpiredCooldowns(now: Date): Promise<PoolMembershipRecord[]>
}

export interface AppendOnlyLog<E> {
  append(entry: E): Promise<void>
  listByPool(poolId: string, query: LogQuery): Promise<E[]>
  /** Entries across every pool, newest first */
  listSince(since: Date): Promise<E[]>
}

export interface RotationStore {
  accounts: AccountRepository
  pools: PoolRepository
  memberships: MembershipRepository
  dispatchLogs: AppendOnlyLog<DispatchLogEntry>
  statusLogs: AppendOnlyLog<StatusLogEntry>
}
