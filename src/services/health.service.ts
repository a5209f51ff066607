import dayjs from 'dayjs'
import { casUpdate, SwapResult } from '../store/mutate'
import type { PoolMembershipPatch, RotationStore } from '../store/types'
import type {
  AccountPoolRecord,
  ErrorKind,
  HealthReport,
  HealthStatus,
  OutcomeType,
  Platform,
  PlatformActivity,
  PoolHealth,
  PoolMembershipRecord,
  StatusLogEntry,
} from '../types/rotation'
import { Clock, systemClock } from '../utils/clock'
import { BadRequestError, NotFoundError, errorMessage } from '../utils/errors'
import logger from '../utils/logger'
import {
  applyAccountOutcome,
  applyFailure,
  applySuccess,
  DEFAULT_HEALTH_POLICY,
  effectiveStatus,
  HealthPolicy,
  transitionEvent,
} from './health.policy'
import { loadActiveMemberships } from './poolRegistry.service'
import { isEligible, isSelectable } from './rotation.selector'

export interface RecordOptions {
  /** Released in the same update when it is still the one held */
  reservationId?: string
  message?: string
}

export interface DailyResetResult {
  memberships: number
  accounts: number
}

export const HEALTH_REPORT_HOURS = { min: 1, max: 168, default: 24 } as const

type Trigger = StatusLogEntry['triggeredBy']

const MEMBERSHIP = 'PoolMembership'
const ACCOUNT = 'SocialAccount'

const successRate = (successes: number, failures: number): number => {
  const total = successes + failures
  if (total === 0) return 100
  return Math.round((successes / total) * 10000) / 100
}

/**
 * Applies publish outcomes to memberships and accounts, and owns every status transition
 */
export class HealthManager {
  constructor(
    private readonly store: RotationStore,
    private readonly policy: HealthPolicy = DEFAULT_HEALTH_POLICY,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Takes the exclusive in-flight hold on a membership.
   * Eligibility is re-checked against the latest version; null means the race was lost.
   */
  async reserve(
    membershipId: string,
    pool: Pick<AccountPoolRecord, 'rotationStrategy' | 'maxPostsPerDay'>,
    reservationId: string,
  ): Promise<PoolMembershipRecord | null> {
    const now = this.clock()
    const result = await casUpdate(this.store.memberships, MEMBERSHIP, membershipId, (current) =>
      isEligible(current, pool, now) ? { reservationId, reservedAt: now } : null,
    )
    return result ? result.after : null
  }

  async recordOutcome(
    membershipId: string,
    outcome: OutcomeType,
    errorKind?: ErrorKind,
    options: RecordOptions = {},
  ): Promise<PoolMembershipRecord> {
    const now = this.clock()
    const existing = await this.store.memberships.findById(membershipId)
    if (!existing) {
      throw new NotFoundError(`${MEMBERSHIP} ${membershipId} not found`)
    }
    const pool = await this.store.pools.findById(existing.poolId)
    if (!pool) {
      throw new NotFoundError(`Pool ${existing.poolId} not found`)
    }

    const kind = errorKind ?? 'unknown'
    const swap = await this.swapMembership(membershipId, (current) => {
      const patch =
        outcome === 'success'
          ? applySuccess(current, now)
          : applyFailure(current, pool, kind, options.message, this.policy, now)
      if (options.reservationId && current.reservationId === options.reservationId) {
        return { ...patch, reservationId: null, reservedAt: null }
      }
      return patch
    })
    const { before, after } = swap

    if (outcome === 'success') {
      logger.info(`[Health] Pool ${pool.id} membership ${membershipId}: success (${after.postsToday} today)`)
    } else {
      logger.warn(
        `[Health] Pool ${pool.id} membership ${membershipId}: ${kind} at ${now.toISOString()} -> ${after.status}`,
      )
    }

    await this.updateAccount(after, outcome, kind, options.message, now)
    await this.logTransition(after, before.status, after.status, 'system', now, after.lastError ?? undefined)
    return after
  }

  async resetDailyCounters(triggeredBy: Trigger = 'system'): Promise<DailyResetResult> {
    const memberships = await this.store.memberships.resetDailyCounters()
    const accounts = await this.store.accounts.resetDailyCounters()
    await this.store.statusLogs.append({
      event: 'daily_reset',
      message: `Reset postsToday on ${memberships} memberships and ${accounts} accounts`,
      triggeredBy,
      createdAt: this.clock(),
    })
    logger.info(`[Health] Daily counters reset: ${memberships} memberships, ${accounts} accounts`)
    return { memberships, accounts }
  }

  /**
   * Administrative recovery back to active; a held reservation is left alone
   */
  async resetMembership(membershipId: string): Promise<PoolMembershipRecord> {
    const now = this.clock()
    const { before, after } = await this.swapMembership(membershipId, () => ({
      status: 'active',
      cooldownUntil: null,
      consecutiveFailures: 0,
      consecutiveRateLimits: 0,
      lastError: null,
    }))

    await casUpdate(this.store.accounts, ACCOUNT, after.accountId, () => ({
      bannedAt: null,
      suspendedAt: null,
      cooldownUntil: null,
      consecutiveFailures: 0,
      lastError: null,
    }))

    await this.store.statusLogs.append({
      poolId: after.poolId,
      membershipId: after.id,
      accountId: after.accountId,
      event: 'account_recovered',
      oldStatus: before.status,
      newStatus: after.status,
      message: 'Manually reset',
      triggeredBy: 'user',
      createdAt: now,
    })
    logger.info(`[Health] Membership ${membershipId} reset from ${before.status} to active`)
    return after
  }

  async getPoolHealth(poolId: string): Promise<PoolHealth> {
    const pool = await this.store.pools.findById(poolId)
    if (!pool) {
      throw new NotFoundError(`Pool ${poolId} not found`)
    }

    const now = this.clock()
    const memberships = await loadActiveMemberships(this.store, poolId)
    const counts: Record<HealthStatus, number> = { active: 0, cooldown: 0, suspended: 0, banned: 0, error: 0 }
    let availableCount = 0
    let postsToday = 0
    let totalPosts = 0
    let successes = 0
    let failures = 0

    for (const m of memberships) {
      counts[effectiveStatus(m, now)]++
      if (isSelectable(m, pool, now)) availableCount++
      postsToday += m.postsToday
      totalPosts += m.totalPosts
      successes += m.successCount
      failures += m.failureCount
    }

    return {
      poolId,
      memberCount: memberships.length,
      activeCount: counts.active,
      cooldownCount: counts.cooldown,
      suspendedCount: counts.suspended,
      bannedCount: counts.banned,
      errorCount: counts.error,
      availableCount,
      postsToday,
      totalPosts,
      successRate: successRate(successes, failures),
    }
  }

  async getHealthReport(hours: number = HEALTH_REPORT_HOURS.default): Promise<HealthReport> {
    const { min, max } = HEALTH_REPORT_HOURS
    if (!Number.isInteger(hours) || hours < min || hours > max) {
      throw new BadRequestError(`hours must be an integer between ${min} and ${max}`)
    }

    const since = dayjs(this.clock()).subtract(hours, 'hour').toDate()
    const [dispatches, events] = await Promise.all([
      this.store.dispatchLogs.listSince(since),
      this.store.statusLogs.listSince(since),
    ])

    const byPlatform: Partial<Record<Platform, PlatformActivity>> = {}
    for (const entry of dispatches) {
      const activity = byPlatform[entry.platform] ?? { attempts: 0, failures: 0 }
      activity.attempts++
      if (!entry.success) activity.failures++
      byPlatform[entry.platform] = activity
    }

    const successes = dispatches.filter((e) => e.success).length
    return {
      periodHours: hours,
      since,
      attempts: dispatches.length,
      successes,
      failures: dispatches.length - successes,
      rateLimits: dispatches.filter((e) => e.errorKind === 'rate_limited').length,
      bans: events.filter((e) => e.event === 'account_banned').length,
      suspensions: events.filter((e) => e.event === 'account_suspended').length,
      byPlatform,
    }
  }

  /**
   * Drops the hold if it is still the given one. False when it was already gone,
   * including when the membership itself was removed.
   */
  async releaseReservation(membershipId: string, reservationId: string): Promise<boolean> {
    try {
      const result = await casUpdate(
        this.store.memberships,
        MEMBERSHIP,
        membershipId,
        (current): PoolMembershipPatch | null =>
          current.reservationId === reservationId ? { reservationId: null, reservedAt: null } : null,
      )
      return result !== null
    } catch (error) {
      if (error instanceof NotFoundError) return false
      throw error
    }
  }

  /**
   * Force-releases reservations held longer than `maxAgeMs`, e.g. by a crashed worker
   */
  async releaseStaleReservations(maxAgeMs: number): Promise<number> {
    const now = this.clock()
    const cutoff = new Date(now.getTime() - maxAgeMs)
    const stale = await this.store.memberships.findReservedBefore(cutoff)
    let released = 0

    for (const membership of stale) {
      try {
        const result = await casUpdate(this.store.memberships, MEMBERSHIP, membership.id, (current) =>
          current.reservationId === membership.reservationId &&
          current.reservedAt !== null &&
          current.reservedAt.getTime() < cutoff.getTime()
            ? { reservationId: null, reservedAt: null }
            : null,
        )
        if (!result) continue

        released++
        await this.store.statusLogs.append({
          poolId: membership.poolId,
          membershipId: membership.id,
          accountId: membership.accountId,
          event: 'reservation_released',
          message: `Stale reservation ${membership.reservationId ?? ''} released`,
          triggeredBy: 'system',
          createdAt: now,
        })
      } catch (error) {
        logger.error(`[Health] Failed to release reservation on ${membership.id}: ${errorMessage(error)}`)
      }
    }

    if (released > 0) {
      logger.warn(`[Health] Released ${released} stale reservation(s)`)
    }
    return released
  }

  /**
   * Rewrites expired cooldowns as active; reads already treat them that way
   */
  async normalizeExpiredCooldowns(): Promise<number> {
    const now = this.clock()
    const expired = await this.store.memberships.findExpiredCooldowns(now)
    let normalized = 0

    for (const membership of expired) {
      try {
        const result = await casUpdate(
          this.store.memberships,
          MEMBERSHIP,
          membership.id,
          (current): PoolMembershipPatch | null =>
            current.status === 'cooldown' && effectiveStatus(current, now) === 'active'
              ? { status: 'active', cooldownUntil: null }
              : null,
        )
        if (!result) continue

        normalized++
        await this.logTransition(result.after, 'cooldown', 'active', 'system', now)
      } catch (error) {
        logger.error(`[Health] Failed to normalise cooldown on ${membership.id}: ${errorMessage(error)}`)
      }
    }
    return normalized
  }

  private async swapMembership(
    membershipId: string,
    mutator: (current: PoolMembershipRecord) => PoolMembershipPatch,
  ): Promise<SwapResult<PoolMembershipRecord>> {
    const result = await casUpdate(this.store.memberships, MEMBERSHIP, membershipId, mutator)
    if (!result) {
      throw new NotFoundError(`${MEMBERSHIP} ${membershipId} not found`)
    }
    return result
  }

  // Account totals are secondary bookkeeping; a failure here must not undo the membership update
  private async updateAccount(
    membership: PoolMembershipRecord,
    outcome: OutcomeType,
    kind: ErrorKind,
    message: string | undefined,
    now: Date,
  ): Promise<void> {
    try {
      await casUpdate(this.store.accounts, ACCOUNT, membership.accountId, (account) =>
        applyAccountOutcome(
          account,
          outcome === 'success'
            ? { type: 'success' }
            : { type: 'failure', kind, message, cooldownUntil: membership.cooldownUntil },
          now,
        ),
      )
    } catch (error) {
      logger.error(`[Health] Failed to update account ${membership.accountId}: ${errorMessage(error)}`)
    }
  }

  private async logTransition(
    membership: PoolMembershipRecord,
    from: HealthStatus,
    to: HealthStatus,
    triggeredBy: Trigger,
    now: Date,
    message?: string,
  ): Promise<void> {
    const event = transitionEvent(from, to)
    if (!event) return
    await this.store.statusLogs.append({
      poolId: membership.poolId,
      membershipId: membership.id,
      accountId: membership.accountId,
      event,
      oldStatus: from,
      newStatus: to,
      message,
      triggeredBy,
      createdAt: now,
    })
  }
}
