import dayjs from 'dayjs'
import type { PoolMembershipPatch, SocialAccountPatch } from '../store/types'
import type {
  AccountPoolRecord,
  ErrorKind,
  HealthStatus,
  PoolMembershipRecord,
  SocialAccountRecord,
  StatusEvent,
} from '../types/rotation'

export interface HealthPolicy {
  /** Ceiling for escalated rate-limit cooldowns */
  maxCooldownMinutes: number
  /** Auth/token failures in a row before the member is suspended */
  authSuspendThreshold: number
  /** Other failures in a row before the member is cooled down */
  transientCooldownThreshold: number
}

export const DEFAULT_HEALTH_POLICY: HealthPolicy = {
  maxCooldownMinutes: 24 * 60,
  authSuspendThreshold: 3,
  transientCooldownThreshold: 5,
}

const AUTH_ERRORS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['authentication_error', 'token_expired'])

type CooldownState = Pick<PoolMembershipRecord, 'status' | 'cooldownUntil'>

export const isCoolingDown = (state: Pick<CooldownState, 'cooldownUntil'>, now: Date): boolean =>
  state.cooldownUntil !== null && state.cooldownUntil.getTime() > now.getTime()

/**
 * Status as seen at `now`: an expired cooldown reads as active even before anything rewrites it
 */
export const effectiveStatus = (state: CooldownState, now: Date): HealthStatus => {
  if (state.status === 'cooldown' && !isCoolingDown(state, now)) return 'active'
  return state.status
}

/**
 * base × 2^(streak − 1), capped
 */
export const cooldownMinutesFor = (baseMinutes: number, rateLimitStreak: number, maxMinutes: number): number => {
  const doublings = Math.max(0, rateLimitStreak - 1)
  return Math.min(baseMinutes * 2 ** doublings, maxMinutes)
}

export const applySuccess = (membership: PoolMembershipRecord, now: Date): PoolMembershipPatch => ({
  status: 'active',
  cooldownUntil: null,
  successCount: membership.successCount + 1,
  totalPosts: membership.totalPosts + 1,
  postsToday: membership.postsToday + 1,
  consecutiveFailures: 0,
  consecutiveRateLimits: 0,
  lastUsedAt: now,
  lastError: null,
})

export const applyFailure = (
  membership: PoolMembershipRecord,
  pool: Pick<AccountPoolRecord, 'cooldownMinutes'>,
  kind: ErrorKind,
  message: string | undefined,
  policy: HealthPolicy,
  now: Date,
): PoolMembershipPatch => {
  const consecutiveFailures = membership.consecutiveFailures + 1
  const consecutiveRateLimits = kind === 'rate_limited' ? membership.consecutiveRateLimits + 1 : 0

  const patch: PoolMembershipPatch = {
    failureCount: membership.failureCount + 1,
    consecutiveFailures,
    consecutiveRateLimits,
    lastUsedAt: now,
    lastFailureAt: now,
    lastError: message ? `${kind}: ${message}` : kind,
  }

  const current = effectiveStatus(membership, now)

  if (kind === 'rate_limited') {
    const minutes = cooldownMinutesFor(pool.cooldownMinutes, consecutiveRateLimits, policy.maxCooldownMinutes)
    return { ...patch, status: 'cooldown', cooldownUntil: dayjs(now).add(minutes, 'minute').toDate() }
  }

  if (kind === 'account_banned') {
    return { ...patch, status: 'banned' }
  }

  if (kind === 'account_suspended') {
    return { ...patch, status: 'suspended' }
  }

  if (AUTH_ERRORS.has(kind)) {
    const status = consecutiveFailures >= policy.authSuspendThreshold ? 'suspended' : 'error'
    return { ...patch, status }
  }

  if (consecutiveFailures >= policy.transientCooldownThreshold) {
    return {
      ...patch,
      status: 'cooldown',
      cooldownUntil: dayjs(now).add(pool.cooldownMinutes, 'minute').toDate(),
    }
  }

  // Unchanged, but an expired cooldown is written back as active
  return current === membership.status ? patch : { ...patch, status: current, cooldownUntil: null }
}

/**
 * Account-level bookkeeping mirrored from a membership outcome
 */
export const applyAccountOutcome = (
  account: SocialAccountRecord,
  outcome: { type: 'success' } | { type: 'failure'; kind: ErrorKind; message?: string; cooldownUntil: Date | null },
  now: Date,
): SocialAccountPatch => {
  if (outcome.type === 'success') {
    return {
      successCount: account.successCount + 1,
      postsToday: account.postsToday + 1,
      consecutiveFailures: 0,
      lastUsedAt: now,
      lastError: null,
    }
  }

  const patch: SocialAccountPatch = {
    failureCount: account.failureCount + 1,
    consecutiveFailures: account.consecutiveFailures + 1,
    lastUsedAt: now,
    lastError: outcome.message ? `${outcome.kind}: ${outcome.message}` : outcome.kind,
  }

  if (outcome.kind === 'rate_limited' && outcome.cooldownUntil) {
    const later =
      account.cooldownUntil && account.cooldownUntil.getTime() > outcome.cooldownUntil.getTime()
        ? account.cooldownUntil
        : outcome.cooldownUntil
    return { ...patch, cooldownUntil: later }
  }
  if (outcome.kind === 'account_banned') return { ...patch, bannedAt: now }
  if (outcome.kind === 'account_suspended') return { ...patch, suspendedAt: now }
  return patch
}

/**
 * Account health is never stored by callers; it is read off the counters and signals
 */
export const deriveAccountHealth = (
  account: Pick<SocialAccountRecord, 'bannedAt' | 'suspendedAt' | 'cooldownUntil' | 'consecutiveFailures'>,
  policy: HealthPolicy,
  now: Date,
): HealthStatus => {
  if (account.bannedAt) return 'banned'
  if (account.suspendedAt) return 'suspended'
  if (isCoolingDown(account, now)) return 'cooldown'
  if (account.consecutiveFailures >= policy.authSuspendThreshold) return 'error'
  return 'active'
}

/**
 * Audit event for a status change, if the change is worth one
 */
export const transitionEvent = (from: HealthStatus, to: HealthStatus): StatusEvent | null => {
  if (from === to) return null
  switch (to) {
    case 'cooldown':
      return 'cooldown_started'
    case 'banned':
      return 'account_banned'
    case 'suspended':
      return 'account_suspended'
    case 'error':
      return 'account_error'
    case 'active':
      return from === 'cooldown' ? 'cooldown_ended' : 'account_recovered'
  }
}
