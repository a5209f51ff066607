import type { PoolMembershipRecord, SocialAccountRecord } from '../types/rotation'
import {
  applyAccountOutcome,
  applyFailure,
  applySuccess,
  cooldownMinutesFor,
  DEFAULT_HEALTH_POLICY,
  deriveAccountHealth,
  effectiveStatus,
  transitionEvent,
} from './health.policy'

const NOW = new Date('2026-03-01T10:00:00.000Z')
const inMinutes = (n: number) => new Date(NOW.getTime() + n * 60_000)
const pool = { cooldownMinutes: 30 }

const member = (overrides: Partial<PoolMembershipRecord> = {}): PoolMembershipRecord => ({
  id: 'm-1',
  poolId: 'pool-1',
  accountId: 'acc-1',
  priority: 0,
  weight: 100,
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
  createdAt: NOW,
  updatedAt: NOW,
  ...overrides,
})

describe('cooldownMinutesFor', () => {
  it('doubles per consecutive rate limit and caps at the maximum', () => {
    expect(cooldownMinutesFor(30, 1, 1440)).toBe(30)
    expect(cooldownMinutesFor(30, 2, 1440)).toBe(60)
    expect(cooldownMinutesFor(30, 3, 1440)).toBe(120)
    expect(cooldownMinutesFor(30, 7, 1440)).toBe(1440)
  })
})

describe('effectiveStatus', () => {
  it('reads an expired cooldown as active', () => {
    expect(effectiveStatus({ status: 'cooldown', cooldownUntil: inMinutes(-1) }, NOW)).toBe('active')
    expect(effectiveStatus({ status: 'cooldown', cooldownUntil: inMinutes(1) }, NOW)).toBe('cooldown')
    expect(effectiveStatus({ status: 'banned', cooldownUntil: null }, NOW)).toBe('banned')
  })
})

describe('applySuccess', () => {
  it('clears failure state and counts the post', () => {
    const patch = applySuccess(
      member({ status: 'error', consecutiveFailures: 2, consecutiveRateLimits: 1, postsToday: 3, totalPosts: 7 }),
      NOW,
    )
    expect(patch).toEqual({
      status: 'active',
      cooldownUntil: null,
      successCount: 1,
      totalPosts: 8,
      postsToday: 4,
      consecutiveFailures: 0,
      consecutiveRateLimits: 0,
      lastUsedAt: NOW,
      lastError: null,
    })
  })
})

describe('applyFailure', () => {
  const policy = DEFAULT_HEALTH_POLICY

  it('cools down for the base duration on the first rate limit', () => {
    const patch = applyFailure(member({ consecutiveFailures: 2 }), pool, 'rate_limited', undefined, policy, NOW)
    expect(patch.status).toBe('cooldown')
    expect(patch.cooldownUntil).toEqual(inMinutes(30))
    expect(patch.consecutiveFailures).toBe(3)
    expect(patch.consecutiveRateLimits).toBe(1)
    expect(patch.lastError).toBe('rate_limited')
  })

  it('doubles the cooldown on a second consecutive rate limit', () => {
    const patch = applyFailure(
      member({ status: 'cooldown', cooldownUntil: inMinutes(-1), consecutiveFailures: 3, consecutiveRateLimits: 1 }),
      pool,
      'rate_limited',
      'slow down',
      policy,
      NOW,
    )
    expect(patch.cooldownUntil).toEqual(inMinutes(60))
    expect(patch.lastError).toBe('rate_limited: slow down')
  })

  it('bans and suspends on the matching kinds', () => {
    expect(applyFailure(member(), pool, 'account_banned', undefined, policy, NOW).status).toBe('banned')
    expect(applyFailure(member(), pool, 'account_suspended', undefined, policy, NOW).status).toBe('suspended')
  })

  it('marks auth failures as error and suspends at the threshold', () => {
    expect(applyFailure(member(), pool, 'token_expired', undefined, policy, NOW).status).toBe('error')
    expect(
      applyFailure(member({ consecutiveFailures: 2 }), pool, 'authentication_error', undefined, policy, NOW).status,
    ).toBe('suspended')
  })

  it('leaves status alone for transient failures below the threshold', () => {
    const patch = applyFailure(member({ consecutiveRateLimits: 2 }), pool, 'network_error', 'reset', policy, NOW)
    expect(patch.status).toBeUndefined()
    expect(patch.consecutiveRateLimits).toBe(0)
    expect(patch.lastFailureAt).toEqual(NOW)
  })

  it('cools down with the base duration once transient failures reach the threshold', () => {
    const patch = applyFailure(member({ consecutiveFailures: 4 }), pool, 'platform_error', undefined, policy, NOW)
    expect(patch.status).toBe('cooldown')
    expect(patch.cooldownUntil).toEqual(inMinutes(30))
  })

  it('writes an expired cooldown back as active on a transient failure', () => {
    const patch = applyFailure(
      member({ status: 'cooldown', cooldownUntil: inMinutes(-5) }),
      pool,
      'unknown',
      undefined,
      policy,
      NOW,
    )
    expect(patch.status).toBe('active')
    expect(patch.cooldownUntil).toBeNull()
  })
})

describe('account bookkeeping', () => {
  const account: SocialAccountRecord = {
    id: 'acc-1',
    platform: 'facebook',
    brandId: 'brand-1',
    displayName: 'Account',
    isActive: true,
    lastUsedAt: null,
    postsToday: 1,
    successCount: 1,
    failureCount: 0,
    consecutiveFailures: 0,
    lastError: null,
    cooldownUntil: inMinutes(90),
    bannedAt: null,
    suspendedAt: null,
    deactivatedAt: null,
    version: 0,
    createdAt: NOW,
    updatedAt: NOW,
  }

  it('keeps the later cooldown when a membership rate limit arrives', () => {
    const patch = applyAccountOutcome(
      account,
      { type: 'failure', kind: 'rate_limited', cooldownUntil: inMinutes(30) },
      NOW,
    )
    expect(patch.cooldownUntil).toEqual(inMinutes(90))
    expect(patch.failureCount).toBe(1)
  })

  it('records ban signals and derives health from them', () => {
    const patch = applyAccountOutcome(account, { type: 'failure', kind: 'account_banned', cooldownUntil: null }, NOW)
    expect(patch.bannedAt).toEqual(NOW)
    expect(deriveAccountHealth({ ...account, ...patch }, DEFAULT_HEALTH_POLICY, NOW)).toBe('banned')
    expect(deriveAccountHealth(account, DEFAULT_HEALTH_POLICY, NOW)).toBe('cooldown')
    expect(deriveAccountHealth({ ...account, cooldownUntil: null }, DEFAULT_HEALTH_POLICY, NOW)).toBe('active')
  })
})

describe('transitionEvent', () => {
  it('names the event for a status change', () => {
    expect(transitionEvent('active', 'cooldown')).toBe('cooldown_started')
    expect(transitionEvent('cooldown', 'active')).toBe('cooldown_ended')
    expect(transitionEvent('error', 'active')).toBe('account_recovered')
    expect(transitionEvent('error', 'suspended')).toBe('account_suspended')
    expect(transitionEvent('active', 'active')).toBeNull()
  })
})
