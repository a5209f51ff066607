import type { AccountPoolRecord, PoolMembershipRecord, RotationStrategy } from '../types/rotation'
import { effectiveStatus } from './health.policy'

export interface SelectOptions {
  now: Date
  /** Uniform source in [0, 1) */
  random?: () => number
}

type Pool = Pick<AccountPoolRecord, 'rotationStrategy' | 'maxPostsPerDay'>
type Comparator = (a: PoolMembershipRecord, b: PoolMembershipRecord) => number

const BLOCKED = new Set(['cooldown', 'suspended', 'banned'])

/**
 * Healthy and under the daily cap, whether or not another dispatch currently holds it
 */
export const isSelectable = (membership: PoolMembershipRecord, pool: Pool, now: Date): boolean =>
  !BLOCKED.has(effectiveStatus(membership, now)) && membership.postsToday < pool.maxPostsPerDay

export const isEligible = (
  membership: PoolMembershipRecord,
  pool: Pool,
  now: Date,
  excluded: ReadonlySet<string> = new Set(),
): boolean =>
  !excluded.has(membership.accountId) && membership.reservationId === null && isSelectable(membership, pool, now)

const byAccountId: Comparator = (a, b) => (a.accountId < b.accountId ? -1 : a.accountId > b.accountId ? 1 : 0)

// Never-used members sort first
const lastUsed = (m: PoolMembershipRecord) => (m.lastUsedAt ? m.lastUsedAt.getTime() : Number.NEGATIVE_INFINITY)

const byLastUsed: Comparator = (a, b) => {
  const diff = lastUsed(a) - lastUsed(b)
  return diff === 0 || Number.isNaN(diff) ? 0 : diff
}

const chain =
  (...comparators: Comparator[]): Comparator =>
  (a, b) => {
    for (const compare of comparators) {
      const result = compare(a, b)
      if (result !== 0) return result
    }
    return 0
  }

const roundRobin = chain(byLastUsed, byAccountId)
const leastUsed = chain((a, b) => a.totalPosts - b.totalPosts, byLastUsed, byAccountId)
const byPriority = chain((a, b) => a.priority - b.priority, leastUsed)

const ORDERED: Partial<Record<RotationStrategy, Comparator>> = {
  round_robin: roundRobin,
  least_used: leastUsed,
  priority: byPriority,
}

const pickWeighted = (candidates: PoolMembershipRecord[], random: () => number): PoolMembershipRecord => {
  const total = candidates.reduce((sum, m) => sum + Math.max(0, m.weight), 0)
  if (total <= 0) return candidates[Math.floor(random() * candidates.length)]

  let threshold = random() * total
  for (const candidate of candidates) {
    threshold -= Math.max(0, candidate.weight)
    if (threshold < 0) return candidate
  }
  return candidates[candidates.length - 1]
}

/**
 * Picks the member that should handle the next post, or null when the pool is exhausted.
 * Reads only the snapshot it is given; nothing is cached between calls.
 */
export function selectNext(
  pool: Pool,
  memberships: PoolMembershipRecord[],
  excluded: ReadonlySet<string>,
  options: SelectOptions,
): PoolMembershipRecord | null {
  const candidates = memberships
    .filter((m) => isEligible(m, pool, options.now, excluded))
    .sort(byAccountId)

  if (candidates.length === 0) return null

  const random = options.random ?? Math.random
  switch (pool.rotationStrategy) {
    case 'random':
      return candidates[Math.floor(random() * candidates.length)]
    case 'weighted_random':
      return pickWeighted(candidates, random)
    default: {
      const compare = ORDERED[pool.rotationStrategy] ?? roundRobin
      return [...candidates].sort(compare)[0]
    }
  }
}

/**
 * Natural listing order for a strategy, used by the registry and previews
 */
export const orderForStrategy = (
  strategy: RotationStrategy,
  memberships: PoolMembershipRecord[],
): PoolMembershipRecord[] =>
  [...memberships].sort(strategy === 'priority' ? chain((a, b) => a.priority - b.priority, byAccountId) : byAccountId)
