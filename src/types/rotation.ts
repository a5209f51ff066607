export const PLATFORMS = [
  'facebook',
  'instagram',
  'tiktok',
  'twitter',
  'line',
  'youtube',
  'threads',
  'linkedin',
  'pinterest',
] as const
export type Platform = (typeof PLATFORMS)[number]

export const HEALTH_STATUSES = ['active', 'cooldown', 'suspended', 'banned', 'error'] as const
export type HealthStatus = (typeof HEALTH_STATUSES)[number]

export const ROTATION_STRATEGIES = [
  'round_robin',
  'random',
  'least_used',
  'priority',
  'weighted_random',
] as const
export type RotationStrategy = (typeof ROTATION_STRATEGIES)[number]

export const ERROR_KINDS = [
  'network_error',
  'authentication_error',
  'rate_limited',
  'account_banned',
  'account_suspended',
  'content_rejected',
  'platform_error',
  'validation_error',
  'token_expired',
  'unknown',
] as const
export type ErrorKind = (typeof ERROR_KINDS)[number]

/** Failures that no account swap can fix */
export const CONTENT_LEVEL_ERRORS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'content_rejected',
  'validation_error',
])

export const isPlatform = (value: unknown): value is Platform =>
  typeof value === 'string' && (PLATFORMS as readonly string[]).includes(value)

export const isRotationStrategy = (value: unknown): value is RotationStrategy =>
  typeof value === 'string' && (ROTATION_STRATEGIES as readonly string[]).includes(value)

export const isErrorKind = (value: unknown): value is ErrorKind =>
  typeof value === 'string' && (ERROR_KINDS as readonly string[]).includes(value)

export interface SocialAccountRecord {
  id: string
  platform: Platform
  brandId: string
  displayName: string
  handle?: string
  isActive: boolean
  lastUsedAt: Date | null
  postsToday: number
  successCount: number
  failureCount: number
  consecutiveFailures: number
  lastError: string | null
  cooldownUntil: Date | null
  bannedAt: Date | null
  suspendedAt: Date | null
  deactivatedAt: Date | null
  version: number
  createdAt: Date
  updatedAt: Date
}

export interface AccountPoolRecord {
  id: string
  brandId: string
  platform: Platform
  name: string
  description?: string
  rotationStrategy: RotationStrategy
  cooldownMinutes: number
  maxPostsPerDay: number
  autoFailover: boolean
  isActive: boolean
  createdAt: Date
  updatedAt: Date
}

export interface PoolMembershipRecord {
  id: string
  poolId: string
  accountId: string
  priority: number
  weight: number
  status: HealthStatus
  cooldownUntil: Date | null
  lastUsedAt: Date | null
  postsToday: number
  totalPosts: number
  successCount: number
  failureCount: number
  consecutiveFailures: number
  consecutiveRateLimits: number
  lastError: string | null
  lastFailureAt: Date | null
  reservationId: string | null
  reservedAt: Date | null
  version: number
  createdAt: Date
  updatedAt: Date
}

/** Opaque payload handed to the publish capability */
export interface Content {
  text?: string
  mediaUrls?: string[]
  link?: string
  hashtags?: string[]
  metadata?: Record<string, unknown>
}

export interface PublishSuccess {
  postId: string
  url?: string
}

export type OutcomeType = 'success' | 'failure'

export interface DispatchAttempt {
  attempt: number
  membershipId: string
  accountId: string
  success: boolean
  errorKind?: ErrorKind
  errorMessage?: string
  postId?: string
  latencyMs: number
  at: Date
}

export interface DispatchResult {
  success: boolean
  poolId: string
  accountUsed: string | null
  membershipId: string | null
  postId?: string
  url?: string
  error?: { kind: ErrorKind; message: string }
  attempts: DispatchAttempt[]
}

export interface PoolHealth {
  poolId: string
  memberCount: number
  activeCount: number
  cooldownCount: number
  suspendedCount: number
  bannedCount: number
  errorCount: number
  availableCount: number
  postsToday: number
  totalPosts: number
  successRate: number
}

export interface PlatformActivity {
  attempts: number
  failures: number
}

/** Activity across every pool over a trailing window */
export interface HealthReport {
  periodHours: number
  since: Date
  attempts: number
  successes: number
  failures: number
  rateLimits: number
  bans: number
  suspensions: number
  byPlatform: Partial<Record<Platform, PlatformActivity>>
}

export type StatusEvent =
  | 'cooldown_started'
  | 'cooldown_ended'
  | 'account_suspended'
  | 'account_banned'
  | 'account_error'
  | 'account_recovered'
  | 'reservation_released'
  | 'daily_reset'

export interface StatusLogEntry {
  poolId?: string
  membershipId?: string
  accountId?: string
  event: StatusEvent
  oldStatus?: HealthStatus
  newStatus?: HealthStatus
  message?: string
  triggeredBy: 'system' | 'user'
  createdAt: Date
}

export interface DispatchLogEntry {
  poolId: string
  membershipId: string
  accountId: string
  brandId: string
  platform: Platform
  attempt: number
  success: boolean
  errorKind?: ErrorKind
  errorMessage?: string
  postId?: string
  latencyMs: number
  createdAt: Date
}
