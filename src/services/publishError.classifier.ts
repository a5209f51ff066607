import type { ErrorKind, Platform } from '../types/rotation'

export interface RawPublishFailure {
  statusCode?: number
  /** Platform-specific error code from the response body */
  errorCode?: number
  message: string
}

interface PlatformCodes {
  banned: ReadonlySet<number>
  rateLimited: ReadonlySet<number>
}

const PLATFORM_CODES: Partial<Record<Platform, PlatformCodes>> = {
  facebook: { banned: new Set([190, 368, 200, 100]), rateLimited: new Set([4, 17, 32, 613]) },
  instagram: { banned: new Set([190, 368, 200, 100]), rateLimited: new Set([4, 17, 32, 613]) },
  threads: { banned: new Set([190, 368, 200, 100]), rateLimited: new Set([4, 17, 32, 613]) },
  twitter: { banned: new Set([63, 64, 326, 32]), rateLimited: new Set([88, 185, 187, 226]) },
}

const BAN_KEYWORDS = [
  'banned',
  'suspended',
  'disabled',
  'blocked',
  'restricted',
  'violated',
  'policy',
  'spam',
  'abuse',
  'terminated',
  'deactivated',
  'locked',
  'forbidden',
]

const RATE_LIMIT_KEYWORDS = [
  'rate limit',
  'too many',
  'slow down',
  'try again later',
  'quota exceeded',
  'throttled',
  'limit reached',
]

const TOKEN_KEYWORDS = [
  'token expired',
  'invalid token',
  'token revoked',
  'unauthorized',
  'authentication required',
  'access denied',
  'login required',
]

const mentions = (text: string, keywords: string[]) => keywords.some((keyword) => text.includes(keyword))

// Temporary restrictions are suspensions, everything else on the ban list is a ban
const banOrSuspension = (text: string): ErrorKind =>
  text.includes('suspend') || text.includes('temporary') ? 'account_suspended' : 'account_banned'

const fromStatusCode = (statusCode: number, text: string): ErrorKind | null => {
  if (statusCode === 401) return 'authentication_error'
  if (statusCode === 403) return mentions(text, BAN_KEYWORDS) ? banOrSuspension(text) : 'authentication_error'
  if (statusCode === 429) return 'rate_limited'
  if (statusCode >= 500) return 'platform_error'
  return null
}

/**
 * Maps a raw publish failure onto an ErrorKind.
 * Platform error codes win over the HTTP status, which wins over message keywords.
 */
export function classifyPublishError(platform: Platform, failure: RawPublishFailure): ErrorKind {
  const text = failure.message.toLowerCase()

  const codes = PLATFORM_CODES[platform]
  if (codes && failure.errorCode !== undefined) {
    if (codes.rateLimited.has(failure.errorCode)) return 'rate_limited'
    if (codes.banned.has(failure.errorCode)) return banOrSuspension(text)
  }

  if (failure.statusCode !== undefined) {
    const kind = fromStatusCode(failure.statusCode, text)
    if (kind) return kind
  }

  if (mentions(text, RATE_LIMIT_KEYWORDS)) return 'rate_limited'
  if (text.includes('content') && (text.includes('reject') || text.includes('violat'))) return 'content_rejected'
  if (mentions(text, TOKEN_KEYWORDS)) return text.includes('expired') ? 'token_expired' : 'authentication_error'
  if (mentions(text, BAN_KEYWORDS)) return banOrSuspension(text)
  if (failure.statusCode === 400 || failure.statusCode === 422) return 'validation_error'

  return 'unknown'
}
