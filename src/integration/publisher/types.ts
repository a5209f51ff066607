import type { Content, Platform, PublishSuccess } from '../../types/rotation'

/** The account a post goes out under */
export interface PublishTarget {
  accountId: string
  platform: Platform
  brandId: string
  handle?: string
}

export interface PublishOptions {
  signal?: AbortSignal
}

/**
 * Delivers content through a single account.
 * Failures must be thrown as PublishError so the dispatcher can react to their kind.
 */
export interface Publisher {
  publish(target: PublishTarget, content: Content, options?: PublishOptions): Promise<PublishSuccess>
}
