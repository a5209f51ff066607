import { v4 as uuidv4 } from 'uuid'
import type { Publisher } from '../integration/publisher/types'
import type { AppendOnlyLog } from '../store/types'
import {
  AccountPoolRecord,
  CONTENT_LEVEL_ERRORS,
  Content,
  DispatchAttempt,
  DispatchLogEntry,
  DispatchResult,
  ErrorKind,
  Platform,
  PoolMembershipRecord,
  PublishSuccess,
} from '../types/rotation'
import { Clock, systemClock } from '../utils/clock'
import { BadRequestError, PoolExhaustedError, PublishError, errorMessage } from '../utils/errors'
import logger from '../utils/logger'
import type { HealthManager } from './health.service'
import type { PoolRegistry } from './poolRegistry.service'
import { isSelectable, selectNext } from './rotation.selector'

export interface DispatchConfig {
  /** Upper bound on accounts tried per dispatch */
  maxAttempts: number
  publishTimeoutMs: number
  /** How long to wait for a busy member to be released before giving up */
  reservationWaitMs: number
  reservationPollMs: number
}

export const DEFAULT_DISPATCH_CONFIG: DispatchConfig = {
  maxAttempts: 3,
  publishTimeoutMs: 60_000,
  reservationWaitMs: 10_000,
  reservationPollMs: 250,
}

export interface DispatchOptions {
  timeoutMs?: number
}

export interface DispatchDeps {
  clock?: Clock
  random?: () => number
}

interface Reserved {
  membership: PoolMembershipRecord
  reservationId: string
}

type PublishOutcome = { ok: true; result: PublishSuccess } | { ok: false; kind: ErrorKind; message: string }

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms))

/**
 * Entry point for publishing through a pool: select, reserve, publish, record, fail over
 */
export class DispatchCoordinator {
  private readonly config: DispatchConfig
  private readonly clock: Clock
  private readonly random: () => number

  constructor(
    private readonly registry: PoolRegistry,
    private readonly health: HealthManager,
    private readonly publisher: Publisher,
    private readonly dispatchLog: Pick<AppendOnlyLog<DispatchLogEntry>, 'append'>,
    config: Partial<DispatchConfig> = {},
    deps: DispatchDeps = {},
  ) {
    this.config = { ...DEFAULT_DISPATCH_CONFIG, ...config }
    this.clock = deps.clock ?? systemClock
    this.random = deps.random ?? Math.random
  }

  async dispatch(
    brandId: string,
    platform: Platform,
    content: Content,
    options: DispatchOptions = {},
  ): Promise<DispatchResult> {
    const timeoutMs = this.resolveTimeout(options.timeoutMs)
    const startTime = Date.now()
    const { pool, memberships } = await this.registry.getPool(brandId, platform)
    if (memberships.length === 0) {
      logger.warn(`[Dispatch] Pool ${pool.id} has no members`)
      throw new PoolExhaustedError(pool.id)
    }

    const maxAttempts = pool.autoFailover ? this.config.maxAttempts : 1
    const limit = Math.min(maxAttempts, memberships.length)
    const excluded = new Set<string>()
    const attempts: DispatchAttempt[] = []

    while (attempts.length < limit) {
      const { membership, reservationId } = await this.acquire(pool, excluded, attempts)
      const { attempt, url } = await this.attempt(
        pool,
        membership,
        reservationId,
        content,
        attempts.length + 1,
        timeoutMs,
      )
      attempts.push(attempt)

      if (attempt.success) {
        logger.timerLog(`[Dispatch] ${brandId}/${platform} via ${membership.accountId}`, startTime)
        return {
          success: true,
          poolId: pool.id,
          accountUsed: membership.accountId,
          membershipId: membership.id,
          postId: attempt.postId,
          url,
          attempts,
        }
      }

      if (attempt.errorKind && CONTENT_LEVEL_ERRORS.has(attempt.errorKind)) {
        logger.warn(`[Dispatch] Pool ${pool.id}: ${attempt.errorKind} is not account-specific, not failing over`)
        break
      }
      excluded.add(membership.accountId)
    }

    const last = attempts[attempts.length - 1]
    logger.warn(`[Dispatch] ${brandId}/${platform} failed after ${attempts.length} attempt(s): ${last.errorKind}`)
    return {
      success: false,
      poolId: pool.id,
      accountUsed: last.accountId,
      membershipId: last.membershipId,
      error: { kind: last.errorKind ?? 'unknown', message: last.errorMessage ?? '' },
      attempts,
    }
  }

  /**
   * Selects and reserves the next member. A lost reservation race re-selects;
   * when every remaining candidate is merely busy, polls until one frees up or the wait runs out.
   */
  private async acquire(
    pool: AccountPoolRecord,
    excluded: ReadonlySet<string>,
    attempts: DispatchAttempt[],
  ): Promise<Reserved> {
    const deadline = Date.now() + this.config.reservationWaitMs

    for (;;) {
      const now = this.clock()
      const snapshot = await this.registry.snapshot(pool.id)
      const candidate = selectNext(pool, snapshot, excluded, { now, random: this.random })

      if (candidate) {
        const reservationId = uuidv4()
        const membership = await this.health.reserve(candidate.id, pool, reservationId)
        if (membership) return { membership, reservationId }
        logger.debug(`[Dispatch] Lost reservation race on ${candidate.id}, reselecting`)
        continue
      }

      const busy = snapshot.some(
        (m) => !excluded.has(m.accountId) && m.reservationId !== null && isSelectable(m, pool, now),
      )
      if (!busy || Date.now() >= deadline) {
        logger.warn(`[Dispatch] Pool ${pool.id} exhausted after ${attempts.length} attempt(s)`)
        throw new PoolExhaustedError(pool.id, [...attempts])
      }
      await sleep(this.config.reservationPollMs)
    }
  }

  private async attempt(
    pool: AccountPoolRecord,
    membership: PoolMembershipRecord,
    reservationId: string,
    content: Content,
    attemptNumber: number,
    timeoutMs: number,
  ): Promise<{ attempt: DispatchAttempt; url?: string }> {
    const started = Date.now()
    const outcome = await this.publishWithTimeout(pool, membership, content, timeoutMs)
    const latencyMs = Date.now() - started

    await this.settle(membership, reservationId, outcome)

    const at = this.clock()
    const attempt: DispatchAttempt = outcome.ok
      ? {
          attempt: attemptNumber,
          membershipId: membership.id,
          accountId: membership.accountId,
          success: true,
          postId: outcome.result.postId,
          latencyMs,
          at,
        }
      : {
          attempt: attemptNumber,
          membershipId: membership.id,
          accountId: membership.accountId,
          success: false,
          errorKind: outcome.kind,
          errorMessage: outcome.message,
          latencyMs,
          at,
        }

    logger.info(
      `[Dispatch] Pool ${pool.id} membership ${membership.id} attempt ${attemptNumber}: ` +
        (outcome.ok ? 'success' : `${outcome.kind} (${outcome.message})`) +
        ` at ${at.toISOString()}`,
    )
    await this.appendLog(pool, attempt)
    return { attempt, url: outcome.ok ? outcome.result.url : undefined }
  }

  /**
   * Per-call timeouts may only shorten the configured one
   */
  private resolveTimeout(timeoutMs: number | undefined): number {
    if (timeoutMs === undefined) return this.config.publishTimeoutMs
    const max = this.config.publishTimeoutMs
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > max) {
      throw new BadRequestError(`timeoutMs must be an integer between 1 and ${max}`)
    }
    return timeoutMs
  }

  /**
   * Records the outcome and releases the reservation. The publish has already happened,
   * so a bookkeeping failure is logged and the reservation is released on its own.
   */
  private async settle(membership: PoolMembershipRecord, reservationId: string, outcome: PublishOutcome): Promise<void> {
    try {
      if (outcome.ok) {
        await this.health.recordOutcome(membership.id, 'success', undefined, { reservationId })
      } else {
        await this.health.recordOutcome(membership.id, 'failure', outcome.kind, {
          reservationId,
          message: outcome.message,
        })
      }
      return
    } catch (error) {
      logger.error(`[Dispatch] Failed to record outcome for membership ${membership.id}: ${errorMessage(error)}`)
    }

    try {
      await this.health.releaseReservation(membership.id, reservationId)
    } catch (error) {
      logger.warn(`[Dispatch] Reservation ${reservationId} on ${membership.id} left for the sweep: ${errorMessage(error)}`)
    }
  }

  private async publishWithTimeout(
    pool: AccountPoolRecord,
    membership: PoolMembershipRecord,
    content: Content,
    timeoutMs: number,
  ): Promise<PublishOutcome> {
    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(new PublishError('network_error', `Publish timed out after ${timeoutMs}ms`))
      }, timeoutMs)
    })

    try {
      const result = await Promise.race([
        this.publisher.publish(
          { accountId: membership.accountId, platform: pool.platform, brandId: pool.brandId },
          content,
          { signal: controller.signal },
        ),
        timeout,
      ])
      return { ok: true, result }
    } catch (error) {
      const kind = error instanceof PublishError ? error.kind : 'unknown'
      return { ok: false, kind, message: errorMessage(error) }
    } finally {
      clearTimeout(timer)
    }
  }

  // The outcome is already committed; a lost log line must not fail the dispatch
  private async appendLog(pool: AccountPoolRecord, attempt: DispatchAttempt): Promise<void> {
    try {
      await this.dispatchLog.append({
        poolId: pool.id,
        membershipId: attempt.membershipId,
        accountId: attempt.accountId,
        brandId: pool.brandId,
        platform: pool.platform,
        attempt: attempt.attempt,
        success: attempt.success,
        errorKind: attempt.errorKind,
        errorMessage: attempt.errorMessage,
        postId: attempt.postId,
        latencyMs: attempt.latencyMs,
        createdAt: attempt.at,
      })
    } catch (error) {
      logger.warn(`[Dispatch] Failed to append dispatch log for pool ${pool.id}: ${errorMessage(error)}`)
    }
  }
}
