import type { PublishOptions, Publisher, PublishTarget } from '../integration/publisher/types'
import { createEngine, Engine, EngineConfig } from '../services'
import { DEFAULT_HEALTH_POLICY } from '../services/health.policy'
import { createMemoryStore } from '../store/memory.store'
import type {
  AccountPoolRecord,
  Content,
  ErrorKind,
  Platform,
  PoolMembershipRecord,
  PublishSuccess,
  RotationStrategy,
  SocialAccountRecord,
} from '../types/rotation'
import { PublishError } from '../utils/errors'

export const T0 = new Date('2026-03-01T10:00:00.000Z')

export class ManualClock {
  private current: Date

  constructor(start: Date = T0) {
    this.current = new Date(start.getTime())
  }

  now = (): Date => new Date(this.current.getTime())

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60_000)
  }
}

type Handler = (target: PublishTarget, content: Content, options: PublishOptions) => Promise<PublishSuccess>

/**
 * Records every call; succeeds unless told to fail for an account
 */
export class FakePublisher implements Publisher {
  readonly calls: string[] = []
  private failures = new Map<string, PublishError>()
  private handler: Handler | null = null

  failFor(accountId: string, kind: ErrorKind, message = `${kind} from platform`): void {
    this.failures.set(accountId, new PublishError(kind, message))
  }

  succeedFor(accountId: string): void {
    this.failures.delete(accountId)
  }

  use(handler: Handler): void {
    this.handler = handler
  }

  async publish(target: PublishTarget, content: Content, options: PublishOptions = {}): Promise<PublishSuccess> {
    this.calls.push(target.accountId)
    if (this.handler) return this.handler(target, content, options)

    const failure = this.failures.get(target.accountId)
    if (failure) throw failure
    const postId = `post-${this.calls.length}`
    return { postId, url: `https://posts.example.test/${target.platform}/${postId}` }
  }
}

export const testConfig = (overrides: Partial<EngineConfig['dispatch']> = {}): EngineConfig => ({
  policy: DEFAULT_HEALTH_POLICY,
  dispatch: {
    maxAttempts: 3,
    publishTimeoutMs: 1000,
    reservationWaitMs: 2000,
    reservationPollMs: 1,
    ...overrides,
  },
  reservationStaleFactor: 2,
})

export interface TestEngine extends Engine {
  clock: ManualClock
  publisher: FakePublisher
}

export const buildEngine = (
  options: { dispatch?: Partial<EngineConfig['dispatch']>; random?: () => number } = {},
): TestEngine => {
  const clock = new ManualClock()
  const publisher = new FakePublisher()
  const engine = createEngine(createMemoryStore(), publisher, testConfig(options.dispatch), {
    clock: clock.now,
    random: options.random,
  })
  return { ...engine, clock, publisher }
}

export interface SeedOptions {
  brandId?: string
  platform?: Platform
  members?: number
  rotationStrategy?: RotationStrategy
  maxPostsPerDay?: number
  cooldownMinutes?: number
  autoFailover?: boolean
}

export interface SeededPool {
  pool: AccountPoolRecord
  accounts: SocialAccountRecord[]
  memberships: PoolMembershipRecord[]
}

export async function seedPool(engine: Engine, options: SeedOptions = {}): Promise<SeededPool> {
  const brandId = options.brandId ?? 'brand-1'
  const platform = options.platform ?? 'facebook'
  const pool = await engine.registry.createPool({
    brandId,
    platform,
    name: `${platform} pool`,
    rotationStrategy: options.rotationStrategy ?? 'round_robin',
    maxPostsPerDay: options.maxPostsPerDay,
    cooldownMinutes: options.cooldownMinutes,
    autoFailover: options.autoFailover,
  })

  const accounts: SocialAccountRecord[] = []
  const memberships: PoolMembershipRecord[] = []
  for (let i = 0; i < (options.members ?? 3); i++) {
    const account = await engine.registry.linkAccount({ brandId, platform, displayName: `Account ${i + 1}` })
    accounts.push(account)
    memberships.push(await engine.registry.addMember(pool.id, { accountId: account.id }))
  }
  return { pool, accounts, memberships }
}

export const sortedAccountIds = (accounts: { id: string }[]): string[] => accounts.map((a) => a.id).sort()
