import { buildEngine, seedPool, TestEngine } from '../test/fixtures'
import { BadRequestError, ConflictError, NotFoundError, PoolNotConfiguredError } from '../utils/errors'

describe('PoolRegistry', () => {
  let engine: TestEngine

  beforeEach(() => {
    engine = buildEngine()
  })

  describe('getPool', () => {
    it('throws PoolNotConfiguredError when no active pool exists', async () => {
      await expect(engine.registry.getPool('brand-1', 'instagram')).rejects.toBeInstanceOf(PoolNotConfiguredError)
    })

    it('returns the oldest active pool for the pair with its members', async () => {
      const { pool } = await seedPool(engine, { members: 2 })
      await engine.registry.createPool({ brandId: 'brand-1', platform: 'facebook', name: 'backup' })

      const snapshot = await engine.registry.getPool('brand-1', 'facebook')

      expect(snapshot.pool.id).toBe(pool.id)
      expect(snapshot.memberships).toHaveLength(2)
    })

    it('skips deactivated pools', async () => {
      const { pool } = await seedPool(engine, { members: 1 })
      const backup = await engine.registry.createPool({ brandId: 'brand-1', platform: 'facebook', name: 'backup' })
      await engine.registry.deactivatePool(pool.id)

      expect((await engine.registry.getPool('brand-1', 'facebook')).pool.id).toBe(backup.id)
    })
  })

  describe('createPool', () => {
    it('applies defaults', async () => {
      const pool = await engine.registry.createPool({ brandId: 'brand-1', platform: 'tiktok', name: 'main' })
      expect(pool).toMatchObject({
        rotationStrategy: 'round_robin',
        cooldownMinutes: 30,
        maxPostsPerDay: 10,
        autoFailover: true,
        isActive: true,
      })
    })

    it('rejects a duplicate name for the same brand and platform', async () => {
      await engine.registry.createPool({ brandId: 'brand-1', platform: 'tiktok', name: 'main' })
      await expect(
        engine.registry.createPool({ brandId: 'brand-1', platform: 'tiktok', name: 'main' }),
      ).rejects.toBeInstanceOf(ConflictError)
    })

    it('rejects settings out of range', async () => {
      await expect(
        engine.registry.createPool({ brandId: 'brand-1', platform: 'tiktok', name: 'a', cooldownMinutes: 2000 }),
      ).rejects.toThrow('cooldownMinutes must be an integer between 0 and 1440')
      await expect(
        engine.registry.createPool({ brandId: 'brand-1', platform: 'tiktok', name: 'b', maxPostsPerDay: 0 }),
      ).rejects.toBeInstanceOf(BadRequestError)
    })
  })

  describe('addMember', () => {
    it('appends members after the current highest priority with the default weight', async () => {
      const { pool, memberships } = await seedPool(engine, { members: 2 })
      expect(memberships.map((m) => [m.priority, m.weight])).toEqual([
        [0, 100],
        [1, 100],
      ])

      const account = await engine.registry.linkAccount({ brandId: 'brand-1', platform: 'facebook', displayName: 'X' })
      const pinned = await engine.registry.addMember(pool.id, { accountId: account.id, priority: 10, weight: 250 })
      expect(pinned).toMatchObject({ priority: 10, weight: 250, status: 'active' })

      const next = await engine.registry.linkAccount({ brandId: 'brand-1', platform: 'facebook', displayName: 'Y' })
      expect((await engine.registry.addMember(pool.id, { accountId: next.id })).priority).toBe(11)
    })

    it('rejects an account from another platform', async () => {
      const { pool } = await seedPool(engine, { members: 0 })
      const account = await engine.registry.linkAccount({ brandId: 'brand-1', platform: 'twitter', displayName: 'X' })

      await expect(engine.registry.addMember(pool.id, { accountId: account.id })).rejects.toThrow(
        'Account platform twitter does not match pool platform facebook',
      )
    })

    it('rejects an account already in the pool', async () => {
      const { pool, accounts } = await seedPool(engine, { members: 1 })
      const attempt = engine.registry.addMember(pool.id, { accountId: accounts[0].id })

      await expect(attempt).rejects.toBeInstanceOf(ConflictError)
      await expect(attempt).rejects.toThrow(`Account ${accounts[0].id} is already a member of pool ${pool.id}`)
    })

    it('rejects an account that belongs to another brand', async () => {
      const { pool } = await seedPool(engine, { members: 0 })
      const account = await engine.registry.linkAccount({ brandId: 'brand-2', platform: 'facebook', displayName: 'X' })

      await expect(engine.registry.addMember(pool.id, { accountId: account.id })).rejects.toThrow(
        'Account brand brand-2 does not match pool brand brand-1',
      )
    })

    it('rejects a weight out of range', async () => {
      const { pool } = await seedPool(engine, { members: 0 })
      const account = await engine.registry.linkAccount({ brandId: 'brand-1', platform: 'facebook', displayName: 'X' })
      await expect(engine.registry.addMember(pool.id, { accountId: account.id, weight: 0 })).rejects.toBeInstanceOf(
        BadRequestError,
      )
    })
  })

  describe('members', () => {
    it('updates priority and weight', async () => {
      const { pool, memberships } = await seedPool(engine, { members: 1 })
      const updated = await engine.registry.updateMember(pool.id, memberships[0].id, { weight: 500 })
      expect(updated).toMatchObject({ priority: 0, weight: 500, version: memberships[0].version + 1 })
    })

    it('removes a member and refuses ids from another pool', async () => {
      const { pool, memberships } = await seedPool(engine, { members: 2 })
      const other = await engine.registry.createPool({ brandId: 'brand-1', platform: 'facebook', name: 'other' })

      await expect(engine.registry.removeMember(other.id, memberships[0].id)).rejects.toBeInstanceOf(NotFoundError)
      await engine.registry.removeMember(pool.id, memberships[0].id)

      expect((await engine.registry.snapshot(pool.id)).map((m) => m.id)).toEqual([memberships[1].id])
    })

    it('lists candidates without banned or suspended members, in priority order', async () => {
      const { pool, memberships } = await seedPool(engine, { members: 3, rotationStrategy: 'priority' })
      await engine.registry.updateMember(pool.id, memberships[2].id, { priority: 0 })
      await engine.registry.updateMember(pool.id, memberships[0].id, { priority: 5 })
      await engine.health.recordOutcome(memberships[1].id, 'failure', 'account_suspended')

      const candidates = await engine.registry.listCandidates(pool.id)

      expect(candidates.map((m) => m.id)).toEqual([memberships[2].id, memberships[0].id])
    })

    it('joins account details onto the member list', async () => {
      const { pool, accounts } = await seedPool(engine, { members: 1 })
      const [view] = await engine.registry.listMembers(pool.id)
      expect(view.account).toEqual({ id: accounts[0].id, displayName: 'Account 1', handle: undefined, isActive: true })
    })
  })

  describe('accounts', () => {
    it('soft-deactivates an account and drops it from pool snapshots', async () => {
      const { pool, accounts } = await seedPool(engine, { members: 2 })

      const deactivated = await engine.registry.deactivateAccount(accounts[0].id)
      const again = await engine.registry.deactivateAccount(accounts[0].id)

      expect(deactivated.isActive).toBe(false)
      expect(deactivated.deactivatedAt).toEqual(engine.clock.now())
      expect(again.version).toBe(deactivated.version)
      expect((await engine.registry.snapshot(pool.id)).map((m) => m.accountId)).toEqual([accounts[1].id])
      expect(await engine.registry.listAccounts({ brandId: 'brand-1', isActive: true })).toHaveLength(1)
    })

    it('rejects a blank display name', async () => {
      await expect(
        engine.registry.linkAccount({ brandId: 'brand-1', platform: 'line', displayName: '  ' }),
      ).rejects.toBeInstanceOf(BadRequestError)
    })
  })
})
