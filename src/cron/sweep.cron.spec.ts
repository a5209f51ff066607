import { buildEngine, seedPool } from '../test/fixtures'
import { runDailyReset } from './dailyReset.cron'
import { runCooldownSweep, runReservationSweep } from './sweep.cron'

describe('scheduled jobs', () => {
  it('releases reservations older than twice the publish timeout', async () => {
    const engine = buildEngine()
    const { pool, memberships } = await seedPool(engine, { members: 1 })
    await engine.health.reserve(memberships[0].id, pool, 'r-crashed')

    // publishTimeoutMs is 1000 in tests, so the cutoff is 2s
    expect(await runReservationSweep(engine)).toBe(0)
    engine.clock.advanceMinutes(1)
    expect(await runReservationSweep(engine)).toBe(1)
  })

  it('normalises expired cooldowns', async () => {
    const engine = buildEngine()
    const { memberships } = await seedPool(engine, { members: 1, cooldownMinutes: 5 })
    await engine.health.recordOutcome(memberships[0].id, 'failure', 'rate_limited')

    engine.clock.advanceMinutes(6)
    expect(await runCooldownSweep(engine)).toBe(1)
  })

  it('resets daily counters and reports what changed', async () => {
    const engine = buildEngine()
    const { memberships } = await seedPool(engine, { members: 1 })
    await engine.health.recordOutcome(memberships[0].id, 'success')

    expect(await runDailyReset(engine.health)).toEqual({ memberships: 1, accounts: 1 })
  })

  it('reports zero when the store is unavailable', async () => {
    const engine = buildEngine()
    jest.spyOn(engine.store.memberships, 'findReservedBefore').mockRejectedValue(new Error('store offline'))

    expect(await runReservationSweep(engine)).toBe(0)
  })
})
