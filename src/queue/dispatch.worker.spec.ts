import { UnrecoverableError } from 'bullmq'
import { buildEngine, seedPool, TestEngine } from '../test/fixtures'
import { PoolExhaustedError } from '../utils/errors'
import { processDispatchJob } from './dispatch.worker'

const job = (brandId: string) => ({
  id: 'job-1',
  attemptsMade: 0,
  data: { brandId, platform: 'instagram' as const, content: { text: 'queued post' }, timestamp: 0 },
})

describe('processDispatchJob', () => {
  let engine: TestEngine

  beforeEach(() => {
    engine = buildEngine()
  })

  it('dispatches and returns the result', async () => {
    const { accounts } = await seedPool(engine, { platform: 'instagram', members: 1 })

    const result = await processDispatchJob(engine.dispatcher, job('brand-1'))

    expect(result).toMatchObject({ success: true, accountUsed: accounts[0].id, postId: 'post-1' })
  })

  it('fails permanently when the brand has no pool', async () => {
    await expect(processDispatchJob(engine.dispatcher, job('brand-404'))).rejects.toBeInstanceOf(UnrecoverableError)
  })

  it('rethrows an exhausted pool so the job is retried', async () => {
    const { memberships } = await seedPool(engine, { platform: 'instagram', members: 1 })
    await engine.health.recordOutcome(memberships[0].id, 'failure', 'account_suspended')

    await expect(processDispatchJob(engine.dispatcher, job('brand-1'))).rejects.toBeInstanceOf(PoolExhaustedError)
  })
})
