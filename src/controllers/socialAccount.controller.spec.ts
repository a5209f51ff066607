import { buildEngine, seedPool, TestEngine } from '../test/fixtures'
import { apiRequest, ReplyRecorder } from '../test/http'
import { BadRequestError } from '../utils/errors'
import { createSocialAccountController } from './socialAccount.controller'

describe('social account controller', () => {
  let engine: TestEngine
  let controller: ReturnType<typeof createSocialAccountController>

  beforeEach(() => {
    engine = buildEngine()
    controller = createSocialAccountController(engine)
  })

  it('links an account and reports it healthy', async () => {
    const reply = new ReplyRecorder()

    await controller.linkAccount(
      apiRequest({ body: { brandId: 'brand-1', platform: 'pinterest', displayName: 'Pins', handle: '@pins' } }),
      reply,
      jest.fn(),
    )

    expect(reply.statusCode).toBe(201)
    expect(reply.body).toMatchObject({
      success: true,
      data: { platform: 'pinterest', displayName: 'Pins', handle: '@pins', isActive: true, healthStatus: 'active' },
    })
  })

  it('rejects an unsupported platform', async () => {
    const next = jest.fn()

    await controller.linkAccount(
      apiRequest({ body: { brandId: 'brand-1', platform: 'orkut', displayName: 'Old' } }),
      new ReplyRecorder(),
      next,
    )

    expect(next).toHaveBeenCalledWith(expect.any(BadRequestError))
  })

  it('derives health from the account signals', async () => {
    const { memberships } = await seedPool(engine, { members: 2 })
    await engine.health.recordOutcome(memberships[0].id, 'failure', 'account_banned')
    await engine.health.recordOutcome(memberships[1].id, 'failure', 'rate_limited')
    const reply = new ReplyRecorder()

    await controller.listAccounts(apiRequest({ query: { brandId: 'brand-1' } }), reply, jest.fn())

    expect(reply.body).toMatchObject({
      data: [{ displayName: 'Account 1', healthStatus: 'banned' }, { displayName: 'Account 2', healthStatus: 'cooldown' }],
    })
  })

  it('soft-deactivates an account', async () => {
    const { accounts } = await seedPool(engine, { members: 1 })
    const reply = new ReplyRecorder()

    await controller.deactivateAccount(apiRequest({ params: { id: accounts[0].id } }), reply, jest.fn())

    expect(reply.body).toMatchObject({ success: true, data: { id: accounts[0].id, isActive: false } })

    const activeOnly = new ReplyRecorder()
    await controller.listAccounts(apiRequest({ query: { isActive: 'true' } }), activeOnly, jest.fn())
    expect(activeOnly.body).toEqual({ success: true, data: [] })
  })
})
