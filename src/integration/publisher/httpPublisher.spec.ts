import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios'
import { PublishError } from '../../utils/errors'
import { HttpPublisher } from './httpPublisher'

type Reply = (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>

const respond =
  (status: number, data: unknown): Reply =>
  async (config) => {
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config }
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, {}, response)
    }
    return response
  }

const publisherWith = (adapter: Reply) =>
  new HttpPublisher({
    baseURL: 'http://publisher.test',
    apiKey: 'test-secret',
    timeoutMs: 1000,
    axiosDefaults: { adapter },
  })

const target = { accountId: 'acc-1', platform: 'facebook' as const, brandId: 'brand-1' }

const publishError = async (publisher: HttpPublisher): Promise<PublishError> => {
  try {
    await publisher.publish(target, { text: 'hello' })
  } catch (error) {
    if (error instanceof PublishError) return error
    throw error
  }
  throw new Error('expected publish to fail')
}

describe('HttpPublisher', () => {
  it('posts the content for the account and returns the post id', async () => {
    const seen: { config?: InternalAxiosRequestConfig } = {}
    const publisher = publisherWith(async (config) => {
      seen.config = config
      return respond(200, { postId: 'p-1', url: 'https://posts.example.test/p-1' })(config)
    })

    const result = await publisher.publish(target, { text: 'hello' })

    expect(result).toEqual({ postId: 'p-1', url: 'https://posts.example.test/p-1' })
    expect(seen.config?.url).toBe('/publish/facebook')
    expect(seen.config?.method).toBe('post')
    expect(seen.config?.headers.get('X-Api-Key')).toBe('test-secret')
    expect(JSON.parse(String(seen.config?.data))).toEqual({
      accountId: 'acc-1',
      brandId: 'brand-1',
      content: { text: 'hello' },
    })
  })

  it('treats a response without a post id as a platform error', async () => {
    const error = await publishError(publisherWith(respond(200, { ok: true })))
    expect(error.kind).toBe('platform_error')
  })

  it('classifies error responses', async () => {
    const rateLimited = await publishError(publisherWith(respond(429, { error: { message: 'Too many posts' } })))
    expect(rateLimited.kind).toBe('rate_limited')
    expect(rateLimited.message).toBe('Too many posts')

    const banned = await publishError(
      publisherWith(respond(400, { error: { code: 368, message: 'You have been blocked from posting' } })),
    )
    expect(banned.kind).toBe('account_banned')
  })

  it('reports a missing response as a network error', async () => {
    const error = await publishError(
      publisherWith(async (config) => {
        throw new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED', config)
      }),
    )
    expect(error.kind).toBe('network_error')
    expect(error.message).toBe('timeout of 1000ms exceeded')
  })
})
