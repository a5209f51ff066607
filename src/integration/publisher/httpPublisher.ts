import axios, { AxiosInstance, CreateAxiosDefaults } from 'axios'
import { classifyPublishError } from '../../services/publishError.classifier'
import type { Content, PublishSuccess } from '../../types/rotation'
import { PublishError, errorMessage } from '../../utils/errors'
import logger from '../../utils/logger'
import type { PublishOptions, Publisher, PublishTarget } from './types'

export interface HttpPublisherConfig {
  baseURL: string
  apiKey: string
  timeoutMs: number
  /** Extra axios defaults, e.g. a custom adapter */
  axiosDefaults?: Omit<CreateAxiosDefaults, 'baseURL' | 'timeout'>
}

interface ErrorBody {
  code?: number
  message?: string
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null

// Accepts both { error: { code, message } } and flat { code, message } bodies
const readErrorBody = (data: unknown): ErrorBody => {
  if (!isRecord(data)) return typeof data === 'string' && data ? { message: data } : {}
  const source = isRecord(data.error) ? data.error : data
  return {
    code: typeof source.code === 'number' ? source.code : undefined,
    message: typeof source.message === 'string' ? source.message : undefined,
  }
}

/**
 * Publishes through the downstream delivery gateway: POST /publish/:platform
 */
export class HttpPublisher implements Publisher {
  private client: AxiosInstance

  constructor(config: HttpPublisherConfig) {
    this.client = axios.create({
      ...config.axiosDefaults,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      headers: { 'X-Api-Key': config.apiKey, 'Content-Type': 'application/json' },
    })
  }

  async publish(target: PublishTarget, content: Content, options: PublishOptions = {}): Promise<PublishSuccess> {
    const startTime = Date.now()
    const path = `/publish/${target.platform}`

    try {
      const res = await this.client.post<unknown>(
        path,
        { accountId: target.accountId, brandId: target.brandId, handle: target.handle, content },
        { signal: options.signal },
      )
      logger.timerLog(`[Publisher] POST ${path}`, startTime)

      const body = isRecord(res.data) ? res.data : {}
      if (typeof body.postId !== 'string' || !body.postId) {
        throw new PublishError('platform_error', 'Publish response did not include a post id')
      }
      return { postId: body.postId, url: typeof body.url === 'string' ? body.url : undefined }
    } catch (error) {
      throw this.toPublishError(target, path, error)
    }
  }

  private toPublishError(target: PublishTarget, path: string, error: unknown): PublishError {
    if (error instanceof PublishError) return error

    if (!axios.isAxiosError(error)) {
      return new PublishError('unknown', errorMessage(error))
    }

    // Timeouts, resets and aborts all arrive without a response
    if (!error.response) {
      logger.warn(`[Publisher] POST ${path} got no response (${error.code ?? 'no code'}): ${error.message}`)
      return new PublishError('network_error', error.message)
    }

    const body = readErrorBody(error.response.data)
    const message = body.message ?? error.message
    const kind = classifyPublishError(target.platform, {
      statusCode: error.response.status,
      errorCode: body.code,
      message,
    })
    logger.warn(`[Publisher] POST ${path} failed (${error.response.status}, ${kind}): ${message}`)
    return new PublishError(kind, message)
  }
}
