import { addDispatchJob } from '../queue/dispatch.queue'
import type { Engine } from '../services'
import { asFields, optionalNumber, readContent, requirePlatform, requireString } from '../utils/validation'
import type { ApiHandler } from './types'

const readDispatchBody = (body: unknown) => {
  const fields = asFields(body)
  return {
    brandId: requireString(fields, 'brandId'),
    platform: requirePlatform(fields.platform),
    content: readContent(fields.content),
    timeoutMs: optionalNumber(fields, 'timeoutMs'),
  }
}

export const createDispatchController = (engine: Engine) => {
  /**
   * Publishes through the pool now. A failed publish still answers 200 with success=false and the attempt trail;
   * an unknown or exhausted pool goes through errorHandler.
   */
  const dispatch: ApiHandler = async (req, res, next) => {
    try {
      const { brandId, platform, content, timeoutMs } = readDispatchBody(req.body)
      const result = await engine.dispatcher.dispatch(brandId, platform, content, { timeoutMs })
      res.json({ success: result.success, data: result })
    } catch (error) {
      next(error)
    }
  }

  const enqueue: ApiHandler = async (req, res, next) => {
    try {
      const { brandId, platform, content } = readDispatchBody(req.body)
      const job = await addDispatchJob({ brandId, platform, content, requestId: req.requestId })
      if (!job) {
        res.status(503).json({ success: false, message: 'Dispatch queue is not configured' })
        return
      }
      res.status(202).json({ success: true, data: { jobId: job.id } })
    } catch (error) {
      next(error)
    }
  }

  return { dispatch, enqueue }
}
