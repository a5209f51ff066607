import express from 'express'
import { createDispatchController } from '../controllers/dispatch.controller'
import type { Engine } from '../services'

export const createDispatchRoutes = (engine: Engine) => {
  const router = express.Router()
  const controller = createDispatchController(engine)

  router.post('/', controller.dispatch)
  router.post('/queue', controller.enqueue)

  return router
}
