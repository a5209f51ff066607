import express from 'express'
import { createSocialAccountController } from '../controllers/socialAccount.controller'
import type { Engine } from '../services'

export const createSocialAccountRoutes = (engine: Engine) => {
  const router = express.Router()
  const controller = createSocialAccountController(engine)

  router.get('/', controller.listAccounts)
  router.post('/', controller.linkAccount)
  router.delete('/:id', controller.deactivateAccount)

  return router
}
