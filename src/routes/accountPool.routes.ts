import express from 'express'
import { createAccountPoolController } from '../controllers/accountPool.controller'
import type { Engine } from '../services'

export const createAccountPoolRoutes = (engine: Engine) => {
  const router = express.Router()
  const controller = createAccountPoolController(engine)

  router.get('/', controller.listPools)
  router.post('/', controller.createPool)
  // Before /:id so these are not read as pool ids
  router.get('/health-report', controller.healthReport)
  router.post('/reset-daily-counters', controller.resetDailyCounters)
  router.get('/:id', controller.getPool)
  router.put('/:id', controller.updatePool)
  router.delete('/:id', controller.deactivatePool)
  router.get('/:id/health', controller.getHealth)
  router.get('/:id/next-account', controller.previewNext)
  router.get('/:id/logs', controller.getLogs)
  router.post('/:id/members', controller.addMember)
  router.put('/:id/members/:membershipId', controller.updateMember)
  router.delete('/:id/members/:membershipId', controller.removeMember)
  router.post('/:id/members/:membershipId/reset', controller.resetMember)

  return router
}
