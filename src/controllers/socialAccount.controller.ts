import type { Engine } from '../services'
import { deriveAccountHealth } from '../services/health.policy'
import type { SocialAccountRecord } from '../types/rotation'
import { asFields, optionalString, queryBoolean, queryValue, requirePlatform, requireString } from '../utils/validation'
import type { ApiHandler } from './types'

export const createSocialAccountController = (engine: Engine) => {
  const { registry } = engine

  const withHealth = (account: SocialAccountRecord) => ({
    ...account,
    healthStatus: deriveAccountHealth(account, engine.config.policy, engine.now()),
  })

  const listAccounts: ApiHandler = async (req, res, next) => {
    try {
      const platform = queryValue(req.query.platform)
      const accounts = await registry.listAccounts({
        brandId: queryValue(req.query.brandId),
        platform: platform === undefined ? undefined : requirePlatform(platform),
        isActive: queryBoolean(req.query.isActive),
      })
      res.json({ success: true, data: accounts.map(withHealth) })
    } catch (error) {
      next(error)
    }
  }

  const linkAccount: ApiHandler = async (req, res, next) => {
    try {
      const fields = asFields(req.body)
      const account = await registry.linkAccount({
        brandId: requireString(fields, 'brandId'),
        platform: requirePlatform(fields.platform),
        displayName: requireString(fields, 'displayName'),
        handle: optionalString(fields, 'handle'),
      })
      res.status(201).json({ success: true, data: withHealth(account) })
    } catch (error) {
      next(error)
    }
  }

  // Soft delete: memberships stay but drop out of pool snapshots
  const deactivateAccount: ApiHandler = async (req, res, next) => {
    try {
      const account = await registry.deactivateAccount(req.params.id)
      res.json({ success: true, data: withHealth(account) })
    } catch (error) {
      next(error)
    }
  }

  return { listAccounts, linkAccount, deactivateAccount }
}
