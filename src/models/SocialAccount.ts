import mongoose from 'mongoose'
import { PLATFORMS, Platform } from '../types/rotation'

/**
 * One concrete credential/session for a platform, linked to a brand.
 * Never deleted while history references it; soft-deactivated via isActive.
 */
export interface ISocialAccount extends mongoose.Document {
  platform: Platform
  brandId: string
  displayName: string
  handle?: string
  isActive: boolean
  lastUsedAt: Date | null
  postsToday: number
  successCount: number
  failureCount: number
  consecutiveFailures: number
  lastError: string | null
  cooldownUntil: Date | null
  bannedAt: Date | null // ban signal
  suspendedAt: Date | null // suspension signal
  deactivatedAt: Date | null
  version: number
  createdAt: Date
  updatedAt: Date
}

const socialAccountSchema = new mongoose.Schema(
  {
    platform: { type: String, enum: PLATFORMS, required: true },
    brandId: { type: String, required: true, index: true },
    displayName: { type: String, required: true, trim: true },
    handle: { type: String, trim: true },
    isActive: { type: Boolean, default: true },

    // Usage
    lastUsedAt: { type: Date, default: null },
    postsToday: { type: Number, default: 0 },
    successCount: { type: Number, default: 0 },
    failureCount: { type: Number, default: 0 },
    consecutiveFailures: { type: Number, default: 0 },
    lastError: { type: String, default: null },

    // Health signals
    cooldownUntil: { type: Date, default: null },
    bannedAt: { type: Date, default: null },
    suspendedAt: { type: Date, default: null },
    deactivatedAt: { type: Date, default: null },

    version: { type: Number, default: 0 },
  },
  {
    timestamps: true,
  },
)

socialAccountSchema.index({ brandId: 1, platform: 1, isActive: 1 })

export default mongoose.model<ISocialAccount>('SocialAccount', socialAccountSchema)
