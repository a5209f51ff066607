import mongoose from 'mongoose'
import { HEALTH_STATUSES, HealthStatus } from '../types/rotation'

/**
 * Per-pool rotation state of one account.
 * The same account can sit in several pools, each with its own status and counters.
 */
export interface IPoolMembership extends mongoose.Document {
  poolId: mongoose.Types.ObjectId
  accountId: mongoose.Types.ObjectId
  priority: number // lower is tried first
  weight: number
  status: HealthStatus
  cooldownUntil: Date | null
  lastUsedAt: Date | null
  postsToday: number
  totalPosts: number
  successCount: number
  failureCount: number
  consecutiveFailures: number
  consecutiveRateLimits: number
  lastError: string | null
  lastFailureAt: Date | null
  reservationId: string | null // in-flight dispatch holding this member
  reservedAt: Date | null
  version: number // bumped by every compare-and-swap
  createdAt: Date
  updatedAt: Date
}

const poolMembershipSchema = new mongoose.Schema(
  {
    poolId: { type: mongoose.Schema.Types.ObjectId, ref: 'AccountPool', required: true },
    accountId: { type: mongoose.Schema.Types.ObjectId, ref: 'SocialAccount', required: true },
    priority: { type: Number, default: 0, min: 0 },
    weight: { type: Number, default: 100, min: 1, max: 1000 },

    status: { type: String, enum: HEALTH_STATUSES, default: 'active' },
    cooldownUntil: { type: Date, default: null },

    lastUsedAt: { type: Date, default: null },
    postsToday: { type: Number, default: 0 },
    totalPosts: { type: Number, default: 0 },
    successCount: { type: Number, default: 0 },
    failureCount: { type: Number, default: 0 },
    consecutiveFailures: { type: Number, default: 0 },
    consecutiveRateLimits: { type: Number, default: 0 },
    lastError: { type: String, default: null },
    lastFailureAt: { type: Date, default: null },

    reservationId: { type: String, default: null },
    reservedAt: { type: Date, default: null },

    version: { type: Number, default: 0 },
  },
  {
    timestamps: true,
  },
)

poolMembershipSchema.index({ poolId: 1, accountId: 1 }, { unique: true })
poolMembershipSchema.index({ status: 1, cooldownUntil: 1 })
// Sweep lookup for stale reservations
poolMembershipSchema.index({ reservedAt: 1 }, { sparse: true })

export default mongoose.model<IPoolMembership>('PoolMembership', poolMembershipSchema)
