import mongoose from 'mongoose'
import { ERROR_KINDS, ErrorKind, PLATFORMS, Platform } from '../types/rotation'

/**
 * Append-only record of every publish attempt (audit only, not read by rotation)
 */
export interface IDispatchLog extends mongoose.Document {
  poolId: mongoose.Types.ObjectId
  membershipId: mongoose.Types.ObjectId
  accountId: mongoose.Types.ObjectId
  brandId: string
  platform: Platform
  attempt: number
  success: boolean
  errorKind?: ErrorKind
  errorMessage?: string
  postId?: string
  latencyMs: number
  createdAt: Date
}

const dispatchLogSchema = new mongoose.Schema(
  {
    poolId: { type: mongoose.Schema.Types.ObjectId, ref: 'AccountPool', required: true },
    membershipId: { type: mongoose.Schema.Types.ObjectId, ref: 'PoolMembership', required: true },
    accountId: { type: mongoose.Schema.Types.ObjectId, ref: 'SocialAccount', required: true },
    brandId: { type: String, required: true },
    platform: { type: String, enum: PLATFORMS, required: true },
    attempt: { type: Number, required: true },
    success: { type: Boolean, required: true },
    errorKind: { type: String, enum: ERROR_KINDS },
    errorMessage: { type: String },
    postId: { type: String },
    latencyMs: { type: Number, default: 0 },
    createdAt: { type: Date, default: Date.now },
  },
  {
    versionKey: false,
  },
)

dispatchLogSchema.index({ poolId: 1, createdAt: -1 })
dispatchLogSchema.index({ accountId: 1, createdAt: -1 })
dispatchLogSchema.index({ createdAt: -1 })

export default mongoose.model<IDispatchLog>('DispatchLog', dispatchLogSchema)
