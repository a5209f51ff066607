import mongoose from 'mongoose'
import { HEALTH_STATUSES, HealthStatus, StatusEvent } from '../types/rotation'

const STATUS_EVENTS: StatusEvent[] = [
  'cooldown_started',
  'cooldown_ended',
  'account_suspended',
  'account_banned',
  'account_error',
  'account_recovered',
  'reservation_released',
  'daily_reset',
]

export interface IStatusLog extends mongoose.Document {
  poolId?: mongoose.Types.ObjectId
  membershipId?: mongoose.Types.ObjectId
  accountId?: mongoose.Types.ObjectId
  event: StatusEvent
  oldStatus?: HealthStatus
  newStatus?: HealthStatus
  message?: string
  triggeredBy: 'system' | 'user'
  createdAt: Date
}

const statusLogSchema = new mongoose.Schema(
  {
    poolId: { type: mongoose.Schema.Types.ObjectId, ref: 'AccountPool' },
    membershipId: { type: mongoose.Schema.Types.ObjectId, ref: 'PoolMembership' },
    accountId: { type: mongoose.Schema.Types.ObjectId, ref: 'SocialAccount' },
    event: { type: String, enum: STATUS_EVENTS, required: true },
    oldStatus: { type: String, enum: HEALTH_STATUSES },
    newStatus: { type: String, enum: HEALTH_STATUSES },
    message: { type: String },
    triggeredBy: { type: String, enum: ['system', 'user'], default: 'system' },
    createdAt: { type: Date, default: Date.now },
  },
  {
    versionKey: false,
  },
)

statusLogSchema.index({ poolId: 1, createdAt: -1 })
statusLogSchema.index({ accountId: 1, event: 1 })
statusLogSchema.index({ createdAt: -1 })

export default mongoose.model<IStatusLog>('StatusLog', statusLogSchema)
