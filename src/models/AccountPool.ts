import mongoose from 'mongoose'
import { PLATFORMS, Platform, ROTATION_STRATEGIES, RotationStrategy } from '../types/rotation'

export interface IAccountPool extends mongoose.Document {
  brandId: string
  platform: Platform
  name: string
  description?: string
  rotationStrategy: RotationStrategy
  cooldownMinutes: number
  maxPostsPerDay: number
  autoFailover: boolean
  isActive: boolean
  createdAt: Date
  updatedAt: Date
}

const accountPoolSchema = new mongoose.Schema(
  {
    brandId: { type: String, required: true },
    platform: { type: String, enum: PLATFORMS, required: true },
    name: { type: String, required: true, trim: true, maxlength: 255 },
    description: { type: String, trim: true },
    rotationStrategy: { type: String, enum: ROTATION_STRATEGIES, default: 'round_robin' },
    cooldownMinutes: { type: Number, default: 30, min: 0, max: 1440 },
    maxPostsPerDay: { type: Number, default: 10, min: 1, max: 100 },
    autoFailover: { type: Boolean, default: true },
    isActive: { type: Boolean, default: true },
  },
  {
    timestamps: true,
  },
)

accountPoolSchema.index({ brandId: 1, platform: 1, name: 1 }, { unique: true })
accountPoolSchema.index({ platform: 1, isActive: 1 })

export default mongoose.model<IAccountPool>('AccountPool', accountPoolSchema)
