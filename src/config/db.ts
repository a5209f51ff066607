import mongoose from 'mongoose'
import { ENV } from './env'
import logger from '../utils/logger'

const connectDB = async (): Promise<typeof mongoose> => {
  if (!ENV.MONGO_URI) {
    throw new Error('MONGO_URI is not defined in environment variables')
  }

  const connection = await mongoose.connect(ENV.MONGO_URI)
  logger.info(`[MongoDB] Connected: ${connection.connection.host}`)

  mongoose.connection.on('error', (err) => {
    logger.error('[MongoDB] Connection error:', err)
  })
  mongoose.connection.on('disconnected', () => {
    logger.warn('[MongoDB] Disconnected')
  })

  return connection
}

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect()
  logger.info('[MongoDB] Disconnected cleanly')
}

export default connectDB
