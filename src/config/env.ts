import dotenv from 'dotenv'

// Load environment variables before anything else reads them
dotenv.config()

const toNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback
}

export type StoreDriver = 'mongo' | 'memory'

const toStoreDriver = (value: string | undefined): StoreDriver =>
  value === 'memory' ? 'memory' : 'mongo'

export const ENV = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: toNumber(process.env.PORT, 3001),
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  MONGO_URI: process.env.MONGO_URI || '',
  STORE_DRIVER: toStoreDriver(process.env.STORE_DRIVER),
  REDIS_URL: process.env.REDIS_URL || '',

  PUBLISHER_BASE_URL: process.env.PUBLISHER_BASE_URL || '',
  PUBLISHER_API_KEY: process.env.PUBLISHER_API_KEY || '',

  // Rotation policy
  PUBLISH_TIMEOUT_MS: toNumber(process.env.PUBLISH_TIMEOUT_MS, 60_000),
  DISPATCH_MAX_ATTEMPTS: toNumber(process.env.DISPATCH_MAX_ATTEMPTS, 3),
  COOLDOWN_MAX_MINUTES: toNumber(process.env.COOLDOWN_MAX_MINUTES, 24 * 60),
  AUTH_SUSPEND_THRESHOLD: toNumber(process.env.AUTH_SUSPEND_THRESHOLD, 3),
  TRANSIENT_COOLDOWN_THRESHOLD: toNumber(process.env.TRANSIENT_COOLDOWN_THRESHOLD, 5),
  RESERVATION_STALE_FACTOR: toNumber(process.env.RESERVATION_STALE_FACTOR, 2),
  RESERVATION_WAIT_MS: toNumber(process.env.RESERVATION_WAIT_MS, 10_000),
  RESERVATION_POLL_MS: toNumber(process.env.RESERVATION_POLL_MS, 250),

  // Scheduling
  DAILY_RESET_CRON: process.env.DAILY_RESET_CRON || '0 0 * * *',
  CRON_TIMEZONE: process.env.CRON_TIMEZONE || 'UTC',
}
