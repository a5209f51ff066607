import winston from 'winston'
// Side-effect import: registers winston.transports.DailyRotateFile
import 'winston-daily-rotate-file'
import { ENV } from '../config/env'

const { combine, timestamp, printf, json, colorize } = winston.format

// Human-readable console format
const consoleFormat = printf(({ timestamp, level, message }) => {
  return `${timestamp} [${level.toUpperCase()}]: ${message}`
})

const isTest = ENV.NODE_ENV === 'test'

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: combine(colorize(), timestamp(), consoleFormat),
  }),
]

if (!isTest) {
  transports.push(
    new winston.transports.DailyRotateFile({
      dirname: 'logs',
      filename: 'app-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '20m',
      maxFiles: '14d',
      format: combine(timestamp(), json()),
    }),
  )
}

const winstonLogger = winston.createLogger({
  level: ENV.LOG_LEVEL,
  silent: isTest,
  format: combine(timestamp(), json()),
  transports,
})

const logger = {
  info: (message: string, ...meta: unknown[]) => winstonLogger.info(message, ...meta),
  warn: (message: string, ...meta: unknown[]) => winstonLogger.warn(message, ...meta),
  error: (message: string, ...meta: unknown[]) => winstonLogger.error(message, ...meta),
  debug: (message: string, ...meta: unknown[]) => winstonLogger.debug(message, ...meta),

  timerLog: (label: string, startTime: number) => {
    const duration = Date.now() - startTime
    winstonLogger.info(`[TIMER] ${label} - ${duration}ms`)
  },

  cron: (message: string, ...meta: unknown[]) => winstonLogger.info(`[CRON] ${message}`, ...meta),
  cronError: (message: string, ...meta: unknown[]) => winstonLogger.error(`[CRON] ${message}`, ...meta),
}

export default logger
