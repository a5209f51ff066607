import {
  Content,
  isPlatform,
  isRotationStrategy,
  Platform,
  PLATFORMS,
  ROTATION_STRATEGIES,
  RotationStrategy,
} from '../types/rotation'
import { BadRequestError } from './errors'

export type Fields = Record<string, unknown>

const isFields = (value: unknown): value is Fields =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export const asFields = (value: unknown): Fields => {
  if (value === undefined || value === null) return {}
  if (!isFields(value)) {
    throw new BadRequestError('Request body must be a JSON object')
  }
  return value
}

export const requireString = (fields: Fields, key: string): string => {
  const value = fields[key]
  if (typeof value !== 'string' || value.trim() === '') {
    throw new BadRequestError(`${key} is required`)
  }
  return value.trim()
}

export const optionalString = (fields: Fields, key: string): string | undefined => {
  const value = fields[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new BadRequestError(`${key} must be a string`)
  }
  return value
}

export const optionalNumber = (fields: Fields, key: string): number | undefined => {
  const value = fields[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new BadRequestError(`${key} must be a number`)
  }
  return value
}

export const optionalBoolean = (fields: Fields, key: string): boolean | undefined => {
  const value = fields[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'boolean') {
    throw new BadRequestError(`${key} must be a boolean`)
  }
  return value
}

export const requirePlatform = (value: unknown): Platform => {
  if (!isPlatform(value)) {
    throw new BadRequestError(`platform must be one of: ${PLATFORMS.join(', ')}`)
  }
  return value
}

export const optionalStrategy = (fields: Fields, key: string): RotationStrategy | undefined => {
  const value = fields[key]
  if (value === undefined || value === null) return undefined
  if (!isRotationStrategy(value)) {
    throw new BadRequestError(`${key} must be one of: ${ROTATION_STRATEGIES.join(', ')}`)
  }
  return value
}

const stringList = (value: unknown, key: string): string[] | undefined => {
  if (value === undefined || value === null) return undefined
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new BadRequestError(`content.${key} must be an array of strings`)
  }
  return value
}

/**
 * Publish payload. Passed through untouched apart from shape checks.
 */
export const readContent = (value: unknown): Content => {
  if (!isFields(value)) {
    throw new BadRequestError('content must be an object')
  }
  const content: Content = {
    text: optionalString(value, 'text'),
    mediaUrls: stringList(value.mediaUrls, 'mediaUrls'),
    link: optionalString(value, 'link'),
    hashtags: stringList(value.hashtags, 'hashtags'),
    metadata: isFields(value.metadata) ? value.metadata : undefined,
  }
  if (!content.text && !content.mediaUrls?.length && !content.link) {
    throw new BadRequestError('content needs text, mediaUrls or a link')
  }
  return content
}

/** Single string value from a parsed query string */
export const queryValue = (value: unknown): string | undefined => (typeof value === 'string' && value ? value : undefined)

export const queryBoolean = (value: unknown): boolean | undefined => {
  const text = queryValue(value)
  if (text === undefined) return undefined
  return text === 'true' || text === '1'
}
