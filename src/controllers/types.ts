import type { NextFunction, Request } from 'express'

/**
 * The parts of an express request the handlers read
 */
export interface ApiRequest {
  params: Record<string, string>
  query: Request['query']
  body: unknown
  requestId?: string
}

export interface JsonReply {
  status(code: number): JsonReply
  json(body: unknown): unknown
}

export type ApiHandler = (req: ApiRequest, res: JsonReply, next: NextFunction) => Promise<void>
