/**
 * Envelope helpers, error mapping and request logging for the HTTP API.
 */

import { randomUUID } from 'node:crypto'
import type { NextFunction, Request, Response } from 'express'
import { ZodError } from 'zod'
import {
  AlreadyTerminalError,
  ConcurrentModificationError,
  IncidentNotFoundError,
  InvalidStateError,
  LeaseLostError,
  PolicyViolationError,
} from '../core/errors.js'
import { maskSecrets } from '../cli/utils/masking.js'
import { createLogger } from '../utils/logger.js'
import type { ApiEnvelope } from './types.js'

const logger = createLogger('api')

export const CORRELATION_HEADER = 'x-correlation-id'

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

function correlationIdOf(res: Response): string | undefined {
  const value: unknown = res.locals.correlationId
  return typeof value === 'string' ? value : undefined
}

/** Send a successful JSON response using the standard envelope */
export function sendOk<T>(res: Response, data: T, status = 200): void {
  const body: ApiEnvelope<T> = {
    ok: true,
    data,
    correlationId: correlationIdOf(res),
    timestamp: new Date().toISOString(),
  }
  res.status(status).json(body)
}

/** Send an error JSON response using the standard envelope */
export function sendError(res: Response, message: string, status = 400, code?: string): void {
  const body: ApiEnvelope = {
    ok: false,
    error: maskSecrets(message),
    code,
    correlationId: correlationIdOf(res),
    timestamp: new Date().toISOString(),
  }
  res.status(status).json(body)
}

// ---------------------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------------------

export interface MappedError {
  status: number
  code: string
  message: string
}

/** Human-readable summary of the first validation issue */
export function describeZodError(err: ZodError): string {
  const [issue] = err.issues
  if (issue === undefined) return 'Invalid request'
  const path = issue.path.join('.')
  return path === '' ? issue.message : `${path}: ${issue.message}`
}

export function mapError(err: unknown): MappedError {
  if (err instanceof IncidentNotFoundError) {
    return { status: 404, code: err.code, message: err.message }
  }
  if (err instanceof InvalidStateError) {
    return { status: 409, code: err.reason, message: err.message }
  }
  if (err instanceof PolicyViolationError || err instanceof AlreadyTerminalError) {
    return { status: 409, code: err.code, message: err.message }
  }
  // Another writer got to the incident first; the caller may re-read and retry
  if (err instanceof ConcurrentModificationError || err instanceof LeaseLostError) {
    return { status: 409, code: err.code, message: err.message }
  }
  if (err instanceof ZodError) {
    return { status: 400, code: 'VALIDATION_ERROR', message: describeZodError(err) }
  }
  return { status: 500, code: 'INTERNAL_ERROR', message: 'Internal server error' }
}

/** Map `err` and send it; unexpected errors are logged with their stack */
export function sendMappedError(res: Response, err: unknown): void {
  const mapped = mapError(err)
  if (mapped.status >= 500) {
    logger.error({ err, correlationId: correlationIdOf(res) }, 'Unhandled error in request')
  }
  sendError(res, mapped.message, mapped.status, mapped.code)
}

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

/** Assign a correlation id and log every request once it finishes */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.header(CORRELATION_HEADER)
  const correlationId = incoming !== undefined && incoming !== '' ? incoming : randomUUID()
  const startedAt = Date.now()
  res.locals.correlationId = correlationId
  res.setHeader(CORRELATION_HEADER, correlationId)
  res.on('finish', () => {
    logger.info(
      { correlationId, method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - startedAt },
      'HTTP request',
    )
  })
  next()
}

/** Malformed JSON bodies become 400 envelopes; anything else a 500 */
export function handleUncaught(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError) {
    sendError(res, 'Malformed JSON body', 400, 'VALIDATION_ERROR')
    return
  }
  sendMappedError(res, err)
}

export function handleNotFound(req: Request, res: Response): void {
  sendError(res, `No route for ${req.method} ${req.path}`, 404, 'NOT_FOUND')
}
