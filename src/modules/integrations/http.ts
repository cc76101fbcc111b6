/**
 * Minimal JSON-over-HTTP helper on the global fetch, shared by the provider
 * clients. Maps transport failures and HTTP statuses onto the integration
 * error taxonomy.
 */

import type { z } from 'zod'
import { PermanentIntegrationError, TransientIntegrationError } from '../../core/errors.js'
import { maskSecrets } from '../../cli/utils/masking.js'

export type FetchFn = typeof fetch

export interface HttpRequest {
  method: 'GET' | 'POST' | 'PUT'
  url: string
  headers?: Record<string, string>
  query?: Record<string, string>
  body?: unknown
  signal?: AbortSignal
}

export interface HttpResponse {
  status: number
  body: unknown
}

/** 408, 429 and 5xx are worth retrying; any other non-2xx is not */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300
}

function parseBody(text: string): unknown {
  if (text.length === 0) return null
  try {
    const parsed: unknown = JSON.parse(text)
    return parsed
  } catch {
    return text
  }
}

/**
 * Issue one request. Resolves with any HTTP status; rejects only on
 * transport failure (always transient).
 */
export async function sendJson(provider: string, request: HttpRequest, fetchFn: FetchFn = fetch): Promise<HttpResponse> {
  const url = new URL(request.url)
  for (const [key, value] of Object.entries(request.query ?? {})) {
    url.searchParams.set(key, value)
  }

  const headers: Record<string, string> = { Accept: 'application/json', ...(request.headers ?? {}) }
  let body: string | undefined
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json'
    body = JSON.stringify(request.body)
  }

  let response: Response
  try {
    response = await fetchFn(url, { method: request.method, headers, body, signal: request.signal })
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new TransientIntegrationError(`${provider} request failed: ${maskSecrets(message)}`, {
      provider,
      method: request.method,
      url: url.pathname,
    })
  }

  return { status: response.status, body: parseBody(await response.text()) }
}

/**
 * Throw the matching integration error for a non-2xx response.
 */
export function raiseForStatus(provider: string, action: string, response: HttpResponse): void {
  if (isSuccessStatus(response.status)) return
  const detail = typeof response.body === 'string' ? response.body : JSON.stringify(response.body)
  const message = `${provider} ${action} failed with HTTP ${String(response.status)}: ${maskSecrets(detail).slice(0, 300)}`
  const context = { provider, httpStatus: response.status, action }
  if (isTransientStatus(response.status)) {
    throw new TransientIntegrationError(message, context)
  }
  throw new PermanentIntegrationError(message, context)
}

/** Validate a 2xx response body; a mismatch is a permanent failure */
export function parseResponse<T>(provider: string, schema: z.ZodType<T>, body: unknown, action: string): T {
  const result = schema.safeParse(body)
  if (!result.success) {
    throw new PermanentIntegrationError(`Unexpected ${provider} response to ${action}`, {
      provider,
      action,
      issues: result.error.issues.map((issue) => issue.message),
    })
  }
  return result.data
}
