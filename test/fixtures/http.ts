/**
 * Scripted fetch stand-in for the provider clients.
 */

import { vi } from 'vitest'
import type { FetchFn } from '../../src/modules/integrations/http.js'

export interface ScriptedResponse {
  status: number
  body?: unknown
}

export interface RecordedRequest {
  method: string
  url: URL
  headers: Headers
  body: unknown
}

/** Answers each call with the next scripted response; extra calls get a 500 */
export function scriptedFetch(responses: ScriptedResponse[]) {
  const queue = [...responses]
  const requests: RecordedRequest[] = []
  const fetchFn = vi.fn<FetchFn>(async (input, init) => {
    const rawBody = init?.body
    requests.push({
      method: init?.method ?? 'GET',
      url: new URL(input instanceof Request ? input.url : String(input)),
      headers: new Headers(init?.headers),
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined,
    })
    const next = queue.shift() ?? { status: 500, body: { message: 'unscripted request' } }
    const payload = next.body === undefined ? null : JSON.stringify(next.body)
    return new Response(payload, { status: next.status })
  })
  return { fetchFn, requests }
}
