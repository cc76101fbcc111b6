/**
 * NDJSON event stream for `patchwarden serve --output-format json`.
 *
 * Each line follows: {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { PatchwardenEvents } from '../../core/event-bus.types.js'

// ---------------------------------------------------------------------------
// emitEvent
// ---------------------------------------------------------------------------

/**
 * Write a single NDJSON event to stdout.
 *
 * @param event - Event name (e.g. "incident:created")
 */
export function emitEvent(event: string, data: Record<string, unknown>, now: () => Date = () => new Date()): void {
  const line = JSON.stringify({
    event,
    timestamp: now().toISOString(),
    data,
  })
  process.stdout.write(line + '\n')
}

// ---------------------------------------------------------------------------
// streamIncidentEvents
// ---------------------------------------------------------------------------

const STREAMED_EVENTS = [
  'incident:created',
  'incident:status-changed',
  'incident:reconciled',
  'stage:failed',
] as const satisfies readonly (keyof PatchwardenEvents)[]

/**
 * Mirror incident lifecycle events from the bus to stdout.
 * Returns a function that stops the stream.
 */
export function streamIncidentEvents(eventBus: TypedEventBus): () => void {
  const unsubscribers = STREAMED_EVENTS.map((event) => {
    const handler = (payload: PatchwardenEvents[typeof event]): void => {
      emitEvent(event, { ...payload })
    }
    eventBus.on(event, handler)
    return () => {
      eventBus.off(event, handler)
    }
  })
  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe()
  }
}
