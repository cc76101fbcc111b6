/**
 * TimelineLog — append-only, ordered event list for one incident.
 *
 * Ordering is the source of truth for MTTR, so timestamps never go backwards.
 * Out-of-order policy: CLAMP. An event whose timestamp is earlier than the
 * last appended event is stored with the last event's timestamp and flagged
 * with `details.clampedFrom` holding the original value. Events are never
 * reordered and append never throws.
 */

import type { TimelineEvent, TimelineEventInput } from './types.js'

export type Clock = () => Date

/**
 * Build the event that follows `previous`, clamping its timestamp so the
 * sequence never goes backwards.
 */
export function stampEvent(
  previous: TimelineEvent | undefined,
  input: TimelineEventInput,
  clock: Clock,
): TimelineEvent {
  const requested = input.timestamp ?? clock().toISOString()
  let timestamp = requested
  const details: Record<string, unknown> = { ...(input.details ?? {}) }

  if (previous !== undefined && Date.parse(requested) < Date.parse(previous.timestamp)) {
    timestamp = previous.timestamp
    details.clampedFrom = requested
  }

  const event: TimelineEvent = {
    eventType: input.eventType,
    timestamp,
    agent: input.agent,
    details,
    durationMs: input.durationMs ?? null,
  }
  if (input.transition !== undefined) {
    event.transition = { ...input.transition }
  }
  return event
}

export class TimelineLog {
  private readonly _events: TimelineEvent[]
  private readonly _clock: Clock

  /**
   * @param initial - previously persisted events, in append order
   * @param clock - source of timestamps for events appended without one
   */
  constructor(initial: readonly TimelineEvent[] = [], clock: Clock = () => new Date()) {
    this._events = initial.map((event) => ({ ...event, details: { ...event.details } }))
    this._clock = clock
  }

  append(input: TimelineEventInput): TimelineEvent {
    const event = stampEvent(this.last(), input, this._clock)
    this._events.push(event)
    return event
  }

  /** Read-only view in append order */
  events(): readonly TimelineEvent[] {
    return Object.freeze([...this._events])
  }

  first(): TimelineEvent | undefined {
    return this._events[0]
  }

  last(): TimelineEvent | undefined {
    return this._events[this._events.length - 1]
  }

  get length(): number {
    return this._events.length
  }

  /**
   * Elapsed time between the first and last event, in milliseconds.
   * Never negative: append() keeps timestamps non-decreasing.
   */
  spanMs(): number {
    const first = this.first()
    const last = this.last()
    if (first === undefined || last === undefined) return 0
    return Date.parse(last.timestamp) - Date.parse(first.timestamp)
  }

  /** Plain array copy for persistence */
  toArray(): TimelineEvent[] {
    return this._events.map((event) => ({ ...event, details: { ...event.details } }))
  }
}
