/**
 * TypedEventBus — typed internal pub/sub for decoupled module communication.
 *
 * Built on top of Node.js EventEmitter.
 *
 *  - Event dispatch is SYNCHRONOUS: handlers run immediately when emit() is called.
 *  - Async work triggered by an event must be scheduled by the handler itself.
 *  - The bus depends on no module.
 */

import { EventEmitter } from 'node:events'
import type { PatchwardenEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * All registered handlers run before emit() returns.
   */
  emit<K extends keyof PatchwardenEvents>(event: K, payload: PatchwardenEvents[K]): void

  on<K extends keyof PatchwardenEvents>(
    event: K,
    handler: (payload: PatchwardenEvents[K]) => void
  ): void

  /** Unsubscribe a handler; unknown handlers are ignored */
  off<K extends keyof PatchwardenEvents>(
    event: K,
    handler: (payload: PatchwardenEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('incident:status-changed', ({ incidentId, to }) => {
 *   console.log(`${incidentId} is now ${to}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof PatchwardenEvents>(event: K, payload: PatchwardenEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof PatchwardenEvents>(
    event: K,
    handler: (payload: PatchwardenEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof PatchwardenEvents>(
    event: K,
    handler: (payload: PatchwardenEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
