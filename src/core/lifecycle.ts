/**
 * Start and stop order for the long-lived parts of a runtime: the incident
 * database, the incident service, the reconciler and the HTTP server.
 *
 * Services start in the order they were added and stop in reverse. A start
 * that fails part-way stops whatever already came up before rethrowing, so a
 * half-started runtime never keeps the database open or the port bound.
 */

import { createLogger } from '../utils/logger.js'

const logger = createLogger('core:lifecycle')

export interface BaseService {
  /** Open connections, start timers */
  initialize(): Promise<void>
  /** Release what initialize() acquired; called at most once per start */
  shutdown(): Promise<void>
}

export type LifecycleState = 'idle' | 'running' | 'stopped'

interface Entry {
  name: string
  service: BaseService
}

// ---------------------------------------------------------------------------
// ServiceLifecycle
// ---------------------------------------------------------------------------

export class ServiceLifecycle {
  private readonly _entries: Entry[] = []
  private _running: Entry[] = []
  private _state: LifecycleState = 'idle'

  /** @throws {Error} on a duplicate name, or once start() has run */
  add(name: string, service: BaseService): void {
    this._accept(name)
    this._entries.push({ name, service })
  }

  /**
   * Take a service that was initialized while wiring (the database is opened
   * before the stores are built). start() skips it; stop() still shuts it down.
   */
  adopt(name: string, service: BaseService): void {
    this._accept(name)
    const entry = { name, service }
    this._entries.push(entry)
    this._running.push(entry)
  }

  async start(): Promise<void> {
    if (this._state !== 'idle') {
      throw new Error(`Cannot start services that are ${this._state}`)
    }
    for (const entry of this._entries) {
      if (this._running.includes(entry)) continue
      try {
        await entry.service.initialize()
      } catch (err) {
        logger.error({ service: entry.name, err }, 'Service failed to start; stopping the ones already running')
        await this._stopRunning().catch((stopErr: unknown) => {
          logger.error({ err: stopErr }, 'Services did not stop cleanly after a failed start')
        })
        this._state = 'stopped'
        throw err
      }
      this._running.push(entry)
      logger.debug({ service: entry.name }, 'Service started')
    }
    this._state = 'running'
  }

  /**
   * Stop every running service, newest first. Every service gets its turn;
   * failures are rethrown together as one AggregateError. Later calls do nothing.
   */
  async stop(): Promise<void> {
    this._state = 'stopped'
    await this._stopRunning()
  }

  get state(): LifecycleState {
    return this._state
  }

  get names(): string[] {
    return this._entries.map((entry) => entry.name)
  }

  private _accept(name: string): void {
    if (this._state !== 'idle') {
      throw new Error(`Cannot add "${name}": services are already ${this._state}`)
    }
    if (this._entries.some((entry) => entry.name === name)) {
      throw new Error(`Service "${name}" is already added`)
    }
  }

  private async _stopRunning(): Promise<void> {
    const running = this._running.reverse()
    this._running = []
    const failures: Error[] = []
    for (const entry of running) {
      try {
        await entry.service.shutdown()
        logger.debug({ service: entry.name }, 'Service stopped')
      } catch (err) {
        failures.push(err instanceof Error ? err : new Error(String(err)))
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, `${String(failures.length)} service(s) failed to stop`)
    }
  }
}
