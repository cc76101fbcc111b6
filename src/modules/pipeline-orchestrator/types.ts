/**
 * Types for the Pipeline Orchestrator module.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { LeaseSettings } from '../incidents/lease.js'
import type { IncidentStore } from '../incident-store/incident-store.js'
import type { StageAdapters } from '../stage-adapters/stage-adapters.js'
import type { Clock } from '../timeline/timeline-log.js'

export interface PipelineSettings {
  ciPollIntervalMs: number
  /** Upper bound on the wait for CI to settle */
  ciTimeoutMs: number
  /** Ticket status set once the fix is merged */
  doneStatus: string
}

/**
 * Dependency injection container for the pipeline orchestrator.
 */
export interface PipelineOrchestratorDeps {
  store: IncidentStore
  adapters: StageAdapters
  settings: PipelineSettings
  /** Timestamps for timeline events */
  clock: Clock
  eventBus?: TypedEventBus
  /**
   * Owner lease checked and renewed on every write. A write against a lease
   * another process holds throws LeaseLostError instead of committing.
   */
  lease?: LeaseSettings
}
