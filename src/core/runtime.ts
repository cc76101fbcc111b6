/**
 * PatchwardenRuntime — the wired application: store, providers, pipeline,
 * incident service, reconciler and (optionally) the HTTP API.
 *
 * Create an instance via `createRuntime()` from runtime-impl.ts.
 */

import type { PatchwardenConfig } from '../modules/config/config-schema.js'
import type { IncidentService } from '../modules/incident-service/incident-service.js'
import type { IncidentStore } from '../modules/incident-store/incident-store.js'
import type { Integrations } from '../modules/integrations/types.js'
import type { FetchFn } from '../modules/integrations/http.js'
import type { Clock } from '../modules/timeline/timeline-log.js'
import type { ApiServer } from '../api/router.js'
import type { IncidentReconciler } from '../recovery/incident-reconciler.js'
import type { TypedEventBus } from './event-bus.js'

// ---------------------------------------------------------------------------
// RuntimeOptions
// ---------------------------------------------------------------------------

export interface RuntimeOptions {
  /** Environment the provider tokens are read from (default: process.env) */
  env?: NodeJS.ProcessEnv
  fetchFn?: FetchFn
  clock?: Clock
  /**
   * Run the reconciliation sweep on start and on its interval.
   * Commands that act on a single incident turn this off.
   * @default true
   */
  reconcile?: boolean
  /** Listen for HTTP requests on config.server.host:port */
  serve?: boolean
}

// ---------------------------------------------------------------------------
// PatchwardenRuntime
// ---------------------------------------------------------------------------

export interface PatchwardenRuntime {
  readonly config: PatchwardenConfig
  readonly eventBus: TypedEventBus
  readonly store: IncidentStore
  readonly integrations: Integrations
  readonly service: IncidentService
  readonly reconciler: IncidentReconciler | null
  readonly server: ApiServer | null

  /** Initialize every registered service in order */
  start(): Promise<void>

  /** Stop the server and the sweep, drain in-flight work, close the store. Idempotent. */
  shutdown(): Promise<void>
}
