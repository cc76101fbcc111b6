/**
 * createRuntime() — wires every module from a validated config.
 *
 *  1. Opens the incident store (SQLite file, or memory)
 *  2. Builds the provider set for the configured modes
 *  3. Creates the stage adapters, pipeline orchestrator and incident service
 *  4. Adds the services (database, incidents, reconciler, api) to a
 *     ServiceLifecycle so start() brings them up in order and shutdown()
 *     tears them down in reverse
 *
 * Modules never import each other's implementations; all wiring is here.
 */

import { createApiApp, ApiServer } from '../api/router.js'
import { mergePolicyFromConfig } from '../modules/config/policy.js'
import type { PatchwardenConfig } from '../modules/config/config-schema.js'
import { createIncidentService } from '../modules/incident-service/incident-service-impl.js'
import { createOwnerId } from '../modules/incidents/lease.js'
import type { LeaseSettings } from '../modules/incidents/lease.js'
import type { IdempotencyStore, IncidentStore } from '../modules/incident-store/incident-store.js'
import { MemoryIdempotencyStore, MemoryIncidentStore } from '../modules/incident-store/memory-incident-store.js'
import { SqliteIdempotencyStore, SqliteIncidentStore } from '../modules/incident-store/sqlite-incident-store.js'
import { createIntegrations, providerReadiness, traceOf } from '../modules/integrations/provider-router.js'
import { createPipelineOrchestrator } from '../modules/pipeline-orchestrator/orchestrator-impl.js'
import { StageAdapters } from '../modules/stage-adapters/stage-adapters.js'
import type { Clock } from '../modules/timeline/timeline-log.js'
import { createDatabaseService } from '../persistence/database.js'
import { IncidentReconciler } from '../recovery/incident-reconciler.js'
import { createLogger } from '../utils/logger.js'
import { createEventBus } from './event-bus.js'
import type { TypedEventBus } from './event-bus.js'
import { ServiceLifecycle } from './lifecycle.js'
import type { PatchwardenRuntime, RuntimeOptions } from './runtime.js'

const logger = createLogger('runtime')

// ---------------------------------------------------------------------------
// RuntimeImpl
// ---------------------------------------------------------------------------

type RuntimeParts = Omit<PatchwardenRuntime, 'start' | 'shutdown'>

class RuntimeImpl implements PatchwardenRuntime {
  readonly config: PatchwardenRuntime['config']
  readonly eventBus: PatchwardenRuntime['eventBus']
  readonly store: PatchwardenRuntime['store']
  readonly integrations: PatchwardenRuntime['integrations']
  readonly service: PatchwardenRuntime['service']
  readonly reconciler: PatchwardenRuntime['reconciler']
  readonly server: PatchwardenRuntime['server']
  private readonly _lifecycle: ServiceLifecycle
  private _shutdown: Promise<void> | null = null

  constructor(parts: RuntimeParts, lifecycle: ServiceLifecycle) {
    this.config = parts.config
    this.eventBus = parts.eventBus
    this.store = parts.store
    this.integrations = parts.integrations
    this.service = parts.service
    this.reconciler = parts.reconciler
    this.server = parts.server
    this._lifecycle = lifecycle
  }

  async start(): Promise<void> {
    await this._lifecycle.start()
    logger.info({ services: this._lifecycle.names }, 'Runtime started')
  }

  shutdown(): Promise<void> {
    if (this._shutdown === null) {
      logger.info('Runtime shutdown initiated')
      this._shutdown = this._lifecycle.stop().then(() => {
        logger.info('Runtime shutdown complete')
      })
    }
    return this._shutdown
  }
}

// ---------------------------------------------------------------------------
// createRuntime
// ---------------------------------------------------------------------------

interface StoreSet {
  store: IncidentStore
  ledger: IdempotencyStore
}

async function openStores(config: PatchwardenConfig, lifecycle: ServiceLifecycle): Promise<StoreSet> {
  if (config.storage.driver === 'memory') {
    return { store: new MemoryIncidentStore(), ledger: new MemoryIdempotencyStore() }
  }
  const database = createDatabaseService(config.storage.sqlite_path)
  await database.initialize()
  lifecycle.adopt('database', database)
  return { store: new SqliteIncidentStore(database.db), ledger: new SqliteIdempotencyStore(database.db) }
}

/**
 * Build the runtime. Nothing listens and no sweep runs until start().
 * @throws {ProviderConfigError} when an `api` provider lacks required fields
 */
export async function createRuntime(config: PatchwardenConfig, options: RuntimeOptions = {}): Promise<PatchwardenRuntime> {
  const env = options.env ?? process.env
  const clock: Clock = options.clock ?? (() => new Date())
  const eventBus: TypedEventBus = createEventBus()
  const lifecycle = new ServiceLifecycle()

  const integrations = createIntegrations(config.integrations, { env, fetchFn: options.fetchFn, clock })
  const { store, ledger } = await openStores(config, lifecycle)
  const lease: LeaseSettings = { ownerId: createOwnerId(), ttlMs: config.pipeline.lease_ttl_ms }

  const adapters = new StageAdapters(integrations, ledger, {
    retry: {
      maxAttempts: config.retry.max_attempts,
      baseDelayMs: config.retry.base_delay_ms,
      maxDelayMs: config.retry.max_delay_ms,
    },
    timeoutMs: config.pipeline.stage_timeout_ms,
    eventBus,
  })

  const orchestrator = createPipelineOrchestrator({
    store,
    adapters,
    settings: {
      ciPollIntervalMs: config.pipeline.ci_poll_interval_ms,
      ciTimeoutMs: config.pipeline.ci_timeout_ms,
      doneStatus: config.integrations.jira.done_status,
    },
    clock,
    eventBus,
    lease,
  })

  const service = createIncidentService({
    store,
    orchestrator,
    policy: mergePolicyFromConfig(config.merge_gate),
    trace: traceOf(integrations),
    staleAfterMs: config.approval.stale_after_ms,
    clock,
    eventBus,
    lease,
  })
  lifecycle.add('incidents', service)

  let reconciler: IncidentReconciler | null = null
  if (options.reconcile !== false) {
    reconciler = new IncidentReconciler({
      store,
      service,
      maxResumeAttempts: config.pipeline.max_resume_attempts,
      approvalTimeoutMs: config.approval.timeout_ms,
      intervalMs: config.pipeline.reconcile_interval_ms,
      clock,
      eventBus,
      lease,
    })
    lifecycle.add('reconciler', reconciler)
  }

  let server: ApiServer | null = null
  if (options.serve === true) {
    const app = createApiApp({
      service,
      health: {
        storageDriver: config.storage.driver,
        readiness: () => providerReadiness(config.integrations, env),
      },
    })
    server = new ApiServer({ app, host: config.server.host, port: config.server.port })
    lifecycle.add('api', server)
  }

  logger.debug(
    { storage: config.storage.driver, services: lifecycle.names, ownerId: lease.ownerId },
    'Runtime wired',
  )
  return new RuntimeImpl({ config, eventBus, store, integrations, service, reconciler, server }, lifecycle)
}
