/**
 * Patchwarden - Main module exports
 * Public API surface for embedding the incident pipeline
 */

// Core types and errors
export * from './core/types.js'
export * from './core/errors.js'

// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export type { LoggerOptions } from './utils/logger.js'
export { sleep, isPlainObject, toError } from './utils/helpers.js'

// Runtime
export { createRuntime } from './core/runtime-impl.js'
export type { PatchwardenRuntime, RuntimeOptions } from './core/runtime.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { PatchwardenEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Lifecycle
export type { BaseService, LifecycleState } from './core/lifecycle.js'
export { ServiceLifecycle } from './core/lifecycle.js'

// Modules
export * from './modules/config/index.js'
export * from './modules/timeline/index.js'
export * from './modules/incidents/index.js'
export * from './modules/incident-store/index.js'
export * from './modules/merge-gate/index.js'
export * from './modules/integrations/index.js'
export * from './modules/stage-adapters/index.js'
export * from './modules/pipeline-orchestrator/index.js'
export * from './modules/incident-service/index.js'

// Persistence
export { createDatabaseService, DatabaseWrapper } from './persistence/database.js'
export type { DatabaseOptions, DatabaseService } from './persistence/database.js'

// HTTP API and recovery
export * from './api/index.js'
export * from './recovery/index.js'
