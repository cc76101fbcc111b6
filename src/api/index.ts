/**
 * Public API for the HTTP boundary.
 */

export { ApiServer, createApiApp } from './router.js'
export type { ApiDeps, ApiServerOptions } from './router.js'
export { mapError, sendError, sendOk } from './shared.js'
export type { ApiEnvelope, AlertAccepted } from './types.js'
export type { HealthData, HealthDeps } from './handlers/health.js'
