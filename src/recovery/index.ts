/**
 * Barrel exports for the recovery module.
 */

export { IncidentReconciler, createIncidentReconciler } from './incident-reconciler.js'
export type {
  IncidentReconcilerOptions,
  ReconcileAction,
  ReconcileActionKind,
  ReconcileResult,
} from './incident-reconciler.js'
export { setupGracefulShutdown } from './shutdown-handler.js'
export type { ShutdownHandlerOptions } from './shutdown-handler.js'
