/**
 * Barrel exports for the pipeline-orchestrator module.
 */

export { createPipelineOrchestrator, mergeTarget } from './orchestrator-impl.js'
export type { PipelineOrchestrator } from './orchestrator.js'
export type { PipelineOrchestratorDeps, PipelineSettings } from './types.js'
