/**
 * PipelineOrchestrator interface.
 *
 * Drives one incident through triage → analysis → {ticketing ∥ remediation}
 * → CI → merge gate, and later through the merge stage once approved.
 */

import type { IncidentRecord } from '../incidents/types.js'

export interface PipelineOrchestrator {
  /**
   * Run (or resume) the pipeline for a PROCESSING incident. Stages whose
   * output is already on the record are skipped. Resolves with the record
   * as the run left it: RESOLVED, FAILED or AWAITING_APPROVAL. A MERGING
   * incident resumes its merge; other statuses are returned untouched.
   *
   * @throws {IncidentNotFoundError} when no incident has this id
   */
  run(incidentId: string): Promise<IncidentRecord>

  /**
   * Execute the merge stage for an incident the approval command moved to
   * MERGING. Success resolves the incident; failure fails it.
   */
  executeMerge(incidentId: string): Promise<IncidentRecord>
}
