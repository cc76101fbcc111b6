/**
 * Error definitions for Patchwarden
 * Provides the structured error hierarchy shared by every module
 */

import type { IncidentStatus } from './types.js'

/** Base error class for all Patchwarden errors */
export class PatchwardenError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'PatchwardenError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PatchwardenError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

// ---------------------------------------------------------------------------
// Integration errors
// ---------------------------------------------------------------------------

export interface IntegrationErrorContext {
  /** Provider that raised the error (e.g. "jira", "github", "analysis") */
  provider: string
  /** HTTP status returned by the provider, when there was one */
  httpStatus?: number
  [key: string]: unknown
}

/**
 * Retry-eligible failure: timeouts, 5xx responses, rate limits, network errors.
 * Stage adapters retry these; the orchestrator only sees them once retries exhaust.
 */
export class TransientIntegrationError extends PatchwardenError {
  readonly provider: string
  readonly httpStatus?: number

  constructor(message: string, context: IntegrationErrorContext) {
    super(message, 'TRANSIENT_INTEGRATION_ERROR', context)
    this.name = 'TransientIntegrationError'
    this.provider = context.provider
    this.httpStatus = context.httpStatus
  }
}

/** Non-retryable failure: validation errors, 4xx business errors, provider rejection */
export class PermanentIntegrationError extends PatchwardenError {
  readonly provider: string
  readonly httpStatus?: number

  constructor(message: string, context: IntegrationErrorContext) {
    super(message, 'PERMANENT_INTEGRATION_ERROR', context)
    this.name = 'PermanentIntegrationError'
    this.provider = context.provider
    this.httpStatus = context.httpStatus
  }
}

export type IntegrationError = TransientIntegrationError | PermanentIntegrationError

// ---------------------------------------------------------------------------
// Policy errors
// ---------------------------------------------------------------------------

/** A command arrived out of order; the incident is left untouched */
export class PolicyViolationError extends PatchwardenError {
  constructor(message: string, code = 'POLICY_VIOLATION', context: Record<string, unknown> = {}) {
    super(message, code, context)
    this.name = 'PolicyViolationError'
  }
}

/** Machine-readable reasons an approval command can be rejected */
export type InvalidStateReason =
  | 'pr_not_created'
  | 'already_merged'
  | 'ci_not_passed'
  | 'approval_not_required'
  | 'already_approved'
  | 'already_rejected'
  | 'not_awaiting_approval'

export class InvalidStateError extends PolicyViolationError {
  readonly reason: InvalidStateReason
  readonly incidentId: string

  constructor(incidentId: string, reason: InvalidStateReason, message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_STATE', { incidentId, reason, ...context })
    this.name = 'InvalidStateError'
    this.reason = reason
    this.incidentId = incidentId
  }
}

// ---------------------------------------------------------------------------
// Lifecycle errors
// ---------------------------------------------------------------------------

/** Raised when something tries to mutate a RESOLVED or FAILED incident */
export class AlreadyTerminalError extends PatchwardenError {
  readonly status: IncidentStatus

  constructor(incidentId: string, status: IncidentStatus) {
    super(`Incident ${incidentId} is already terminal (${status})`, 'ALREADY_TERMINAL', {
      incidentId,
      status,
    })
    this.name = 'AlreadyTerminalError'
    this.status = status
  }
}

export class InvalidTransitionError extends PatchwardenError {
  constructor(incidentId: string, from: IncidentStatus, to: IncidentStatus) {
    super(`Invalid status transition for ${incidentId}: ${from} -> ${to}`, 'INVALID_TRANSITION', {
      incidentId,
      from,
      to,
    })
    this.name = 'InvalidTransitionError'
  }
}

export class IncidentNotFoundError extends PatchwardenError {
  constructor(incidentId: string) {
    super(`Incident not found: ${incidentId}`, 'INCIDENT_NOT_FOUND', { incidentId })
    this.name = 'IncidentNotFoundError'
  }
}

export class IncidentAlreadyExistsError extends PatchwardenError {
  constructor(incidentId: string) {
    super(`Incident already exists: ${incidentId}`, 'INCIDENT_ALREADY_EXISTS', { incidentId })
    this.name = 'IncidentAlreadyExistsError'
  }
}

/** Lost a compare-and-swap race against another writer of the same incident */
export class ConcurrentModificationError extends PatchwardenError {
  constructor(incidentId: string, expectedVersion: number) {
    super(
      `Incident ${incidentId} was modified concurrently (expected version ${String(expectedVersion)})`,
      'CONCURRENT_MODIFICATION',
      { incidentId, expectedVersion }
    )
    this.name = 'ConcurrentModificationError'
  }
}

/** Another process holds an unexpired lease on the incident */
export class LeaseLostError extends PatchwardenError {
  constructor(incidentId: string, heldBy: string) {
    super(`Incident ${incidentId} is leased by ${heldBy}`, 'LEASE_LOST', { incidentId, heldBy })
    this.name = 'LeaseLostError'
  }
}

// ---------------------------------------------------------------------------
// Configuration errors
// ---------------------------------------------------------------------------

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends PatchwardenError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a config file uses an incompatible format version */
export class ConfigIncompatibleFormatError extends PatchwardenError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_INCOMPATIBLE_FORMAT', context)
    this.name = 'ConfigIncompatibleFormatError'
  }
}

/** Error thrown when a provider is selected in `api` mode without the fields it needs */
export class ProviderConfigError extends PatchwardenError {
  readonly provider: string
  readonly mode: string
  readonly missingFields: string[]

  constructor(provider: string, mode: string, reason: string, missingFields: string[] = []) {
    const fields = missingFields.length > 0 ? missingFields.join(', ') : 'none'
    super(`${provider}_${reason}: mode=${mode}; missing_or_invalid_fields=${fields}`, 'PROVIDER_CONFIG_ERROR', {
      provider,
      mode,
      reason,
      missingFields,
    })
    this.name = 'ProviderConfigError'
    this.provider = provider
    this.mode = mode
    this.missingFields = missingFields
  }
}
