/**
 * Credential masking utilities for CLI output and Pino logger redaction.
 *
 * Provider tokens (Jira API tokens, GitHub tokens) must never appear in
 * logs, printed config, or error messages returned over HTTP.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Patterns that identify provider credentials embedded in free text.
 */
export const TOKEN_PATTERNS: RegExp[] = [
  // GitHub personal access / app tokens: ghp_, gho_, ghs_, ghu_, ghr_, github_pat_
  /\b(?:gh[pousr]_[A-Za-z0-9]{20,}|github_pat_[A-Za-z0-9_]{20,})\b/g,
  // HTTP Authorization header values
  /\b(?:Bearer|Basic)\s+[A-Za-z0-9+/=._-]{8,}/g,
  // Generic 40-char hex tokens
  /\b[A-Fa-f0-9]{40}\b/g,
]

/**
 * Pino redaction paths for credential-bearing fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'token',
  'apiToken',
  '*.token',
  '*.apiToken',
  'headers.authorization',
  '*.headers.authorization',
  'integrations.*.api_token',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any recognised credential in a string with `***`.
 * Best-effort: formats not listed in TOKEN_PATTERNS pass through.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of TOKEN_PATTERNS) {
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

const CREDENTIAL_FIELDS = new Set([
  'token',
  'api_token',
  'apiToken',
  'secret',
  'password',
])

/**
 * Deep-clone a plain-object tree, replacing known credential fields with `***`
 * and scrubbing tokens embedded in other string values.
 */
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (typeof value === 'string') return maskSecrets(value)
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      masked[k] = CREDENTIAL_FIELDS.has(k) ? MASKED_VALUE : deepMask(v)
    }
    return masked
  }
  return value
}
