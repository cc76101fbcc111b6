/**
 * Shared plumbing for the incident commands: exit codes, config loading and
 * mapping errors onto exit codes.
 */

import { join } from 'node:path'
import { ZodError } from 'zod'
import {
  AlreadyTerminalError,
  ConcurrentModificationError,
  IncidentNotFoundError,
  LeaseLostError,
  PolicyViolationError,
} from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PartialPatchwardenConfig, PatchwardenConfig } from '../../modules/config/config-schema.js'
import { setLogLevel } from '../../utils/logger.js'
import { maskSecrets } from './masking.js'

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
/** Not found, invalid state, bad arguments */
export const EXIT_USAGE_ERROR = 2

export type OutputFormat = 'human' | 'json'

// ---------------------------------------------------------------------------
// Command context
// ---------------------------------------------------------------------------

/** Where a command finds its configuration */
export interface CommandContext {
  /** Directory holding `.patchwarden/config.yaml` (default: cwd) */
  projectRoot: string
  /** Overrides the user-level `~/.patchwarden` directory */
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
}

/**
 * Load the merged config for a command and apply its log level.
 * @throws {ConfigError} on invalid YAML or schema violations
 */
export async function loadCliConfig(
  context: CommandContext,
  cliOverrides?: PartialPatchwardenConfig,
): Promise<PatchwardenConfig> {
  const system = createConfigSystem({
    projectConfigDir: join(context.projectRoot, '.patchwarden'),
    globalConfigDir: context.globalConfigDir,
    cliOverrides,
    env: context.env,
  })
  await system.load()
  const config = system.getConfig()
  setLogLevel(config.global.log_level)
  return config
}

export function parseOutputFormat(value: string): OutputFormat | null {
  return value === 'human' || value === 'json' ? value : null
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export function exitCodeFor(err: unknown): number {
  if (
    err instanceof IncidentNotFoundError ||
    err instanceof PolicyViolationError ||
    err instanceof AlreadyTerminalError ||
    err instanceof ConcurrentModificationError ||
    err instanceof LeaseLostError ||
    err instanceof ZodError
  ) {
    return EXIT_USAGE_ERROR
  }
  return EXIT_ERROR
}

/** Print `err` to stderr and return its exit code */
export function reportError(err: unknown): number {
  const message = err instanceof Error ? err.message : String(err)
  process.stderr.write(`Error: ${maskSecrets(message)}\n`)
  return exitCodeFor(err)
}
