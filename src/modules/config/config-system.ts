/**
 * ConfigSystem interface — public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { PatchwardenConfig, PartialPatchwardenConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .patchwarden/ directory (default: <cwd>/.patchwarden) */
  projectConfigDir?: string
  /** Path to the global user-level .patchwarden/ directory (default: ~/.patchwarden) */
  globalConfigDir?: string
  /**
   * Values that override every other source.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialPatchwardenConfig
  /** Environment to read PW_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated Patchwarden configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): PatchwardenConfig

  /** Return a single value by dot-notation key (e.g. "merge_gate.merge_method") */
  get(key: string): unknown

  /** The merged config with credential values masked, safe to print */
  getMasked(): unknown

  readonly isLoaded: boolean
}
