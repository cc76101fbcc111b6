/**
 * ConfigSystem implementation — loads configuration in hierarchy order and
 * exposes get/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.patchwarden/config.yaml)
 *     → project config      (./.patchwarden/config.yaml)
 *     → environment vars    (PW_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { homedir } from 'node:os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import {
  PatchwardenConfigSchema,
  PartialPatchwardenConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type PatchwardenConfig,
  type PartialPatchwardenConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../cli/utils/masking.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/** Merge `override` into a copy of `base`; arrays and scalars replace, objects merge */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of PW_ environment variable names to config paths.
 * Only overrides scalar values.
 */
export const ENV_VAR_MAP: Record<string, string> = {
  PW_LOG_LEVEL: 'global.log_level',
  PW_HOST: 'server.host',
  PW_PORT: 'server.port',
  PW_STORAGE_DRIVER: 'storage.driver',
  PW_SQLITE_PATH: 'storage.sqlite_path',
  PW_REQUIRE_CI_PASS: 'merge_gate.require_ci_pass',
  PW_REQUIRE_CODEOWNER_REVIEW: 'merge_gate.require_codeowner_review',
  PW_REQUIRE_PR_APPROVAL: 'merge_gate.require_pr_approval',
  PW_MERGE_METHOD: 'merge_gate.merge_method',
  PW_APPROVAL_TIMEOUT_MS: 'approval.timeout_ms',
  PW_CI_TIMEOUT_MS: 'pipeline.ci_timeout_ms',
  PW_LEASE_TTL_MS: 'pipeline.lease_ttl_ms',
  PW_JIRA_MODE: 'integrations.jira.mode',
  PW_JIRA_BASE_URL: 'integrations.jira.base_url',
  PW_JIRA_USERNAME: 'integrations.jira.username',
  PW_JIRA_PROJECT_KEY: 'integrations.jira.project_key',
  PW_GITHUB_MODE: 'integrations.github.mode',
  PW_GITHUB_OWNER: 'integrations.github.owner',
  PW_GITHUB_DEFAULT_REPOSITORY: 'integrations.github.default_repository',
}

function coerce(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  return rawValue
}

/** Return a copy of `obj` with the dot-notation `path` set to `value` */
export function setByPath(obj: Record<string, unknown>, path: string, value: unknown): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined || head === '') return obj
  if (rest.length === 0) return { ...obj, [head]: value }
  const child = obj[head]
  return { ...obj, [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value) }
}

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Read PW_* variables and return a partial config overlay. Invalid values
 * are logged and ignored.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialPatchwardenConfig {
  let overrides: Record<string, unknown> = {}
  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides = setByPath(overrides, configPath, coerce(rawValue))
  }

  const parsed = PartialPatchwardenConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: PatchwardenConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialPatchwardenConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.patchwarden')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.patchwarden')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    const layers: PartialPatchwardenConfig[] = []

    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml'))
    if (globalConfig !== null) layers.push(globalConfig)

    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) layers.push(projectConfig)

    layers.push(readEnvOverrides(this._env), this._cliOverrides)

    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)
    for (const layer of layers) {
      merged = deepMerge(merged, layer)
    }

    const result = PatchwardenConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug({ layers: layers.length }, 'Configuration loaded successfully')
  }

  getConfig(): PatchwardenConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  getMasked(): unknown {
    return deepMask(this.getConfig())
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialPatchwardenConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      parsed = yaml.load(await readFile(filePath, 'utf-8'))
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) return {}

    if (isPlainObject(parsed)) {
      const version = parsed['config_format_version']
      if (version !== undefined && !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(String(version))) {
        throw new ConfigIncompatibleFormatError(
          `Config file ${filePath} has format version "${String(version)}"; supported: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}`,
          { filePath, version },
        )
      }
    }

    const result = PartialPatchwardenConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
