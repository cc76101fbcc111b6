/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < global < project < env < CLI)
 *  - Config validation and format-version errors
 *  - get() dot-notation access
 *  - getMasked()
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createConfigSystem, deepMerge } from '../config-system-impl.js'
import type { ConfigSystemOptions } from '../config-system.js'
import { DEFAULT_CONFIG } from '../defaults.js'
import { ConfigError, ConfigIncompatibleFormatError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup — temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `patchwarden-config-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, 'project', '.patchwarden')
  globalConfigDir = join(testDir, 'global', '.patchwarden')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

function createSystem(overrides: Partial<ConfigSystemOptions> = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({ projectConfigDir, globalConfigDir, env: {}, ...overrides })
}

async function writeYaml(dir: string, content: string): Promise<void> {
  await writeFile(join(dir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

describe('ConfigSystem - default config', () => {
  it('returns the built-in defaults when no config files exist', async () => {
    const system = createSystem()
    await system.load()
    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
  })

  it('throws ConfigError if getConfig is called before load', () => {
    const system = createSystem()
    expect(system.isLoaded).toBe(false)
    expect(() => system.getConfig()).toThrow(ConfigError)
  })

  it('treats an empty file as no overrides', async () => {
    await writeYaml(projectConfigDir, '')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().server.port).toBe(8080)
  })
})

// ---------------------------------------------------------------------------
// Hierarchy
// ---------------------------------------------------------------------------

describe('ConfigSystem - hierarchy loading', () => {
  it('global config overrides defaults', async () => {
    await writeYaml(globalConfigDir, 'global:\n  log_level: debug\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().global.log_level).toBe('debug')
  })

  it('project config overrides global config', async () => {
    await writeYaml(globalConfigDir, 'server:\n  port: 9000\n')
    await writeYaml(projectConfigDir, 'server:\n  port: 9100\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().server.port).toBe(9100)
    expect(system.getConfig().server.host).toBe('127.0.0.1')
  })

  it('env vars override project config', async () => {
    await writeYaml(projectConfigDir, 'merge_gate:\n  require_ci_pass: true\n')
    const system = createSystem({ env: { PW_REQUIRE_CI_PASS: 'false', PW_PORT: '7000' } })
    await system.load()
    expect(system.getConfig().merge_gate.require_ci_pass).toBe(false)
    expect(system.getConfig().server.port).toBe(7000)
  })

  it('reads the lease TTL from the defaults and PW_LEASE_TTL_MS', async () => {
    const defaults = createSystem()
    await defaults.load()
    expect(defaults.getConfig().pipeline.lease_ttl_ms).toBe(60_000)

    const overridden = createSystem({ env: { PW_LEASE_TTL_MS: '15000' } })
    await overridden.load()
    expect(overridden.getConfig().pipeline.lease_ttl_ms).toBe(15_000)
  })

  it('CLI overrides take highest priority', async () => {
    const system = createSystem({
      env: { PW_PORT: '7000' },
      cliOverrides: { server: { port: 7500 } },
    })
    await system.load()
    expect(system.getConfig().server.port).toBe(7500)
  })

  it('replaces arrays instead of concatenating them', async () => {
    await writeYaml(globalConfigDir, 'merge_gate:\n  approval_required_severities: [critical, high]\n')
    await writeYaml(projectConfigDir, 'merge_gate:\n  approval_required_severities: [critical]\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().merge_gate.approval_required_severities).toEqual(['critical'])
  })

  it('merges nested integration sections with defaults', async () => {
    await writeYaml(
      projectConfigDir,
      'integrations:\n  jira:\n    mode: api\n    base_url: https://jira.example.test\n',
    )
    const system = createSystem()
    await system.load()
    const jira = system.getConfig().integrations.jira
    expect(jira.mode).toBe('api')
    expect(jira.base_url).toBe('https://jira.example.test')
    expect(jira.done_status).toBe('Done')
  })

  it('ignores invalid env var values', async () => {
    const system = createSystem({ env: { PW_MERGE_METHOD: 'fast-forward' } })
    await system.load()
    expect(system.getConfig().merge_gate.merge_method).toBe('squash')
  })
})

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('ConfigSystem - validation errors', () => {
  it('throws ConfigError for an invalid log_level', async () => {
    await writeYaml(projectConfigDir, 'global:\n  log_level: loud\n')
    await expect(createSystem().load()).rejects.toThrow(ConfigError)
  })

  it('throws ConfigError for unknown keys', async () => {
    await writeYaml(projectConfigDir, 'pipeline:\n  ci_poll_every: 5\n')
    await expect(createSystem().load()).rejects.toThrow(ConfigError)
  })

  it('rejects a retry cap below the base delay', async () => {
    await writeYaml(projectConfigDir, 'retry:\n  base_delay_ms: 5000\n  max_delay_ms: 100\n')
    await expect(createSystem().load()).rejects.toThrow(/max_delay_ms must be >= base_delay_ms/)
  })

  it('rejects an unsupported config_format_version', async () => {
    await writeYaml(projectConfigDir, "config_format_version: '2'\n")
    await expect(createSystem().load()).rejects.toThrow(ConfigIncompatibleFormatError)
  })

  it('wraps YAML syntax errors in ConfigError', async () => {
    await writeYaml(projectConfigDir, 'server: [unclosed\n')
    await expect(createSystem().load()).rejects.toThrow(/Failed to read config file/)
  })
})

// ---------------------------------------------------------------------------
// get() / getMasked()
// ---------------------------------------------------------------------------

describe('ConfigSystem - get()', () => {
  it('resolves dot-notation keys', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('merge_gate.merge_method')).toBe('squash')
    expect(system.get('integrations.github.default_base_branch')).toBe('main')
    expect(system.get('pipeline')).toEqual(DEFAULT_CONFIG.pipeline)
  })

  it('returns undefined for unknown keys', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('pipeline.nope')).toBeUndefined()
    expect(system.get('server.port.deeper')).toBeUndefined()
  })
})

describe('ConfigSystem - getMasked()', () => {
  it('leaves non-credential fields untouched', async () => {
    const system = createSystem()
    await system.load()
    expect(system.getMasked()).toEqual(system.getConfig())
  })
})

describe('deepMerge', () => {
  it('merges nested objects and lets scalars replace', () => {
    expect(deepMerge({ a: { b: 1, c: 2 }, d: 1 }, { a: { c: 3 }, d: undefined })).toEqual({ a: { b: 1, c: 3 }, d: 1 })
  })
})
