/**
 * Tests for `patchwarden config`.
 */

import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import yaml from 'js-yaml'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { DEFAULT_CONFIG } from '../../../modules/config/defaults.js'
import { runConfigAction } from '../config.js'
import { EXIT_ERROR, EXIT_SUCCESS, EXIT_USAGE_ERROR } from '../../utils/command-support.js'
import type { CommandContext } from '../../utils/command-support.js'

let projectRoot: string
let context: CommandContext
let stdout: string[]
let stderr: string[]

function writeProjectConfig(content: string): void {
  mkdirSync(join(projectRoot, '.patchwarden'), { recursive: true })
  writeFileSync(join(projectRoot, '.patchwarden', 'config.yaml'), content)
}

beforeEach(() => {
  projectRoot = mkdtempSync(join(tmpdir(), 'patchwarden-config-'))
  context = { projectRoot, globalConfigDir: join(projectRoot, 'global'), env: {} }
  stdout = []
  stderr = []
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk))
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk))
    return true
  })
})

afterEach(() => {
  vi.restoreAllMocks()
  rmSync(projectRoot, { recursive: true, force: true })
})

describe('runConfigAction', () => {
  it('prints a single value', async () => {
    const exitCode = await runConfigAction({ ...context, key: 'merge_gate.merge_method', outputFormat: 'yaml', version: '1.0.0' })
    expect(exitCode).toBe(EXIT_SUCCESS)
    expect(stdout.join('')).toBe('squash\n')
  })

  it('prints a section as YAML, with the project file applied', async () => {
    writeProjectConfig("config_format_version: '1'\nretry:\n  max_attempts: 5\n")
    await runConfigAction({ ...context, key: 'retry', outputFormat: 'yaml', version: '1.0.0' })
    expect(stdout.join('')).toBe(yaml.dump({ ...DEFAULT_CONFIG.retry, max_attempts: 5 }, { lineWidth: 120 }))
  })

  it('reports a value from PW_* variables as JSON', async () => {
    await runConfigAction({
      ...context,
      env: { PW_MERGE_METHOD: 'rebase' },
      key: 'merge_gate.merge_method',
      outputFormat: 'json',
      version: '1.0.0',
    })
    const output = z
      .object({ command: z.string(), version: z.string(), data: z.object({ key: z.string(), value: z.string() }) })
      .parse(JSON.parse(stdout.join('')))
    expect(output).toEqual({
      command: 'config',
      version: '1.0.0',
      data: { key: 'merge_gate.merge_method', value: 'rebase' },
    })
  })

  it('masks a token embedded in a configured URL', async () => {
    writeProjectConfig(
      "config_format_version: '1'\nintegrations:\n  github:\n    api_url: https://ghp_placeholderplaceholder0000@git.example.test\n",
    )
    await runConfigAction({ ...context, key: 'integrations.github.api_url', outputFormat: 'yaml', version: '1.0.0' })
    expect(stdout.join('')).toBe('https://***@git.example.test\n')
  })

  it('exits 2 for an unknown key', async () => {
    const exitCode = await runConfigAction({ ...context, key: 'pipeline.nope', outputFormat: 'yaml', version: '1.0.0' })
    expect(exitCode).toBe(EXIT_USAGE_ERROR)
    expect(stderr.join('')).toBe('Error: Unknown config key: pipeline.nope\n')
  })

  it('exits 1 for an incompatible config file', async () => {
    writeProjectConfig("config_format_version: '9'\n")
    const exitCode = await runConfigAction({ ...context, outputFormat: 'yaml', version: '1.0.0' })
    expect(exitCode).toBe(EXIT_ERROR)
  })
})
