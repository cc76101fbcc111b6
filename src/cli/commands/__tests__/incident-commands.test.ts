/**
 * Tests for the incident commands (trigger, incidents, approve, reject)
 * against a SQLite store in a temporary project directory.
 */

import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import yaml from 'js-yaml'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { runApproveAction } from '../approve.js'
import { runIncidentsAction } from '../incidents.js'
import { runRejectAction } from '../reject.js'
import { runTriggerAction } from '../trigger.js'
import { EXIT_ERROR, EXIT_SUCCESS, EXIT_USAGE_ERROR } from '../../utils/command-support.js'
import type { CommandContext } from '../../utils/command-support.js'
import { sampleAlert } from '../../../../test/fixtures/incidents.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const IncidentOutputSchema = z.object({
  command: z.string(),
  data: z.object({
    incidentId: z.string(),
    status: z.string(),
    approvalStatus: z.string(),
    errorMessage: z.string().nullable(),
  }),
})

const ListOutputSchema = z.object({
  data: z.object({
    count: z.number(),
    incidents: z.array(z.object({ incidentId: z.string(), status: z.string() })),
  }),
})

let projectRoot: string
let context: CommandContext
let stdout: string[]
let stderr: string[]

function writeConfig(config: Record<string, unknown>): void {
  mkdirSync(join(projectRoot, '.patchwarden'), { recursive: true })
  writeFileSync(join(projectRoot, '.patchwarden', 'config.yaml'), yaml.dump(config))
}

function baseConfig(requireCiPass: boolean): Record<string, unknown> {
  return {
    config_format_version: '1',
    storage: { driver: 'sqlite', sqlite_path: join(projectRoot, 'state', 'incidents.db') },
    merge_gate: { require_ci_pass: requireCiPass },
    pipeline: { ci_poll_interval_ms: 5, ci_timeout_ms: 200 },
    retry: { max_attempts: 1, base_delay_ms: 0, max_delay_ms: 0 },
  }
}

function writeAlert(name = 'alert.json', payload: unknown = sampleAlert()): string {
  writeFileSync(join(projectRoot, name), JSON.stringify(payload))
  return name
}

function lastJson(): unknown {
  const line = stdout.join('').trim().split('\n').pop() ?? ''
  return JSON.parse(line)
}

async function triggerIncident(): Promise<string> {
  const exitCode = await runTriggerAction({ ...context, alertFile: writeAlert(), outputFormat: 'json', version: '1.0.0' })
  expect(exitCode).toBe(EXIT_SUCCESS)
  const output = IncidentOutputSchema.parse(lastJson())
  stdout = []
  return output.data.incidentId
}

beforeEach(() => {
  projectRoot = mkdtempSync(join(tmpdir(), 'patchwarden-cli-'))
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

// ---------------------------------------------------------------------------
// trigger
// ---------------------------------------------------------------------------

describe('trigger', () => {
  it('runs the pipeline and prints the settled incident', async () => {
    writeConfig(baseConfig(false))
    const exitCode = await runTriggerAction({ ...context, alertFile: writeAlert(), outputFormat: 'json', version: '1.0.0' })

    expect(exitCode).toBe(EXIT_SUCCESS)
    const output = IncidentOutputSchema.parse(lastJson())
    expect(output.command).toBe('trigger')
    expect(output.data.status).toBe('RESOLVED')
  })

  it('prints a human summary by default', async () => {
    writeConfig(baseConfig(true))
    await runTriggerAction({ ...context, alertFile: writeAlert(), outputFormat: 'human', version: '1.0.0' })

    const [header] = stdout.join('').split('\n')
    expect(header).toMatch(/^Incident INC-\S+ {2}Status: AWAITING_APPROVAL {2}Severity: high$/)
  })

  it('rejects a missing alert file as a usage error', async () => {
    writeConfig(baseConfig(false))
    const exitCode = await runTriggerAction({ ...context, alertFile: 'missing.json', outputFormat: 'json', version: '1.0.0' })

    expect(exitCode).toBe(EXIT_USAGE_ERROR)
    expect(stderr.join('')).toContain(`Cannot read alert file ${join(projectRoot, 'missing.json')}`)
  })

  it('rejects a payload with neither alerts nor status', async () => {
    writeConfig(baseConfig(false))
    const alertFile = writeAlert('empty.json', {})
    const exitCode = await runTriggerAction({ ...context, alertFile, outputFormat: 'json', version: '1.0.0' })

    expect(exitCode).toBe(EXIT_USAGE_ERROR)
    expect(stderr.join('')).toMatch(/^Error: Invalid alert payload/)
  })

  it('reports an incompatible config as a system error', async () => {
    writeConfig({ config_format_version: '2' })
    const exitCode = await runTriggerAction({ ...context, alertFile: writeAlert(), outputFormat: 'json', version: '1.0.0' })

    expect(exitCode).toBe(EXIT_ERROR)
    expect(stderr.join('')).toContain('has format version "2"')
  })
})

// ---------------------------------------------------------------------------
// incidents
// ---------------------------------------------------------------------------

describe('incidents', () => {
  it('lists incidents from the store', async () => {
    writeConfig(baseConfig(false))
    const incidentId = await triggerIncident()

    const exitCode = await runIncidentsAction({ ...context, limit: 50, outputFormat: 'json', version: '1.0.0' })
    expect(exitCode).toBe(EXIT_SUCCESS)
    const output = ListOutputSchema.parse(lastJson())
    expect(output.data.count).toBe(1)
    expect(output.data.incidents[0]).toEqual(expect.objectContaining({ incidentId, status: 'RESOLVED' }))
  })

  it('filters by status', async () => {
    writeConfig(baseConfig(false))
    await triggerIncident()

    await runIncidentsAction({ ...context, status: 'failed', limit: 50, outputFormat: 'json', version: '1.0.0' })
    expect(ListOutputSchema.parse(lastJson()).data.count).toBe(0)
  })

  it('renders an empty table', async () => {
    writeConfig(baseConfig(false))
    await runIncidentsAction({ ...context, limit: 50, outputFormat: 'human', version: '1.0.0' })
    expect(stdout.join('')).toBe('No incidents found.\n')
  })

  it('shows one incident with its timeline', async () => {
    writeConfig(baseConfig(false))
    const incidentId = await triggerIncident()

    const exitCode = await runIncidentsAction({ ...context, incidentId, limit: 50, outputFormat: 'human', version: '1.0.0' })
    expect(exitCode).toBe(EXIT_SUCCESS)
    const text = stdout.join('')
    expect(text.split('\n')[0]).toBe(`Incident ${incidentId}  Status: RESOLVED  Severity: high`)
    expect(text).toContain('Timeline:')
    expect(text).toContain('INCIDENT_RESOLVED')
  })

  it('exits 2 for an unknown incident', async () => {
    writeConfig(baseConfig(false))
    const exitCode = await runIncidentsAction({
      ...context,
      incidentId: 'INC-DOES-NOT-EXIST',
      limit: 50,
      outputFormat: 'human',
      version: '1.0.0',
    })
    expect(exitCode).toBe(EXIT_USAGE_ERROR)
    expect(stderr.join('')).toBe('Error: Incident not found: INC-DOES-NOT-EXIST\n')
  })

  it('exits 2 for an unknown status filter', async () => {
    const exitCode = await runIncidentsAction({ ...context, status: 'DONE', limit: 50, outputFormat: 'human', version: '1.0.0' })
    expect(exitCode).toBe(EXIT_USAGE_ERROR)
    expect(stderr.join('')).toBe(
      'Error: Unknown status: DONE (expected one of PROCESSING, AWAITING_APPROVAL, MERGING, RESOLVED, FAILED)\n',
    )
  })
})

// ---------------------------------------------------------------------------
// approve / reject
// ---------------------------------------------------------------------------

describe('approve', () => {
  it('approves a held merge and runs it', async () => {
    writeConfig(baseConfig(true))
    const incidentId = await triggerIncident()

    const exitCode = await runApproveAction({ ...context, incidentId, actor: 'alice', outputFormat: 'json', version: '1.0.0' })
    expect(exitCode).toBe(EXIT_SUCCESS)
    const output = IncidentOutputSchema.parse(lastJson())
    expect(output.data.status).toBe('RESOLVED')
    expect(output.data.approvalStatus).toBe('APPROVED')
  })

  it('refuses to approve a merged incident', async () => {
    writeConfig(baseConfig(false))
    const incidentId = await triggerIncident()

    const exitCode = await runApproveAction({ ...context, incidentId, actor: 'alice', outputFormat: 'json', version: '1.0.0' })
    expect(exitCode).toBe(EXIT_USAGE_ERROR)
    expect(stderr.join('')).toMatch(/^Error: approval refused \(already_merged\)/)
  })
})

describe('reject', () => {
  it('fails the incident with the given reason', async () => {
    writeConfig(baseConfig(true))
    const incidentId = await triggerIncident()

    const exitCode = await runRejectAction({
      ...context,
      incidentId,
      reason: 'wrong fix',
      actor: 'bob',
      outputFormat: 'json',
      version: '1.0.0',
    })
    expect(exitCode).toBe(EXIT_SUCCESS)
    const output = IncidentOutputSchema.parse(lastJson())
    expect(output.data.status).toBe('FAILED')
    expect(output.data.approvalStatus).toBe('REJECTED')
    expect(output.data.errorMessage).toBe('Merge rejected: wrong fix')
  })

  it('refuses a second rejection', async () => {
    writeConfig(baseConfig(true))
    const incidentId = await triggerIncident()
    await runRejectAction({ ...context, incidentId, actor: 'bob', outputFormat: 'json', version: '1.0.0' })

    const exitCode = await runRejectAction({ ...context, incidentId, actor: 'bob', outputFormat: 'json', version: '1.0.0' })
    expect(exitCode).toBe(EXIT_USAGE_ERROR)
    expect(stderr.join('')).toMatch(/^Error: rejection refused \(already_rejected\)/)
  })
})
