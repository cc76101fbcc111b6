/**
 * `patchwarden trigger` command
 *
 * Creates an incident from an Alertmanager-style JSON file and waits for its
 * pipeline run to settle (RESOLVED, FAILED or AWAITING_APPROVAL).
 *
 * Usage:
 *   patchwarden trigger alert.json
 *   patchwarden trigger alert.json --output-format json
 *
 * Exit codes:
 *   0 - Incident created and settled (whatever its final status)
 *   1 - System error
 *   2 - Usage error (unreadable file, invalid payload)
 */

import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import type { Command } from 'commander'
import { createRuntime } from '../../core/runtime-impl.js'
import { AlertPayloadSchema } from '../../modules/incidents/schemas.js'
import type { AlertPayload } from '../../modules/incidents/schemas.js'
import { createLogger } from '../../utils/logger.js'
import { renderIncidentDetail } from '../formatters/incident-formatter.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  loadCliConfig,
  parseOutputFormat,
  reportError,
} from '../utils/command-support.js'
import type { CommandContext, OutputFormat } from '../utils/command-support.js'
import { buildJsonOutput } from '../utils/formatting.js'

const logger = createLogger('cli:trigger')

export interface TriggerActionOptions extends CommandContext {
  alertFile: string
  outputFormat: OutputFormat
  version: string
}

/** Read and validate an alert file; returns an error message on failure */
export async function readAlertFile(path: string): Promise<AlertPayload | string> {
  let raw: string
  try {
    raw = await readFile(path, 'utf-8')
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return `Cannot read alert file ${path}: ${message}`
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return `Alert file ${path} is not valid JSON`
  }

  const result = AlertPayloadSchema.safeParse(parsed)
  if (!result.success) {
    const [issue] = result.error.issues
    const where = issue === undefined || issue.path.length === 0 ? '' : ` at ${issue.path.join('.')}`
    return `Invalid alert payload${where}: ${issue?.message ?? 'unknown error'}`
  }
  return result.data
}

export async function runTriggerAction(options: TriggerActionOptions): Promise<number> {
  const payload = await readAlertFile(resolve(options.projectRoot, options.alertFile))
  if (typeof payload === 'string') {
    process.stderr.write(`Error: ${payload}\n`)
    return EXIT_USAGE_ERROR
  }

  try {
    const config = await loadCliConfig(options)
    const runtime = await createRuntime(config, { env: options.env, reconcile: false })
    try {
      await runtime.start()
      const created = await runtime.service.createIncident(payload, { source: 'cli' })
      await runtime.service.waitForIdle(created.incidentId)
      const incident = await runtime.service.getIncident(created.incidentId)

      if (options.outputFormat === 'json') {
        process.stdout.write(JSON.stringify(buildJsonOutput('trigger', incident, options.version)) + '\n')
      } else {
        process.stdout.write(renderIncidentDetail(incident) + '\n')
      }
      return EXIT_SUCCESS
    } finally {
      await runtime.shutdown()
    }
  } catch (err) {
    logger.error({ err }, 'runTriggerAction failed')
    return reportError(err)
  }
}

/**
 * Register the `patchwarden trigger` command with the CLI program.
 */
export function registerTriggerCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('trigger <alertFile>')
    .description('Create an incident from an alert JSON file and run its pipeline')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (alertFile: string, opts: { outputFormat: string }) => {
      const outputFormat = parseOutputFormat(opts.outputFormat)
      if (outputFormat === null) {
        process.stderr.write(`Error: Unknown output format: ${opts.outputFormat}\n`)
        process.exitCode = EXIT_USAGE_ERROR
        return
      }
      process.exitCode = await runTriggerAction({ alertFile, outputFormat, version, projectRoot })
    })
}
