/**
 * `patchwarden incidents` command
 *
 * Lists incidents from the configured store, or shows one with its timeline.
 *
 * Usage:
 *   patchwarden incidents                                 Newest first
 *   patchwarden incidents --status AWAITING_APPROVAL      Filter by status
 *   patchwarden incidents <incidentId>                    Detail with timeline
 *   patchwarden incidents --output-format json
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Usage error (incident not found, invalid filter)
 */

import type { Command } from 'commander'
import { createRuntime } from '../../core/runtime-impl.js'
import { IncidentStatusSchema } from '../../modules/incidents/schemas.js'
import type { IncidentFilter } from '../../modules/incidents/types.js'
import { createLogger } from '../../utils/logger.js'
import { renderIncidentDetail, renderIncidentTable } from '../formatters/incident-formatter.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  loadCliConfig,
  parseOutputFormat,
  reportError,
} from '../utils/command-support.js'
import type { CommandContext, OutputFormat } from '../utils/command-support.js'
import { buildJsonOutput } from '../utils/formatting.js'

const logger = createLogger('cli:incidents')

export interface IncidentsActionOptions extends CommandContext {
  incidentId?: string
  status?: string
  service?: string
  limit: number
  outputFormat: OutputFormat
  version: string
}

/** Turn raw flag values into a store filter; returns an error message on bad input */
export function buildFilter(options: Pick<IncidentsActionOptions, 'status' | 'service' | 'limit'>): IncidentFilter | string {
  if (!Number.isInteger(options.limit) || options.limit < 1) {
    return '--limit must be a positive integer'
  }
  const filter: IncidentFilter = { limit: options.limit }
  if (options.status !== undefined) {
    const status = IncidentStatusSchema.safeParse(options.status.toUpperCase())
    if (!status.success) {
      return `Unknown status: ${options.status} (expected one of ${IncidentStatusSchema.options.join(', ')})`
    }
    filter.status = status.data
  }
  if (options.service !== undefined) filter.serviceName = options.service
  return filter
}

export async function runIncidentsAction(options: IncidentsActionOptions): Promise<number> {
  const filter = buildFilter(options)
  if (typeof filter === 'string') {
    process.stderr.write(`Error: ${filter}\n`)
    return EXIT_USAGE_ERROR
  }

  try {
    const config = await loadCliConfig(options)
    const runtime = await createRuntime(config, { env: options.env, reconcile: false })
    try {
      await runtime.start()

      if (options.incidentId !== undefined) {
        const incident = await runtime.service.getIncident(options.incidentId)
        process.stdout.write(
          options.outputFormat === 'json'
            ? JSON.stringify(buildJsonOutput('incidents', incident, options.version)) + '\n'
            : renderIncidentDetail(incident) + '\n',
        )
        return EXIT_SUCCESS
      }

      const incidents = await runtime.service.listIncidents(filter)
      process.stdout.write(
        options.outputFormat === 'json'
          ? JSON.stringify(buildJsonOutput('incidents', { incidents, count: incidents.length }, options.version)) + '\n'
          : renderIncidentTable(incidents) + '\n',
      )
      return EXIT_SUCCESS
    } finally {
      await runtime.shutdown()
    }
  } catch (err) {
    logger.error({ err }, 'runIncidentsAction failed')
    return reportError(err)
  }
}

/**
 * Register the `patchwarden incidents` command with the CLI program.
 */
export function registerIncidentsCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('incidents [incidentId]')
    .description('List incidents, or show one with its timeline')
    .option('--status <status>', 'Only incidents in this status')
    .option('--service <name>', 'Only incidents for this service')
    .option('--limit <n>', 'Maximum number of incidents', (value: string) => Number.parseInt(value, 10), 50)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(
      async (
        incidentId: string | undefined,
        opts: { status?: string; service?: string; limit: number; outputFormat: string },
      ) => {
        const outputFormat = parseOutputFormat(opts.outputFormat)
        if (outputFormat === null) {
          process.stderr.write(`Error: Unknown output format: ${opts.outputFormat}\n`)
          process.exitCode = EXIT_USAGE_ERROR
          return
        }
        process.exitCode = await runIncidentsAction({
          incidentId,
          status: opts.status,
          service: opts.service,
          limit: opts.limit,
          outputFormat,
          version,
          projectRoot,
        })
      },
    )
}
