/**
 * `patchwarden reject` command
 *
 * Rejects the held merge of an incident in AWAITING_APPROVAL; the incident
 * moves to FAILED with the given reason.
 *
 * Usage:
 *   patchwarden reject <incidentId> --reason "fix targets the wrong service"
 *
 * Exit codes:
 *   0 - Rejected
 *   1 - System error
 *   2 - Usage error (incident not found, rejection refused)
 */

import type { Command } from 'commander'
import { createRuntime } from '../../core/runtime-impl.js'
import { InvalidStateError } from '../../core/errors.js'
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

const logger = createLogger('cli:reject')

export interface RejectActionOptions extends CommandContext {
  incidentId: string
  reason?: string
  actor: string
  outputFormat: OutputFormat
  version: string
}

export async function runRejectAction(options: RejectActionOptions): Promise<number> {
  try {
    const config = await loadCliConfig(options)
    const runtime = await createRuntime(config, { env: options.env, reconcile: false })
    try {
      await runtime.start()
      await runtime.service.rejectMerge(options.incidentId, options.reason, options.actor)
      const incident = await runtime.service.getIncident(options.incidentId)

      if (options.outputFormat === 'json') {
        process.stdout.write(JSON.stringify(buildJsonOutput('reject', incident, options.version)) + '\n')
      } else {
        process.stdout.write(renderIncidentDetail(incident) + '\n')
      }
      return EXIT_SUCCESS
    } finally {
      await runtime.shutdown()
    }
  } catch (err) {
    if (err instanceof InvalidStateError) {
      process.stderr.write(`Error: rejection refused (${err.reason}): ${err.message}\n`)
      return EXIT_USAGE_ERROR
    }
    logger.error({ err }, 'runRejectAction failed')
    return reportError(err)
  }
}

/**
 * Register the `patchwarden reject` command with the CLI program.
 */
export function registerRejectCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('reject <incidentId>')
    .description('Reject the held merge of an incident')
    .option('--reason <text>', 'Why the merge was rejected')
    .option('--actor <name>', 'Who rejected the merge', 'cli')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (incidentId: string, opts: { reason?: string; actor: string; outputFormat: string }) => {
      const outputFormat = parseOutputFormat(opts.outputFormat)
      if (outputFormat === null) {
        process.stderr.write(`Error: Unknown output format: ${opts.outputFormat}\n`)
        process.exitCode = EXIT_USAGE_ERROR
        return
      }
      process.exitCode = await runRejectAction({
        incidentId,
        reason: opts.reason,
        actor: opts.actor,
        outputFormat,
        version,
        projectRoot,
      })
    })
}
