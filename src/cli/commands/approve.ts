/**
 * `patchwarden approve` command
 *
 * Approves the held merge of an incident in AWAITING_APPROVAL, then runs the
 * merge stage to completion.
 *
 * Usage:
 *   patchwarden approve <incidentId>
 *   patchwarden approve <incidentId> --actor alice --output-format json
 *
 * Exit codes:
 *   0 - Approved (the merge itself may still fail; see the printed status)
 *   1 - System error
 *   2 - Usage error (incident not found, approval refused)
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

const logger = createLogger('cli:approve')

export interface ApproveActionOptions extends CommandContext {
  incidentId: string
  actor: string
  outputFormat: OutputFormat
  version: string
}

export async function runApproveAction(options: ApproveActionOptions): Promise<number> {
  try {
    const config = await loadCliConfig(options)
    const runtime = await createRuntime(config, { env: options.env, reconcile: false })
    try {
      await runtime.start()
      await runtime.service.approveMerge(options.incidentId, options.actor)
      await runtime.service.waitForIdle(options.incidentId)
      const incident = await runtime.service.getIncident(options.incidentId)

      if (options.outputFormat === 'json') {
        process.stdout.write(JSON.stringify(buildJsonOutput('approve', incident, options.version)) + '\n')
      } else {
        process.stdout.write(renderIncidentDetail(incident) + '\n')
      }
      return EXIT_SUCCESS
    } finally {
      await runtime.shutdown()
    }
  } catch (err) {
    if (err instanceof InvalidStateError) {
      process.stderr.write(`Error: approval refused (${err.reason}): ${err.message}\n`)
      return EXIT_USAGE_ERROR
    }
    logger.error({ err }, 'runApproveAction failed')
    return reportError(err)
  }
}

/**
 * Register the `patchwarden approve` command with the CLI program.
 */
export function registerApproveCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('approve <incidentId>')
    .description('Approve the held merge of an incident and run the merge')
    .option('--actor <name>', 'Who approved the merge', 'cli')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (incidentId: string, opts: { actor: string; outputFormat: string }) => {
      const outputFormat = parseOutputFormat(opts.outputFormat)
      if (outputFormat === null) {
        process.stderr.write(`Error: Unknown output format: ${opts.outputFormat}\n`)
        process.exitCode = EXIT_USAGE_ERROR
        return
      }
      process.exitCode = await runApproveAction({ incidentId, actor: opts.actor, outputFormat, version, projectRoot })
    })
}
