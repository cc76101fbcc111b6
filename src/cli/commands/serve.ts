/**
 * `patchwarden serve` command
 *
 * Runs the HTTP API with the reconciliation sweep until SIGINT/SIGTERM.
 *
 * Usage:
 *   patchwarden serve
 *   patchwarden serve --port 9090 --host 0.0.0.0
 *   patchwarden serve --output-format json      Stream incident events as NDJSON
 *
 * Exit codes:
 *   0 - Server started (the process then runs until signalled)
 *   1 - System error (config, provider setup, port in use)
 *   2 - Usage error (invalid flags)
 */

import type { Command } from 'commander'
import { createRuntime } from '../../core/runtime-impl.js'
import type { PatchwardenRuntime } from '../../core/runtime.js'
import type { PartialPatchwardenConfig } from '../../modules/config/config-schema.js'
import { setupGracefulShutdown } from '../../recovery/shutdown-handler.js'
import { createLogger } from '../../utils/logger.js'
import { streamIncidentEvents } from '../formatters/streaming.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  loadCliConfig,
  parseOutputFormat,
  reportError,
} from '../utils/command-support.js'
import type { CommandContext, OutputFormat } from '../utils/command-support.js'

const logger = createLogger('cli:serve')

export interface ServeActionOptions extends CommandContext {
  port?: number
  host?: string
  outputFormat: OutputFormat
}

function serverOverrides(options: Pick<ServeActionOptions, 'port' | 'host'>): PartialPatchwardenConfig {
  const server: NonNullable<PartialPatchwardenConfig['server']> = {}
  if (options.port !== undefined) server.port = options.port
  if (options.host !== undefined) server.host = options.host
  return { server }
}

/**
 * Load config, wire the runtime with the server and sweep, and start it.
 * The caller owns shutdown.
 */
export async function startServer(options: ServeActionOptions): Promise<PatchwardenRuntime> {
  const config = await loadCliConfig(options, serverOverrides(options))
  const runtime = await createRuntime(config, { env: options.env, serve: true })

  const stopStream = options.outputFormat === 'json' ? streamIncidentEvents(runtime.eventBus) : null
  try {
    await runtime.start()
  } catch (err) {
    stopStream?.()
    await runtime.shutdown()
    throw err
  }

  const address = runtime.server?.address
  if (options.outputFormat === 'human' && address !== null && address !== undefined) {
    process.stdout.write(
      `Patchwarden listening on http://${address.address}:${String(address.port)} ` +
        `(storage: ${config.storage.driver}, jira: ${config.integrations.jira.mode}, github: ${config.integrations.github.mode})\n`,
    )
  }
  return runtime
}

export async function runServeAction(options: ServeActionOptions): Promise<number> {
  try {
    const runtime = await startServer(options)
    setupGracefulShutdown({ shutdown: () => runtime.shutdown(), logger })
    return EXIT_SUCCESS
  } catch (err) {
    logger.error({ err }, 'runServeAction failed')
    return reportError(err)
  }
}

/**
 * Register the `patchwarden serve` command with the CLI program.
 */
export function registerServeCommand(program: Command, _version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('serve')
    .description('Run the HTTP API and the reconciliation sweep')
    .option('--port <port>', 'Port to listen on (overrides server.port)', (value: string) => Number.parseInt(value, 10))
    .option('--host <host>', 'Interface to bind (overrides server.host)')
    .option('--output-format <format>', 'Output format: human (default) or json (NDJSON events)', 'human')
    .action(async (opts: { port?: number; host?: string; outputFormat: string }) => {
      const outputFormat = parseOutputFormat(opts.outputFormat)
      if (outputFormat === null) {
        process.stderr.write(`Error: Unknown output format: ${opts.outputFormat}\n`)
        process.exitCode = EXIT_USAGE_ERROR
        return
      }
      if (opts.port !== undefined && (!Number.isInteger(opts.port) || opts.port < 0 || opts.port > 65535)) {
        process.stderr.write('Error: --port must be an integer between 0 and 65535\n')
        process.exitCode = EXIT_USAGE_ERROR
        return
      }
      process.exitCode = await runServeAction({ port: opts.port, host: opts.host, outputFormat, projectRoot })
    })
}
