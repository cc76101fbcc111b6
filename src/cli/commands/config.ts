/**
 * `patchwarden config` command
 *
 * Prints the merged configuration (defaults, global and project YAML, PW_*
 * environment) with credentials masked.
 *
 * Usage:
 *   patchwarden config                              Whole config as YAML
 *   patchwarden config merge_gate                   One section
 *   patchwarden config merge_gate.merge_method      One value
 *   patchwarden config --output-format json
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error (invalid config)
 *   2 - Usage error (unknown key)
 */

import { join } from 'node:path'
import type { Command } from 'commander'
import yaml from 'js-yaml'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { setLogLevel } from '../../utils/logger.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, reportError } from '../utils/command-support.js'
import type { CommandContext } from '../utils/command-support.js'
import { buildJsonOutput } from '../utils/formatting.js'
import { deepMask } from '../utils/masking.js'

export type ConfigOutputFormat = 'yaml' | 'json'

export interface ConfigActionOptions extends CommandContext {
  key?: string
  outputFormat: ConfigOutputFormat
  version: string
}

export async function runConfigAction(options: ConfigActionOptions): Promise<number> {
  try {
    const system = createConfigSystem({
      projectConfigDir: join(options.projectRoot, '.patchwarden'),
      globalConfigDir: options.globalConfigDir,
      env: options.env,
    })
    await system.load()
    setLogLevel(system.getConfig().global.log_level)

    const value = options.key === undefined ? system.getMasked() : deepMask(system.get(options.key))
    if (value === undefined) {
      process.stderr.write(`Error: Unknown config key: ${options.key ?? ''}\n`)
      return EXIT_USAGE_ERROR
    }

    if (options.outputFormat === 'json') {
      const data = options.key === undefined ? value : { key: options.key, value }
      process.stdout.write(JSON.stringify(buildJsonOutput('config', data, options.version)) + '\n')
    } else if (typeof value === 'object' && value !== null) {
      process.stdout.write(yaml.dump(value, { lineWidth: 120 }))
    } else {
      process.stdout.write(`${String(value)}\n`)
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

export function registerConfigCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('config [key]')
    .description('Show the merged configuration, credentials masked')
    .option('--output-format <format>', 'Output format: yaml (default) or json', 'yaml')
    .action(async (key: string | undefined, opts: { outputFormat: string }) => {
      if (opts.outputFormat !== 'yaml' && opts.outputFormat !== 'json') {
        process.stderr.write(`Error: Unknown output format: ${opts.outputFormat}\n`)
        process.exitCode = EXIT_USAGE_ERROR
        return
      }
      process.exitCode = await runConfigAction({ key, outputFormat: opts.outputFormat, version, projectRoot })
    })
}
