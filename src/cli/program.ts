/**
 * Builds the `patchwarden` commander program
 */

import { Command } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { registerApproveCommand } from './commands/approve.js'
import { registerConfigCommand } from './commands/config.js'
import { registerIncidentsCommand } from './commands/incidents.js'
import { registerRejectCommand } from './commands/reject.js'
import { registerServeCommand } from './commands/serve.js'
import { registerTriggerCommand } from './commands/trigger.js'

function isPackageManifest(value: unknown): value is { name?: unknown; version?: unknown } {
  return typeof value === 'object' && value !== null
}

/** Read the version from package.json; this file runs from src/cli or dist/cli */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  const paths = [resolve(here, '../../package.json'), resolve(here, '../../../package.json')]

  for (const pkgPath of paths) {
    let parsed: unknown
    try {
      parsed = JSON.parse(await readFile(pkgPath, 'utf-8'))
    } catch {
      continue
    }
    if (isPackageManifest(parsed) && parsed.name === 'patchwarden' && typeof parsed.version === 'string') {
      return parsed.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(projectRoot = process.cwd()): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('patchwarden')
    .description('Patchwarden - alert-to-merge incident response orchestrator')
    .version(version, '-v, --version', 'Output the current version')

  registerServeCommand(program, version, projectRoot)
  registerIncidentsCommand(program, version, projectRoot)
  registerApproveCommand(program, version, projectRoot)
  registerRejectCommand(program, version, projectRoot)
  registerTriggerCommand(program, version, projectRoot)
  registerConfigCommand(program, version, projectRoot)

  return program
}
