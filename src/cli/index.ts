#!/usr/bin/env node
/**
 * Patchwarden CLI - Main entry point
 * Provides the `patchwarden` command-line interface
 */

import { createLogger } from '../utils/logger.js'
import { createProgram } from './program.js'

const logger = createLogger('cli')

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
