/**
 * setupGracefulShutdown — registers SIGTERM and SIGINT handlers for clean
 * process exit.
 *
 * On signal receipt:
 *  1. Stops the HTTP server and the reconciliation timer
 *  2. Waits (bounded) for in-flight pipeline tasks
 *  3. Closes the incident database
 *  4. Exits with code 0, or 1 when teardown failed
 *
 * Incidents still PROCESSING at exit are resumed by reconciliation on the
 * next start. Returns a cleanup function that removes the listeners.
 */

import type pino from 'pino'
import { createLogger } from '../utils/logger.js'

const defaultLogger = createLogger('shutdown-handler')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ShutdownHandlerOptions {
  /** Tears the running services down, e.g. ServiceLifecycle.stop() */
  shutdown: () => Promise<void>
  logger?: pino.Logger
  exit?: (code: number) => void
}

// ---------------------------------------------------------------------------
// setupGracefulShutdown
// ---------------------------------------------------------------------------

/**
 * Register SIGTERM and SIGINT handlers for graceful shutdown. A second
 * signal while teardown runs is ignored.
 *
 * @returns Cleanup function that removes the signal listeners
 */
export function setupGracefulShutdown(options: ShutdownHandlerOptions): () => void {
  const log = options.logger ?? defaultLogger
  const exit = options.exit ?? ((code: number) => process.exit(code))
  let shuttingDown = false

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      log.warn({ signal }, 'Shutdown already in progress')
      return
    }
    shuttingDown = true
    log.info({ signal }, 'Graceful shutdown initiated')

    try {
      await options.shutdown()
    } catch (err) {
      log.error({ err }, 'Error during graceful shutdown')
      exit(1)
      return
    }

    log.info('Graceful shutdown complete')
    exit(0)
  }

  const sigintHandler = (): void => {
    void shutdown('SIGINT')
  }

  const sigtermHandler = (): void => {
    void shutdown('SIGTERM')
  }

  process.on('SIGINT', sigintHandler)
  process.on('SIGTERM', sigtermHandler)

  return (): void => {
    process.removeListener('SIGINT', sigintHandler)
    process.removeListener('SIGTERM', sigtermHandler)
  }
}
