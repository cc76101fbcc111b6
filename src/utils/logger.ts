/**
 * pino loggers for every Patchwarden module.
 *
 * Loggers are named by area (`pipeline-orchestrator`, `persistence:database`)
 * and redact provider credentials. Each one is kept in a registry so the
 * configured `global.log_level` can be applied after config loads.
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

export interface LoggerOptions {
  level?: string
  pretty?: boolean
  /** Write here instead of stdout; disables the pretty transport */
  destination?: pino.DestinationStream
}

const registry = new Set<pino.Logger>()

function defaultLevel(): string {
  const fromEnv = process.env.LOG_LEVEL
  if (fromEnv) return fromEnv
  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info'
    case 'development':
    case 'test':
      return 'debug'
    default:
      // CLI runs without NODE_ENV
      return 'warn'
  }
}

function prettyByDefault(): boolean {
  const flag = process.env.LOG_PRETTY
  if (flag !== undefined) return flag === 'true'
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const config: pino.LoggerOptions = {
    name,
    level: options.level ?? defaultLevel(),
    redact: PINO_REDACT_PATHS,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
    formatters: {
      level: (label) => ({ level: label }),
    },
  }

  let instance: pino.Logger
  if (options.destination !== undefined) {
    instance = pino(config, options.destination)
  } else if (options.pretty ?? prettyByDefault()) {
    instance = pino({
      ...config,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
      },
    })
  } else {
    instance = pino(config)
  }

  registry.add(instance)
  return instance
}

export const logger = createLogger('patchwarden')

/** Bind incident or stage context, e.g. `{ incidentId, stage }` */
export function childLogger(parent: pino.Logger, bindings: Record<string, unknown>): pino.Logger {
  return parent.child(bindings)
}

/** Set `level` on one logger; unknown level names are ignored */
export function applyLogLevel(target: pino.Logger, level: string): void {
  if (Object.prototype.hasOwnProperty.call(target.levels.values, level)) {
    target.level = level
  }
}

/** Set `level` on every logger from createLogger(), unless LOG_LEVEL is set */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) return
  for (const instance of registry) applyLogLevel(instance, level)
}
