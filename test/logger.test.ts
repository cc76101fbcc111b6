/**
 * Tests for the logger utility
 */

import { Writable } from 'node:stream'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { applyLogLevel, childLogger, createLogger, setLogLevel } from '../src/utils/logger.js'

describe('Logger Utility', () => {
  let originalEnv: NodeJS.ProcessEnv

  beforeEach(() => {
    originalEnv = { ...process.env }
  })

  afterEach(() => {
    process.env = originalEnv
  })

  describe('createLogger', () => {
    it('creates a logger with the given level', () => {
      const log = createLogger('test', { level: 'error', pretty: false })
      expect(log.level).toBe('error')
    })

    it('takes LOG_LEVEL from the environment', () => {
      process.env.LOG_LEVEL = 'warn'
      expect(createLogger('env-test', { pretty: false }).level).toBe('warn')
    })

    it('uses info in production', () => {
      delete process.env.LOG_LEVEL
      process.env.NODE_ENV = 'production'
      expect(createLogger('prod-test', { pretty: false }).level).toBe('info')
    })

    it('stays at warn without NODE_ENV', () => {
      delete process.env.LOG_LEVEL
      delete process.env.NODE_ENV
      expect(createLogger('cli-test', { pretty: false }).level).toBe('warn')
    })
  })

  describe('destination', () => {
    it('writes JSON lines with the name, a level label and redacted tokens', () => {
      const lines: string[] = []
      const destination = new Writable({
        write(chunk: Buffer, _encoding: string, callback: () => void) {
          lines.push(chunk.toString())
          callback()
        },
      })
      const log = createLogger('integrations:jira', { level: 'info', destination })
      log.info({ incidentId: 'INC-1', apiToken: 'test-secret' }, 'ticket created')

      expect(lines).toHaveLength(1)
      expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
        name: 'integrations:jira',
        level: 'info',
        incidentId: 'INC-1',
        apiToken: '[Redacted]',
        msg: 'ticket created',
      })
    })
  })

  describe('childLogger', () => {
    it('inherits the parent level and carries bindings', () => {
      const parent = createLogger('parent', { level: 'warn', pretty: false })
      const child = childLogger(parent, { incidentId: 'INC-20260301-ABC123', stage: 'triage' })
      expect(child.level).toBe('warn')
      expect(child.bindings()).toMatchObject({ incidentId: 'INC-20260301-ABC123', stage: 'triage' })
    })
  })

  describe('applyLogLevel', () => {
    it('sets a known level', () => {
      const log = createLogger('apply', { level: 'info', pretty: false })
      applyLogLevel(log, 'error')
      expect(log.level).toBe('error')
    })

    it('ignores an unknown level', () => {
      const log = createLogger('apply-unknown', { level: 'info', pretty: false })
      applyLogLevel(log, 'loud')
      expect(log.level).toBe('info')
    })
  })

  describe('setLogLevel', () => {
    it('reaches loggers created earlier', () => {
      delete process.env.LOG_LEVEL
      const first = createLogger('first', { level: 'info', pretty: false })
      const second = createLogger('second', { level: 'debug', pretty: false })
      setLogLevel('error')
      expect(first.level).toBe('error')
      expect(second.level).toBe('error')
    })

    it('leaves levels alone when LOG_LEVEL is set', () => {
      process.env.LOG_LEVEL = 'warn'
      const log = createLogger('pinned', { level: 'info', pretty: false })
      setLogLevel('error')
      expect(log.level).toBe('info')
    })
  })
})
