import { describe, expect, it } from 'vitest'
import { createLogger, formatLogLine } from '../src/logging'

describe('logging', () => {
  const now = new Date('2026-01-02T03:04:05.000Z')

  it('formats plain lines with an optional timestamp', () => {
    expect(formatLogLine('error', 'boom', { timestamps: false, json: false }, now)).toBe('❌ boom')
    expect(formatLogLine('debug', 'resolving', { timestamps: true, json: false }, now)).toBe('[2026-01-02T03:04:05.000Z] 🔍 resolving')
  })

  it('formats JSON lines', () => {
    expect(formatLogLine('warn', 'careful', { timestamps: false, json: true }, now)).toBe('{"level":"warn","message":"careful"}')
    expect(formatLogLine('info', 'hi', { timestamps: true, json: true }, now)).toBe('{"level":"info","message":"hi","time":"2026-01-02T03:04:05.000Z"}')
  })

  it('drops messages below the configured level', () => {
    const lines: string[] = []
    const logger = createLogger({ level: 'warn', timestamps: false, json: true }, line => lines.push(line))
    logger.debug('one')
    logger.info('two')
    logger.warn('three')
    logger.error('four')
    expect(lines).toEqual([
      '{"level":"warn","message":"three"}',
      '{"level":"error","message":"four"}',
    ])
  })
})
