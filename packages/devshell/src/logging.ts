/* eslint-disable no-console */
import type { LoggingConfig, LogLevel } from './types'

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

const LEVEL_PREFIX: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️ ',
  warn: '⚠️ ',
  error: '❌',
}

export interface Logger {
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
}

export function formatLogLine(level: LogLevel, message: string, options: Omit<LoggingConfig, 'level'>, now: Date = new Date()): string {
  if (options.json) {
    const entry: Record<string, string> = { level, message }
    if (options.timestamps)
      entry.time = now.toISOString()
    return JSON.stringify(entry)
  }
  const stamp = options.timestamps ? `[${now.toISOString()}] ` : ''
  return `${stamp}${LEVEL_PREFIX[level]} ${message}`
}

/**
 * Create a logger writing to stderr, so stdout carries only command output.
 */
export function createLogger(config: LoggingConfig, sink: (line: string) => void = line => console.error(line)): Logger {
  const log = (level: LogLevel, message: string): void => {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[config.level])
      return
    sink(formatLogLine(level, message, config))
  }

  return {
    debug: message => log('debug', message),
    info: message => log('info', message),
    warn: message => log('warn', message),
    error: message => log('error', message),
  }
}
