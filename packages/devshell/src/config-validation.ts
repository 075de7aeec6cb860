import type { FleaConfig } from './types'
import { parsePlatform } from './platform'

export interface ValidationResult {
  valid: boolean
  errors: string[]
  warnings: string[]
}

/**
 * Validates a FleaConfig object
 */
export function validateConfig(config: Partial<FleaConfig>): ValidationResult {
  const errors: string[] = []
  const warnings: string[] = []

  if (config.platform !== undefined) {
    try {
      parsePlatform(config.platform)
    }
    catch {
      errors.push(`platform must be one of the supported platforms, got: ${config.platform}`)
    }
  }

  if (config.shell !== undefined && config.shell.trim().length === 0) {
    errors.push('shell must be a non-empty string')
  }

  if (config.format !== undefined && !['text', 'json', 'shell'].includes(config.format)) {
    errors.push('format must be one of: text, json, shell')
  }

  if (config.logging) {
    if (config.logging.level && !['debug', 'info', 'warn', 'error'].includes(config.logging.level)) {
      errors.push('logging.level must be one of: debug, info, warn, error')
    }
    if (config.verbose && config.logging.level === 'error') {
      warnings.push('verbose is enabled but logging.level is error; verbose output takes precedence')
    }
  }

  if (config.allowUnfree === false) {
    warnings.push('allowUnfree is disabled; unfree dependencies are admitted only by the descriptor\'s predicate')
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  }
}

/**
 * Resolve settings that depend on each other. Verbose output lowers the log level to debug.
 */
export function getEffectiveConfig(config: FleaConfig): FleaConfig {
  if (!config.verbose)
    return config
  return {
    ...config,
    logging: { ...config.logging, level: 'debug' },
  }
}
