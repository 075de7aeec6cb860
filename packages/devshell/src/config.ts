import type { FleaConfig, LogLevel, OutputFormat } from './types'
import process from 'node:process'
import { loadConfig } from 'bunfig'
import { getEffectiveConfig, validateConfig } from './config-validation'
import { ConfigError } from './errors'

function isCI(): boolean {
  return process.env.CI === 'true' || process.env.GITHUB_ACTIONS === 'true'
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']
const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'shell']

function envLogLevel(): LogLevel | undefined {
  return LOG_LEVELS.find(level => level === process.env.FLEA_LOG_LEVEL)
}

function envFormat(): OutputFormat | undefined {
  return OUTPUT_FORMATS.find(format => format === process.env.FLEA_FORMAT)
}

export function createDefaultConfig(): FleaConfig {
  return {
    verbose: process.env.FLEA_VERBOSE === 'true' || isCI(),
    platform: process.env.FLEA_PLATFORM || undefined,
    shell: process.env.FLEA_SHELL || 'default',
    format: envFormat() ?? 'text',
    allowUnfree: process.env.FLEA_ALLOW_UNFREE !== 'false',
    logging: {
      level: envLogLevel() ?? (isCI() ? 'info' : 'warn'),
      timestamps: process.env.FLEA_LOG_TIMESTAMPS === 'true',
      json: process.env.FLEA_LOG_JSON === 'true',
    },
  }
}

/**
 * Load `flea.config.ts` (or any config file bunfig finds for the name `flea`)
 * from `cwd`, merged over the defaults. `FLEA_*` variables are read only by
 * `createDefaultConfig`, so a config file takes precedence over them.
 */
export async function loadFleaConfig(cwd: string = process.cwd()): Promise<FleaConfig> {
  const rawConfig = await loadConfig<FleaConfig>({
    name: 'flea',
    cwd,
    defaultConfig: createDefaultConfig(),
    checkEnv: false,
  })

  const validation = validateConfig(rawConfig)
  if (!validation.valid) {
    throw new ConfigError(validation.errors)
  }
  return getEffectiveConfig(rawConfig)
}
