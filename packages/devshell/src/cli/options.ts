import type { OutputFormat } from '../types'
import type { CommandContext } from './types'

export function stringOption(ctx: CommandContext, key: string): string | undefined {
  const value = ctx.options[key]
  if (typeof value === 'string' && value.length > 0)
    return value
  return undefined
}

export function booleanOption(ctx: CommandContext, key: string): boolean {
  return ctx.options[key] === true
}

/**
 * Output format for a command: `--json` wins, then `--format`, then the configured format.
 */
export function outputFormat(ctx: CommandContext): OutputFormat {
  if (booleanOption(ctx, 'json'))
    return 'json'
  const requested = stringOption(ctx, 'format')
  if (requested === 'text' || requested === 'json' || requested === 'shell')
    return requested
  if (requested !== undefined)
    throw new Error(`Unknown format: ${requested} (expected text, json or shell)`)
  return ctx.config.format
}
