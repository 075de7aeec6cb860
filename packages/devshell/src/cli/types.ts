import type { Logger } from '../logging'
import type { DevShellDescriptor, FleaConfig } from '../types'

export interface CommandContext {
  /** Positional arguments */
  argv: string[]
  /** Structured options parsed by the CLI */
  options: Record<string, unknown>
  env: NodeJS.ProcessEnv
  config: FleaConfig
  descriptor: DevShellDescriptor
  logger: Logger
}

export interface Command {
  name: string
  aliases?: string[]
  description?: string
  run: (ctx: CommandContext) => Promise<number> | number
}

export interface CommandModule { default: Command }
