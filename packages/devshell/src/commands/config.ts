import type { Command } from '../cli/types'
import process from 'node:process'
import { validateConfig } from '../config-validation'
import { renderJson } from '../render'

const command: Command = {
  name: 'config',
  description: 'Show the effective flea configuration',
  run(ctx) {
    const validation = validateConfig(ctx.config)
    for (const warning of validation.warnings) {
      ctx.logger.warn(warning)
    }
    process.stdout.write(renderJson(ctx.config))
    return 0
  },
}

export default command
