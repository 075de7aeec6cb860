import type { Command } from '../cli/types'
import process from 'node:process'
import { errorMessage } from '../errors'
import { renderFlakeNix } from '../render'

const command: Command = {
  name: 'flake',
  description: 'Print a flake.nix equivalent to the dev shell descriptor',
  run(ctx) {
    try {
      process.stdout.write(renderFlakeNix(ctx.descriptor))
      return 0
    }
    catch (error) {
      console.error(`❌ ${errorMessage(error)}`)
      return 1
    }
  },
}

export default command
