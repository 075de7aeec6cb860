/* eslint-disable no-console */
import type { Command } from '../cli/types'
import process from 'node:process'
import { outputFormat, stringOption } from '../cli/options'
import { resolveDevShell } from '../descriptor'
import { errorMessage } from '../errors'
import { withUnfreePolicy } from '../package-set'
import { selectPlatform } from '../platform'
import { formatShellSummary, renderJson, renderShellExports } from '../render'

const command: Command = {
  name: 'shell',
  description: 'Resolve the dependencies of a dev shell for a platform',
  run(ctx) {
    try {
      const platform = selectPlatform(ctx.argv[0], ctx.config.platform, ctx.descriptor.systems)
      const name = stringOption(ctx, 'name') ?? ctx.config.shell
      const format = outputFormat(ctx)
      ctx.logger.debug(`Resolving dev shell "${name}" for ${platform}`)

      const shell = resolveDevShell(ctx.descriptor, platform, {
        name,
        packageSet: withUnfreePolicy(ctx.descriptor.packageSet, ctx.config.allowUnfree),
      })
      ctx.logger.info(`Resolved ${shell.buildInputs.length} dependencies for ${platform}`)

      switch (format) {
        case 'json':
          process.stdout.write(renderJson(shell))
          break
        case 'shell':
          process.stdout.write(renderShellExports(shell))
          break
        case 'text':
          console.log(formatShellSummary(shell))
          break
      }
      return 0
    }
    catch (error) {
      console.error(`❌ ${errorMessage(error)}`)
      return 1
    }
  },
}

export default command
