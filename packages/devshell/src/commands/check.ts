/* eslint-disable no-console */
import type { Command } from '../cli/types'
import process from 'node:process'
import { formatCheckReport, runDescriptorChecks } from '../check'
import { outputFormat, stringOption } from '../cli/options'
import { errorMessage } from '../errors'
import { withUnfreePolicy } from '../package-set'
import { renderJson } from '../render'

const command: Command = {
  name: 'check',
  description: 'Verify the dev shell resolves consistently on every platform',
  run(ctx) {
    try {
      const report = runDescriptorChecks(ctx.descriptor, {
        name: stringOption(ctx, 'name') ?? ctx.config.shell,
        packageSet: withUnfreePolicy(ctx.descriptor.packageSet, ctx.config.allowUnfree),
      })
      if (outputFormat(ctx) === 'json')
        process.stdout.write(renderJson(report))
      else
        console.log(formatCheckReport(report))
      return report.overall === 'healthy' ? 0 : 1
    }
    catch (error) {
      console.error(`❌ Failed to run checks: ${errorMessage(error)}`)
      return 1
    }
  },
}

export default command
