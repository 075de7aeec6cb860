/* eslint-disable no-console */
import type { Command } from '../cli/types'
import type { Platform } from '../types'
import process from 'node:process'
import { outputFormat } from '../cli/options'
import { errorMessage } from '../errors'
import { detectHostPlatform, platformArch, platformOs } from '../platform'
import { renderJson } from '../render'

function hostPlatform(): Platform | undefined {
  try {
    return detectHostPlatform()
  }
  catch {
    return undefined
  }
}

const command: Command = {
  name: 'platforms',
  description: 'List the platforms the dev shell supports',
  run(ctx) {
    try {
      const host = hostPlatform()
      const format = outputFormat(ctx)
      if (format === 'json') {
        const rows = ctx.descriptor.systems.map(platform => ({
          platform,
          os: platformOs(platform),
          arch: platformArch(platform),
          host: platform === host,
        }))
        process.stdout.write(renderJson(rows))
        return 0
      }

      for (const platform of ctx.descriptor.systems) {
        console.log(platform === host ? `${platform} (host)` : platform)
      }
      if (!host || !ctx.descriptor.systems.includes(host)) {
        ctx.logger.warn('The host platform is not one of the supported platforms')
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
