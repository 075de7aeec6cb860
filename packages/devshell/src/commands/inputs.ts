/* eslint-disable no-console */
import type { Command } from '../cli/types'
import process from 'node:process'
import { outputFormat } from '../cli/options'
import { errorMessage } from '../errors'
import { describeFlakeRef, parseFlakeRef } from '../flake-ref'
import { renderJson } from '../render'

const command: Command = {
  name: 'inputs',
  description: 'List the inputs the dev shell is built from',
  run(ctx) {
    try {
      const entries = Object.entries(ctx.descriptor.inputs).map(([name, url]) => ({ name, url, ref: parseFlakeRef(url) }))
      if (outputFormat(ctx) === 'json') {
        process.stdout.write(renderJson(entries))
        return 0
      }

      const width = Math.max(0, ...entries.map(entry => entry.name.length))
      for (const entry of entries) {
        console.log(`${entry.name.padEnd(width)}  ${entry.url}`)
        console.log(`${' '.repeat(width)}  ↳ ${describeFlakeRef(entry.ref)}`)
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
