#!/usr/bin/env tsx
import type { CommandContext } from '../src/cli/types'
import type { FleaConfig } from '../src/types'
import fs from 'node:fs'
import process from 'node:process'
import { fleaDescriptor } from '../src/catalog'
import { createProgram } from '../src/cli/program'
import { resolveCommand } from '../src/commands'
import { loadFleaConfig } from '../src/config'
import { errorMessage } from '../src/errors'
import { createLogger } from '../src/logging'

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8'))
    if (raw && typeof raw === 'object' && 'version' in raw && typeof raw.version === 'string')
      return raw.version
  }
  catch {
    return '0.0.0'
  }
  return '0.0.0'
}

async function runCommand(name: string, argv: string[], options: Record<string, unknown>): Promise<void> {
  let config: FleaConfig
  try {
    config = await loadFleaConfig(process.cwd())
  }
  catch (error) {
    console.error(`❌ Failed to load configuration: ${errorMessage(error)}`)
    process.exit(1)
  }

  const cmd = await resolveCommand(name)
  if (!cmd) {
    console.error(`❌ Unknown command: ${name}`)
    process.exit(1)
  }

  const ctx: CommandContext = {
    argv,
    options,
    env: process.env,
    config,
    descriptor: fleaDescriptor,
    logger: createLogger(config.logging),
  }
  const code = await cmd.run(ctx)
  if (code !== 0)
    process.exit(code)
}

const cli = createProgram(readVersion(), runCommand)

cli.parse(process.argv, { run: false })

try {
  await cli.runMatchedCommand()
}
catch (error) {
  console.error(`❌ ${errorMessage(error)}`)
  process.exit(1)
}
