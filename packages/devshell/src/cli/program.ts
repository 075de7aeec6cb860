import process from 'node:process'
import { CAC } from 'cac'

export type RunCommand = (name: string, argv: string[], options: Record<string, unknown>) => Promise<void>

/**
 * Build the `flea` command line. Matched commands are handed to `runCommand`.
 */
export function createProgram(version: string, runCommand: RunCommand): CAC {
  const cli = new CAC('flea')

  cli.version(version)
  cli.help()

  cli
    .command('platforms', 'List the platforms the dev shell supports')
    .option('--json', 'Output as JSON')
    .example('flea platforms')
    .action(async (options: Record<string, unknown>) => {
      await runCommand('platforms', [], options)
    })

  cli
    .command('shell [platform]', 'Resolve the dev shell dependencies for a platform (defaults to the host)')
    .option('--name <name>', 'Dev shell to resolve')
    .option('--format <format>', 'Output format: text, json or shell')
    .option('--json', 'Output as JSON')
    .example('flea shell aarch64-darwin')
    .example('eval "$(flea shell --format shell)"')
    .action(async (platform: string | undefined, options: Record<string, unknown>) => {
      await runCommand('shell', platform ? [platform] : [], options)
    })

  cli
    .command('inputs', 'List the inputs the dev shell is built from')
    .option('--json', 'Output as JSON')
    .action(async (options: Record<string, unknown>) => {
      await runCommand('inputs', [], options)
    })

  cli
    .command('flake', 'Print a flake.nix equivalent to the dev shell descriptor')
    .example('flea flake > flake.nix')
    .action(async (options: Record<string, unknown>) => {
      await runCommand('flake', [], options)
    })

  cli
    .command('check', 'Verify the dev shell resolves consistently on every platform')
    .option('--name <name>', 'Dev shell to check')
    .option('--json', 'Output as JSON')
    .action(async (options: Record<string, unknown>) => {
      await runCommand('check', [], options)
    })

  cli
    .command('config', 'Show the effective flea configuration')
    .action(async (options: Record<string, unknown>) => {
      await runCommand('config', [], options)
    })

  cli.on('command:*', () => {
    console.error(`❌ Unknown command: ${cli.args.join(' ')}`)
    console.error('Run `flea --help` to list the available commands')
    process.exitCode = 1
  })

  return cli
}
