import type { Command } from '../cli/types'

// Lazy command resolvers. Add new commands here.
const registry: Record<string, () => Promise<Command>> = {
  platforms: async () => (await import('./platforms')).default,
  shell: async () => (await import('./shell')).default,
  inputs: async () => (await import('./inputs')).default,
  flake: async () => (await import('./flake')).default,
  check: async () => (await import('./check')).default,
  config: async () => (await import('./config')).default,
}

export async function resolveCommand(name?: string): Promise<Command | undefined> {
  if (!name)
    return undefined
  const loader = Object.hasOwn(registry, name) ? registry[name] : undefined
  if (!loader)
    return undefined
  return loader()
}

export function listCommands(): string[] {
  return Object.keys(registry).sort()
}
