import type { DevShellDescriptor, EvaluatedDescriptor, PackageSetConfig, Platform, ResolvedDevShell, ShellSpec } from './types'
import { UnknownShellError, UnsupportedPlatformError } from './errors'
import { assertAdmitted, toDependency } from './package-set'
import { platformArch, platformOs } from './platform'

export const DEFAULT_SHELL = 'default'

/**
 * Helper to declare a descriptor with full type checking
 */
export function defineDescriptor(descriptor: DevShellDescriptor): DevShellDescriptor {
  return descriptor
}

export function defineShell(shell: ShellSpec): ShellSpec {
  return shell
}

export function shellNames(descriptor: DevShellDescriptor): string[] {
  return Object.keys(descriptor.devShells)
}

export interface ResolveOptions {
  name?: string
  /** Overrides the descriptor's own package set config */
  packageSet?: PackageSetConfig
}

/**
 * Resolve the dependencies a dev shell provides on one platform.
 *
 * Dependencies without an `only` list are common to every platform; the rest
 * are kept when the platform's OS family is listed. Architecture never takes
 * part in the selection, so both architectures of one OS family resolve to the
 * same set.
 */
export function resolveDevShell(descriptor: DevShellDescriptor, platform: Platform, options: ResolveOptions = {}): ResolvedDevShell {
  const name = options.name ?? DEFAULT_SHELL
  if (!descriptor.systems.includes(platform)) {
    throw new UnsupportedPlatformError(platform, descriptor.systems)
  }

  const shell = Object.hasOwn(descriptor.devShells, name) ? descriptor.devShells[name] : undefined
  if (!shell) {
    throw new UnknownShellError(name, shellNames(descriptor))
  }

  const os = platformOs(platform)
  const packageSet = options.packageSet ?? descriptor.packageSet
  const buildInputs = shell.buildInputs
    .filter(spec => !spec.only || spec.only.includes(os))
    .map(toDependency)

  for (const dependency of buildInputs) {
    assertAdmitted(dependency, packageSet)
  }

  const resolved: ResolvedDevShell = {
    platform,
    os,
    arch: platformArch(platform),
    name,
    buildInputs: Object.freeze(buildInputs),
    frameworks: Object.freeze(buildInputs.filter(dep => dep.category === 'framework')),
    env: Object.freeze({ ...shell.env }),
  }
  if (shell.shellHook !== undefined)
    resolved.shellHook = shell.shellHook

  return Object.freeze(resolved)
}

/**
 * Evaluate `fn` once per platform, keyed by platform in declaration order.
 */
export function eachSystem<T>(systems: readonly Platform[], fn: (platform: Platform) => T): Partial<Record<Platform, T>> {
  const result: Partial<Record<Platform, T>> = {}
  for (const system of systems) {
    result[system] = fn(system)
  }
  return result
}

/**
 * Evaluate every dev shell of a descriptor on every declared system.
 */
export function evaluateDescriptor(descriptor: DevShellDescriptor, options: Omit<ResolveOptions, 'name'> = {}): EvaluatedDescriptor {
  return {
    description: descriptor.description,
    inputs: { ...descriptor.inputs },
    devShells: eachSystem(descriptor.systems, (platform) => {
      const shells: Record<string, ResolvedDevShell> = {}
      for (const name of shellNames(descriptor)) {
        shells[name] = resolveDevShell(descriptor, platform, { ...options, name })
      }
      return shells
    }),
  }
}
