import type { Dependency, DependencySpec, PackageSetConfig } from './types'
import { UnfreeDependencyError } from './errors'

export function toDependency(spec: DependencySpec): Dependency {
  const segments = spec.attrPath.split('.')
  return Object.freeze({
    attrPath: spec.attrPath,
    name: segments[segments.length - 1],
    category: spec.category,
    description: spec.description,
    unfree: spec.unfree === true,
  })
}

/**
 * Whether a dependency may be part of a shell under the given package set config.
 * Free dependencies are always admitted.
 */
export function isAdmitted(dependency: Dependency, packageSet: PackageSetConfig): boolean {
  if (!dependency.unfree)
    return true
  if (packageSet.allowUnfree)
    return true
  return packageSet.allowUnfreePredicate?.(dependency) === true
}

export function assertAdmitted(dependency: Dependency, packageSet: PackageSetConfig): void {
  if (!isAdmitted(dependency, packageSet)) {
    throw new UnfreeDependencyError(dependency.attrPath)
  }
}

/**
 * Apply the user's `allowUnfree` setting on top of a descriptor's package set.
 * The user can only tighten: with `allowUnfree: false` the descriptor's
 * blanket allowance is dropped and only its predicate can admit.
 */
export function withUnfreePolicy(packageSet: PackageSetConfig, allowUnfree: boolean): PackageSetConfig {
  if (allowUnfree)
    return packageSet
  return { ...packageSet, allowUnfree: false }
}
