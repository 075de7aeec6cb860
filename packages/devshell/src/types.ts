export type SupportedOs = 'linux' | 'darwin'
export type SupportedArchitecture = 'x86_64' | 'aarch64'

/**
 * A platform identifier in `<arch>-<os>` form, e.g. `aarch64-darwin`.
 */
export type Platform = `${SupportedArchitecture}-${SupportedOs}`

export type DependencyCategory = 'toolchain' | 'language' | 'library' | 'tool' | 'framework'

/**
 * A dependency as it is declared in a shell, before resolution.
 */
export interface DependencySpec {
  /** Attribute path in the package set, e.g. `llvmPackages_latest.lld` */
  attrPath: string
  category: DependencyCategory
  description: string
  /** OS families this dependency is restricted to. Omitted means every platform. */
  only?: SupportedOs[]
  unfree?: boolean
}

export interface Dependency {
  attrPath: string
  /** Last segment of the attribute path */
  name: string
  category: DependencyCategory
  description: string
  unfree: boolean
}

export interface PackageSetConfig {
  allowUnfree: boolean
  allowUnfreePredicate?: (dependency: Dependency) => boolean
}

export interface ShellSpec {
  buildInputs: DependencySpec[]
  env?: Record<string, string>
  shellHook?: string
}

export interface DevShellDescriptor {
  description: string
  /** Input name to flake reference URL */
  inputs: Record<string, string>
  systems: Platform[]
  packageSet: PackageSetConfig
  devShells: Record<string, ShellSpec>
}

export interface ResolvedDevShell {
  platform: Platform
  os: SupportedOs
  arch: SupportedArchitecture
  name: string
  buildInputs: readonly Dependency[]
  frameworks: readonly Dependency[]
  env: Readonly<Record<string, string>>
  shellHook?: string
}

export interface EvaluatedDescriptor {
  description: string
  inputs: Record<string, string>
  devShells: Partial<Record<Platform, Record<string, ResolvedDevShell>>>
}

export type OutputFormat = 'text' | 'json' | 'shell'
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LoggingConfig {
  level: LogLevel
  timestamps: boolean
  json: boolean
}

/**
 * Configuration for the flea CLI
 */
export interface FleaConfig {
  /** Whether to show verbose output */
  verbose: boolean
  /** Target platform; detected from the host when unset */
  platform?: string
  /** Shell to resolve when none is named */
  shell: string
  format: OutputFormat
  /** When false, only the descriptor's unfree predicate can admit unfree dependencies */
  allowUnfree: boolean
  logging: LoggingConfig
}
