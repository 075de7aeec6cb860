export type DevShellErrorCode =
  | 'UNSUPPORTED_PLATFORM'
  | 'UNKNOWN_SHELL'
  | 'UNFREE_DEPENDENCY'
  | 'INVALID_FLAKE_REF'
  | 'INVALID_CONFIG'

export class DevShellError extends Error {
  readonly code: DevShellErrorCode
  readonly details?: Record<string, unknown>

  constructor(code: DevShellErrorCode, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = new.target.name
    this.code = code
    this.details = details
  }
}

export class UnsupportedPlatformError extends DevShellError {
  constructor(platform: string, supported: readonly string[]) {
    super('UNSUPPORTED_PLATFORM', `Unsupported platform: ${platform} (supported: ${supported.join(', ')})`, { platform })
  }
}

export class UnknownShellError extends DevShellError {
  constructor(name: string, available: readonly string[]) {
    super('UNKNOWN_SHELL', `Unknown dev shell: ${name} (available: ${available.join(', ')})`, { name })
  }
}

export class UnfreeDependencyError extends DevShellError {
  constructor(attrPath: string) {
    super('UNFREE_DEPENDENCY', `Dependency ${attrPath} has an unfree license and is not allowed by the package set config`, { attrPath })
  }
}

export class InvalidFlakeRefError extends DevShellError {
  constructor(url: string, reason: string) {
    super('INVALID_FLAKE_REF', `Invalid flake reference "${url}": ${reason}`, { url })
  }
}

export class ConfigError extends DevShellError {
  readonly errors: string[]

  constructor(errors: string[]) {
    super('INVALID_CONFIG', `Invalid configuration: ${errors.join('; ')}`)
    this.errors = errors
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
