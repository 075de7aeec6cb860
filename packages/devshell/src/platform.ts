import type { Platform, SupportedArchitecture, SupportedOs } from './types'
import { arch, platform } from 'node:os'
import { UnsupportedPlatformError } from './errors'

export const SUPPORTED_PLATFORMS: readonly Platform[] = [
  'x86_64-linux',
  'aarch64-linux',
  'x86_64-darwin',
  'aarch64-darwin',
]

const OS_ALIASES: Record<string, SupportedOs> = {
  linux: 'linux',
  darwin: 'darwin',
  macos: 'darwin',
  osx: 'darwin',
}

const ARCH_ALIASES: Record<string, SupportedArchitecture> = {
  'x86_64': 'x86_64',
  'x86-64': 'x86_64',
  'x64': 'x86_64',
  'amd64': 'x86_64',
  'aarch64': 'aarch64',
  'arm64': 'aarch64',
}

export function isPlatform(value: string): value is Platform {
  return (SUPPORTED_PLATFORMS as readonly string[]).includes(value)
}

/**
 * Parse a platform identifier. Accepts the canonical `<arch>-<os>` form as
 * well as common aliases (`arm64-macos`, `x64-linux`, `amd64-linux`).
 */
export function parsePlatform(value: string, supported: readonly Platform[] = SUPPORTED_PLATFORMS): Platform {
  const input = value.trim().toLowerCase()
  const separator = input.lastIndexOf('-')
  if (separator <= 0) {
    throw new UnsupportedPlatformError(value, supported)
  }

  const cpu = ARCH_ALIASES[input.slice(0, separator)]
  const os = OS_ALIASES[input.slice(separator + 1)]
  if (!cpu || !os) {
    throw new UnsupportedPlatformError(value, supported)
  }

  const candidate: Platform = `${cpu}-${os}`
  if (!supported.includes(candidate)) {
    throw new UnsupportedPlatformError(value, supported)
  }
  return candidate
}

export function platformOs(target: Platform): SupportedOs {
  return target.endsWith('-darwin') ? 'darwin' : 'linux'
}

export function platformArch(target: Platform): SupportedArchitecture {
  return target.startsWith('aarch64-') ? 'aarch64' : 'x86_64'
}

/**
 * Get the OS family of the running host
 */
export function getHostOs(): SupportedOs {
  const os = platform()
  switch (os) {
    case 'darwin': return 'darwin'
    case 'linux': return 'linux'
    default: throw new UnsupportedPlatformError(os, SUPPORTED_PLATFORMS)
  }
}

/**
 * Get the architecture of the running host
 */
export function getHostArchitecture(): SupportedArchitecture {
  const nodeArch = arch()
  switch (nodeArch) {
    case 'x64': return 'x86_64'
    case 'arm64': return 'aarch64'
    default: throw new UnsupportedPlatformError(nodeArch, SUPPORTED_PLATFORMS)
  }
}

export function detectHostPlatform(): Platform {
  return `${getHostArchitecture()}-${getHostOs()}`
}

/**
 * Pick the platform to resolve for: an explicit argument wins over the
 * configured one, and the host is used when neither is given.
 */
export function selectPlatform(explicit?: string, configured?: string, supported: readonly Platform[] = SUPPORTED_PLATFORMS): Platform {
  const chosen = explicit || configured
  if (chosen)
    return parsePlatform(chosen, supported)

  const host = detectHostPlatform()
  if (!supported.includes(host)) {
    throw new UnsupportedPlatformError(host, supported)
  }
  return host
}
