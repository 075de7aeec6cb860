import type { DependencySpec } from './types'
import { defineDescriptor, defineShell } from './descriptor'
import { SUPPORTED_PLATFORMS } from './platform'

function appleFramework(name: string, description: string): DependencySpec {
  return {
    attrPath: `darwin.apple_sdk.frameworks.${name}`,
    category: 'framework',
    description,
    only: ['darwin'],
  }
}

/**
 * Build inputs of the Flea development shell, in declaration order.
 */
export const fleaBuildInputs: DependencySpec[] = [
  { attrPath: 'libiconv', category: 'library', description: 'Character set conversion library' },
  { attrPath: 'llvmPackages_latest.llvm', category: 'toolchain', description: 'LLVM compiler infrastructure' },
  { attrPath: 'llvmPackages_latest.bintools', category: 'toolchain', description: 'LLVM binary utilities' },
  { attrPath: 'llvmPackages_latest.lld', category: 'toolchain', description: 'LLVM linker' },
  appleFramework('Security', 'Security services'),
  appleFramework('Carbon', 'Legacy toolkit compatibility'),
  appleFramework('SystemConfiguration', 'System configuration'),
  appleFramework('AppKit', 'Window and UI services'),
  appleFramework('Foundation', 'Core system services'),
  appleFramework('QuartzCore', 'Compositing and graphics services'),
  appleFramework('ApplicationServices', 'Accessibility and automation services'),
  { attrPath: 'rustc', category: 'language', description: 'Rust compiler' },
  { attrPath: 'cargo', category: 'language', description: 'Rust package manager and build driver' },
  { attrPath: 'pkg-config', category: 'tool', description: 'Build configuration helper' },
  { attrPath: 'openssl', category: 'library', description: 'Cryptography and TLS library' },
]

export const fleaDescriptor = defineDescriptor({
  description: 'Flea - a very experimental Rust GUI',
  inputs: {
    'nixpkgs': 'github:nixos/nixpkgs?ref=nixos-unstable',
    'flake-utils': 'github:numtide/flake-utils',
  },
  systems: [...SUPPORTED_PLATFORMS],
  packageSet: {
    allowUnfree: true,
    allowUnfreePredicate: () => true,
  },
  devShells: {
    default: defineShell({ buildInputs: fleaBuildInputs }),
  },
})
