import type { DependencyCategory, DependencySpec, DevShellDescriptor, ResolvedDevShell, SupportedOs } from './types'
import { toDependency } from './package-set'

const CATEGORY_ORDER: readonly DependencyCategory[] = ['toolchain', 'language', 'library', 'tool', 'framework']

const CATEGORY_TITLES: Record<DependencyCategory, string> = {
  toolchain: 'Toolchain',
  language: 'Language',
  library: 'Libraries',
  tool: 'Tools',
  framework: 'Platform frameworks',
}

/**
 * Quote a value for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

export function formatShellSummary(shell: ResolvedDevShell): string {
  const lines: string[] = []
  lines.push(`🐚 Dev shell "${shell.name}" for ${shell.platform}`)
  lines.push('='.repeat(50))

  for (const category of CATEGORY_ORDER) {
    const deps = shell.buildInputs.filter(dep => dep.category === category)
    if (deps.length === 0)
      continue

    lines.push('')
    lines.push(`${CATEGORY_TITLES[category]}:`)
    const width = Math.max(...deps.map(dep => dep.attrPath.length))
    for (const dep of deps) {
      lines.push(`  • ${dep.attrPath.padEnd(width)}  ${dep.description}`)
    }
  }

  lines.push('')
  lines.push(`📦 ${shell.buildInputs.length} dependencies (${shell.frameworks.length} platform frameworks)`)
  return lines.join('\n')
}

/**
 * Render the environment a shell exposes as POSIX `export` statements.
 */
export function renderShellExports(shell: ResolvedDevShell): string {
  const lines: string[] = []
  lines.push(`export FLEA_PLATFORM=${shellQuote(shell.platform)}`)
  lines.push(`export FLEA_SHELL=${shellQuote(shell.name)}`)
  lines.push(`export FLEA_BUILD_INPUTS=${shellQuote(shell.buildInputs.map(dep => dep.attrPath).join(' '))}`)
  if (shell.frameworks.length > 0) {
    lines.push(`export FLEA_FRAMEWORKS=${shellQuote(shell.frameworks.map(dep => dep.name).join(' '))}`)
  }
  for (const key of Object.keys(shell.env).sort()) {
    lines.push(`export ${key}=${shellQuote(shell.env[key])}`)
  }
  if (shell.shellHook) {
    lines.push(shell.shellHook)
  }
  return `${lines.join('\n')}\n`
}

export function renderJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`
}

function nixString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\$\{/g, '\\${')}"`
}

function nixAttrName(name: string): string {
  return /^[a-z_][\w'-]*$/i.test(name) ? name : nixString(name)
}

const OS_ORDER: readonly SupportedOs[] = ['darwin', 'linux']

const OS_PREDICATES: Record<SupportedOs, string> = {
  darwin: 'pkgs.stdenv.isDarwin',
  linux: 'pkgs.stdenv.isLinux',
}

function renderBuildInputs(specs: DependencySpec[], indent: string): string[] {
  const lines: string[] = []
  const common = specs.filter(spec => !spec.only)
  lines.push(`${indent}buildInputs = (with pkgs; [`)
  for (const spec of common) {
    lines.push(`${indent}  ${spec.attrPath}`)
  }
  lines.push(`${indent}])`)

  for (const os of OS_ORDER) {
    const restricted = specs.filter(spec => spec.only?.includes(os))
    if (restricted.length === 0)
      continue
    lines.push(`${indent}++ pkgs.lib.optionals ${OS_PREDICATES[os]} (with pkgs; [`)
    for (const spec of restricted) {
      lines.push(`${indent}  ${spec.attrPath}`)
    }
    lines.push(`${indent}])`)
  }
  lines[lines.length - 1] += ';'
  return lines
}

// A predicate is a function, so it is tested against every declared dependency
// and written out as the list of names it admits.
function renderUnfreePredicate(descriptor: DevShellDescriptor): string | undefined {
  const predicate = descriptor.packageSet.allowUnfreePredicate
  if (!predicate)
    return undefined

  const admitted = new Set<string>()
  let rejectsAny = false
  for (const shell of Object.values(descriptor.devShells)) {
    for (const spec of shell.buildInputs) {
      const dependency = toDependency({ ...spec, unfree: true })
      if (predicate(dependency))
        admitted.add(dependency.name)
      else
        rejectsAny = true
    }
  }

  if (!rejectsAny)
    return '(_: true)'
  return `(pkg: builtins.elem (nixpkgs.lib.getName pkg) [ ${[...admitted].map(nixString).join(' ')} ])`
}

/**
 * Regenerate a `flake.nix` equivalent to the descriptor.
 */
export function renderFlakeNix(descriptor: DevShellDescriptor): string {
  const inputNames = Object.keys(descriptor.inputs)
  const unfreePredicate = renderUnfreePredicate(descriptor)
  const lines: string[] = []

  lines.push('{')
  lines.push(`  description = ${nixString(descriptor.description)};`)
  lines.push('')
  lines.push('  inputs = {')
  for (const name of inputNames) {
    lines.push(`    ${nixAttrName(name)}.url = ${nixString(descriptor.inputs[name])};`)
  }
  lines.push('  };')
  lines.push('')
  lines.push(`  outputs = { self, ${inputNames.map(nixAttrName).join(', ')} }:`)
  lines.push('    let')
  lines.push(`      systems = [ ${descriptor.systems.map(nixString).join(' ')} ];`)
  lines.push('    in')
  lines.push('    flake-utils.lib.eachSystem systems (system:')
  lines.push('      let')
  lines.push('        pkgs = import nixpkgs {')
  lines.push('          inherit system;')
  lines.push('          config = {')
  lines.push(`            allowUnfree = ${descriptor.packageSet.allowUnfree};`)
  if (unfreePredicate)
    lines.push(`            allowUnfreePredicate = ${unfreePredicate};`)
  lines.push('          };')
  lines.push('        };')
  lines.push('      in')
  lines.push('      {')

  for (const [name, shell] of Object.entries(descriptor.devShells)) {
    lines.push(`        devShells.${nixAttrName(name)} = pkgs.mkShell {`)
    lines.push(...renderBuildInputs(shell.buildInputs, '          '))
    for (const key of Object.keys(shell.env ?? {}).sort()) {
      lines.push(`          ${nixAttrName(key)} = ${nixString(shell.env?.[key] ?? '')};`)
    }
    if (shell.shellHook) {
      lines.push(`          shellHook = ${nixString(shell.shellHook)};`)
    }
    lines.push('        };')
  }

  lines.push('      });')
  lines.push('}')
  return `${lines.join('\n')}\n`
}
