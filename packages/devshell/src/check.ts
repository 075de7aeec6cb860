import type { ResolveOptions } from './descriptor'
import type { DevShellDescriptor, Platform, ResolvedDevShell, SupportedOs } from './types'
import { resolveDevShell } from './descriptor'
import { errorMessage } from './errors'
import { platformOs } from './platform'

export interface CheckResult {
  /** Platform or OS family the check ran against */
  group: string
  name: string
  status: 'pass' | 'warn' | 'fail'
  message: string
  suggestion?: string
}

export interface CheckReport {
  overall: 'healthy' | 'issues' | 'critical'
  results: CheckResult[]
  summary: {
    passed: number
    warnings: number
    failed: number
  }
}

type Resolution = { ok: true, shell: ResolvedDevShell } | { ok: false, error: string }

function tryResolve(descriptor: DevShellDescriptor, platform: Platform, options: ResolveOptions): Resolution {
  try {
    return { ok: true, shell: resolveDevShell(descriptor, platform, options) }
  }
  catch (error) {
    return { ok: false, error: errorMessage(error) }
  }
}

function attrPaths(shell: ResolvedDevShell): string[] {
  return shell.buildInputs.map(dep => dep.attrPath)
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i])
}

function checkNonEmpty(platform: Platform, resolution: Resolution): CheckResult {
  const base = { group: platform, name: 'Resolves' }
  if (!resolution.ok) {
    return { ...base, status: 'fail', message: resolution.error }
  }
  if (resolution.shell.buildInputs.length === 0) {
    return { ...base, status: 'fail', message: 'Dependency set is empty', suggestion: 'Declare at least one common build input' }
  }
  return { ...base, status: 'pass', message: `${resolution.shell.buildInputs.length} dependencies` }
}

function checkFrameworks(platform: Platform, resolution: Resolution, declared: readonly string[]): CheckResult {
  const base = { group: platform, name: 'Platform frameworks' }
  if (!resolution.ok) {
    return { ...base, status: 'fail', message: resolution.error }
  }

  const present = resolution.shell.frameworks.map(dep => dep.attrPath)
  if (platformOs(platform) !== 'darwin') {
    return present.length === 0
      ? { ...base, status: 'pass', message: 'No platform frameworks selected' }
      : { ...base, status: 'fail', message: `Unexpected frameworks: ${present.join(', ')}`, suggestion: 'Restrict framework dependencies with only: [\'darwin\']' }
  }

  if (declared.length === 0) {
    return { ...base, status: 'warn', message: 'No platform frameworks declared' }
  }
  const missing = declared.filter(attrPath => !present.includes(attrPath))
  return missing.length === 0
    ? { ...base, status: 'pass', message: `${present.length} frameworks selected` }
    : { ...base, status: 'fail', message: `Missing frameworks: ${missing.join(', ')}` }
}

function checkArchitectureInvariance(os: SupportedOs, platforms: Platform[], resolutions: Map<Platform, Resolution>): CheckResult {
  const base = { group: `${os} family`, name: 'Architecture invariance' }
  const shells: ResolvedDevShell[] = []
  for (const platform of platforms) {
    const resolution = resolutions.get(platform)
    if (resolution?.ok)
      shells.push(resolution.shell)
  }

  if (shells.length < 2) {
    return { ...base, status: 'pass', message: `Only ${shells.length} resolvable ${os} platform(s) declared` }
  }

  const [first, ...rest] = shells
  const differing = rest.filter(shell => !sameList(attrPaths(first), attrPaths(shell)))
  return differing.length === 0
    ? { ...base, status: 'pass', message: `Identical sets on ${shells.map(s => s.platform).join(', ')}` }
    : { ...base, status: 'fail', message: `${differing.map(s => s.platform).join(', ')} differ from ${first.platform}` }
}

function checkDeterminism(platform: Platform, resolution: Resolution, descriptor: DevShellDescriptor, options: ResolveOptions): CheckResult {
  const base = { group: platform, name: 'Deterministic' }
  if (!resolution.ok) {
    return { ...base, status: 'fail', message: resolution.error }
  }
  const again = tryResolve(descriptor, platform, options)
  if (!again.ok || JSON.stringify(again.shell) !== JSON.stringify(resolution.shell)) {
    return { ...base, status: 'fail', message: 'A second evaluation produced a different dependency set' }
  }
  return { ...base, status: 'pass', message: 'Repeated evaluation yields the same set' }
}

/**
 * Evaluate the structural properties every descriptor must hold.
 */
export function runDescriptorChecks(descriptor: DevShellDescriptor, options: ResolveOptions = {}): CheckReport {
  const results: CheckResult[] = []
  const resolutions = new Map<Platform, Resolution>()
  for (const platform of descriptor.systems) {
    resolutions.set(platform, tryResolve(descriptor, platform, options))
  }

  const shellName = options.name ?? 'default'
  const shell = Object.hasOwn(descriptor.devShells, shellName) ? descriptor.devShells[shellName] : undefined
  const declaredFrameworks = (shell?.buildInputs ?? [])
    .filter(spec => spec.category === 'framework' && (!spec.only || spec.only.includes('darwin')))
    .map(spec => spec.attrPath)

  for (const [platform, resolution] of resolutions) {
    results.push(checkNonEmpty(platform, resolution))
    results.push(checkFrameworks(platform, resolution, declaredFrameworks))
    results.push(checkDeterminism(platform, resolution, descriptor, options))
  }

  for (const os of ['linux', 'darwin'] as const) {
    const platforms = descriptor.systems.filter(platform => platformOs(platform) === os)
    if (platforms.length > 0)
      results.push(checkArchitectureInvariance(os, platforms, resolutions))
  }

  const summary = {
    passed: results.filter(r => r.status === 'pass').length,
    warnings: results.filter(r => r.status === 'warn').length,
    failed: results.filter(r => r.status === 'fail').length,
  }

  let overall: CheckReport['overall'] = 'healthy'
  if (summary.failed > 0)
    overall = 'critical'
  else if (summary.warnings > 0)
    overall = 'issues'

  return { overall, results, summary }
}

const STATUS_EMOJI: Record<CheckResult['status'], string> = {
  pass: '✅',
  warn: '⚠️',
  fail: '❌',
}

const OVERALL_MESSAGE: Record<CheckReport['overall'], string> = {
  healthy: '✅ All properties hold',
  issues: '⚠️  Some issues detected',
  critical: '❌ Property violations found',
}

function groupResults(results: CheckResult[]): Map<string, CheckResult[]> {
  const groups = new Map<string, CheckResult[]>()
  for (const result of results) {
    const group = groups.get(result.group)
    if (group)
      group.push(result)
    else
      groups.set(result.group, [result])
  }
  return groups
}

/**
 * Render a report with one section per platform, followed by the OS family checks.
 */
export function formatCheckReport(report: CheckReport): string {
  const lines: string[] = [`🩺 Dev shell check: ${OVERALL_MESSAGE[report.overall]}`]

  for (const [group, results] of groupResults(report.results)) {
    lines.push('')
    lines.push(group)
    for (const result of results) {
      lines.push(`  ${STATUS_EMOJI[result.status]} ${result.name}: ${result.message}`)
      if (result.suggestion)
        lines.push(`     💡 ${result.suggestion}`)
    }
  }

  const { passed, warnings, failed } = report.summary
  lines.push('')
  lines.push(`${passed} passed, ${warnings} warnings, ${failed} failed`)
  return lines.join('\n')
}
