import { InvalidFlakeRefError } from './errors'

export type ForgeType = 'github' | 'gitlab' | 'sourcehut'

export interface ForgeFlakeRef {
  type: ForgeType
  owner: string
  repo: string
  ref?: string
  rev?: string
  dir?: string
}

export interface PathFlakeRef {
  type: 'path'
  path: string
}

export interface GitFlakeRef {
  type: 'git'
  url: string
  ref?: string
  rev?: string
  dir?: string
}

export interface TarballFlakeRef {
  type: 'tarball'
  url: string
}

export type FlakeRef = ForgeFlakeRef | PathFlakeRef | GitFlakeRef | TarballFlakeRef

const FORGES: readonly ForgeType[] = ['github', 'gitlab', 'sourcehut']
const QUERY_KEYS = ['ref', 'rev', 'dir'] as const
const REV_PATTERN = /^[0-9a-f]{40}$/

function isForge(scheme: string): scheme is ForgeType {
  return (FORGES as readonly string[]).includes(scheme)
}

function splitQuery(url: string, rest: string): { body: string, params: URLSearchParams } {
  const index = rest.indexOf('?')
  const body = index === -1 ? rest : rest.slice(0, index)
  const params = new URLSearchParams(index === -1 ? '' : rest.slice(index + 1))
  for (const key of params.keys()) {
    if (!(QUERY_KEYS as readonly string[]).includes(key)) {
      throw new InvalidFlakeRefError(url, `unsupported parameter "${key}"`)
    }
  }
  return { body, params }
}

function pickQuery(params: URLSearchParams): { ref?: string, rev?: string, dir?: string } {
  const picked: { ref?: string, rev?: string, dir?: string } = {}
  for (const key of QUERY_KEYS) {
    const value = params.get(key)
    if (value)
      picked[key] = value
  }
  return picked
}

function parseForge(url: string, type: ForgeType, rest: string): ForgeFlakeRef {
  const { body, params } = splitQuery(url, rest)
  const segments = body.split('/')
  if (segments.length < 2 || segments.length > 3 || segments.some(s => s.length === 0)) {
    throw new InvalidFlakeRefError(url, 'expected <owner>/<repo>[/<ref-or-rev>]')
  }

  const [owner, repo, third] = segments
  const query = pickQuery(params)
  const parsed: ForgeFlakeRef = { type, owner, repo, ...query }

  if (third !== undefined) {
    if (query.ref || query.rev) {
      throw new InvalidFlakeRefError(url, 'ref or rev given both in the path and as a parameter')
    }
    if (REV_PATTERN.test(third))
      parsed.rev = third
    else
      parsed.ref = third
  }

  if (parsed.ref && parsed.rev) {
    throw new InvalidFlakeRefError(url, 'ref and rev are mutually exclusive for forge references')
  }
  return parsed
}

/**
 * Parse a flake input reference such as `github:nixos/nixpkgs?ref=nixos-unstable`.
 */
export function parseFlakeRef(url: string): FlakeRef {
  const colon = url.indexOf(':')
  if (colon <= 0) {
    throw new InvalidFlakeRefError(url, 'missing scheme')
  }

  const scheme = url.slice(0, colon)
  const rest = url.slice(colon + 1)

  if (isForge(scheme))
    return parseForge(url, scheme, rest)

  if (scheme === 'path') {
    if (!rest)
      throw new InvalidFlakeRefError(url, 'empty path')
    return { type: 'path', path: rest }
  }

  if (scheme.startsWith('git+')) {
    const transport = scheme.slice('git+'.length)
    if (!['https', 'http', 'ssh', 'file'].includes(transport)) {
      throw new InvalidFlakeRefError(url, `unsupported git transport "${transport}"`)
    }
    const { body, params } = splitQuery(url, rest)
    if (!body.startsWith('//') && transport !== 'file') {
      throw new InvalidFlakeRefError(url, 'expected an absolute URL')
    }
    return { type: 'git', url: `${transport}:${body}`, ...pickQuery(params) }
  }

  if (scheme === 'https' || scheme === 'http') {
    if (!rest.startsWith('//'))
      throw new InvalidFlakeRefError(url, 'expected an absolute URL')
    return { type: 'tarball', url }
  }

  throw new InvalidFlakeRefError(url, `unknown scheme "${scheme}"`)
}

function formatQuery(query: { ref?: string, rev?: string, dir?: string }): string {
  const params = new URLSearchParams()
  for (const key of QUERY_KEYS) {
    const value = query[key]
    if (value)
      params.set(key, value)
  }
  const encoded = params.toString()
  return encoded ? `?${encoded}` : ''
}

/**
 * Canonical URL of a parsed reference. Parameters are written as `ref`, `rev`, `dir`.
 */
export function formatFlakeRef(ref: FlakeRef): string {
  switch (ref.type) {
    case 'github':
    case 'gitlab':
    case 'sourcehut':
      return `${ref.type}:${ref.owner}/${ref.repo}${formatQuery(ref)}`
    case 'path':
      return `path:${ref.path}`
    case 'git':
      return `git+${ref.url}${formatQuery(ref)}`
    case 'tarball':
      return ref.url
  }
}

/**
 * One-line human description of a reference, used by `flea inputs`.
 */
export function describeFlakeRef(ref: FlakeRef): string {
  switch (ref.type) {
    case 'github':
    case 'gitlab':
    case 'sourcehut': {
      const pin = ref.rev ? `@ ${ref.rev.slice(0, 7)}` : `@ ${ref.ref ?? 'default branch'}`
      return `${ref.type} ${ref.owner}/${ref.repo} ${pin}${ref.dir ? ` (dir ${ref.dir})` : ''}`
    }
    case 'path':
      return `local path ${ref.path}`
    case 'git':
      return `git ${ref.url}${ref.ref ? ` @ ${ref.ref}` : ''}${ref.rev ? ` @ ${ref.rev.slice(0, 7)}` : ''}`
    case 'tarball':
      return `tarball ${ref.url}`
  }
}
