import { describe, expect, it } from 'vitest'
import { InvalidFlakeRefError } from '../src/errors'
import { describeFlakeRef, formatFlakeRef, parseFlakeRef } from '../src/flake-ref'

describe('parseFlakeRef', () => {
  it('parses forge references with a ref parameter', () => {
    expect(parseFlakeRef('github:nixos/nixpkgs?ref=nixos-unstable')).toEqual({
      type: 'github',
      owner: 'nixos',
      repo: 'nixpkgs',
      ref: 'nixos-unstable',
    })
  })

  it('parses forge references without parameters', () => {
    expect(parseFlakeRef('github:numtide/flake-utils')).toEqual({ type: 'github', owner: 'numtide', repo: 'flake-utils' })
  })

  it('reads a ref or a rev from the third path segment', () => {
    expect(parseFlakeRef('gitlab:group/project/release-1')).toEqual({ type: 'gitlab', owner: 'group', repo: 'project', ref: 'release-1' })
    const rev = 'a'.repeat(40)
    expect(parseFlakeRef(`sourcehut:~user/repo/${rev}`)).toEqual({ type: 'sourcehut', owner: '~user', repo: 'repo', rev })
  })

  it('parses path, git and tarball references', () => {
    expect(parseFlakeRef('path:./vendor/shell')).toEqual({ type: 'path', path: './vendor/shell' })
    expect(parseFlakeRef('git+https://example.com/flea.git?ref=main&dir=nix')).toEqual({
      type: 'git',
      url: 'https://example.com/flea.git',
      ref: 'main',
      dir: 'nix',
    })
    expect(parseFlakeRef('https://example.com/flea.tar.gz')).toEqual({ type: 'tarball', url: 'https://example.com/flea.tar.gz' })
  })

  it('rejects malformed references', () => {
    expect(() => parseFlakeRef('nixpkgs')).toThrow(InvalidFlakeRefError)
    expect(() => parseFlakeRef('github:nixos')).toThrow('expected <owner>/<repo>[/<ref-or-rev>]')
    expect(() => parseFlakeRef('github:nixos/nixpkgs?branch=main')).toThrow('unsupported parameter "branch"')
    expect(() => parseFlakeRef('github:nixos/nixpkgs/main?ref=dev')).toThrow(InvalidFlakeRefError)
    expect(() => parseFlakeRef('github:nixos/nixpkgs?ref=main&rev=abc')).toThrow('mutually exclusive')
    expect(() => parseFlakeRef('ftp://example.com/x')).toThrow('unknown scheme "ftp"')
    expect(() => parseFlakeRef('git+gopher://example.com/x')).toThrow('unsupported git transport "gopher"')
    expect(() => parseFlakeRef('path:')).toThrow('empty path')
  })

  it('reports a machine-readable code', () => {
    try {
      parseFlakeRef('nixpkgs')
      expect.unreachable()
    }
    catch (error) {
      expect(error).toBeInstanceOf(InvalidFlakeRefError)
      if (error instanceof InvalidFlakeRefError)
        expect(error.code).toBe('INVALID_FLAKE_REF')
    }
  })
})

describe('formatFlakeRef', () => {
  it('writes canonical urls', () => {
    expect(formatFlakeRef({ type: 'github', owner: 'nixos', repo: 'nixpkgs', ref: 'nixos-unstable' })).toBe('github:nixos/nixpkgs?ref=nixos-unstable')
    expect(formatFlakeRef({ type: 'git', url: 'ssh://git@example.com/flea', dir: 'nix', ref: 'main' })).toBe('git+ssh://git@example.com/flea?ref=main&dir=nix')
    expect(formatFlakeRef({ type: 'path', path: '/src/flea' })).toBe('path:/src/flea')
  })

  it('moves a path ref into the query string', () => {
    expect(formatFlakeRef(parseFlakeRef('github:nixos/nixpkgs/nixos-24.05'))).toBe('github:nixos/nixpkgs?ref=nixos-24.05')
  })
})

describe('describeFlakeRef', () => {
  it('summarises references', () => {
    expect(describeFlakeRef(parseFlakeRef('github:nixos/nixpkgs?ref=nixos-unstable'))).toBe('github nixos/nixpkgs @ nixos-unstable')
    expect(describeFlakeRef(parseFlakeRef('github:numtide/flake-utils'))).toBe('github numtide/flake-utils @ default branch')
    expect(describeFlakeRef(parseFlakeRef(`github:o/r?rev=${'b'.repeat(40)}&dir=sub`))).toBe('github o/r @ bbbbbbb (dir sub)')
    expect(describeFlakeRef({ type: 'tarball', url: 'https://example.com/a.tar.gz' })).toBe('tarball https://example.com/a.tar.gz')
  })
})
