import { describe, expect, it } from 'vitest'
import { UnfreeDependencyError } from '../src/errors'
import { assertAdmitted, isAdmitted, toDependency, withUnfreePolicy } from '../src/package-set'

const free = toDependency({ attrPath: 'pkgs.zlib', category: 'library', description: 'Compression' })
const unfree = toDependency({ attrPath: 'steam-run', category: 'tool', description: 'FHS runner', unfree: true })

describe('package set', () => {
  it('names dependencies after the last attribute segment', () => {
    expect(free.name).toBe('zlib')
    expect(free.unfree).toBe(false)
    expect(unfree.unfree).toBe(true)
  })

  it('always admits free dependencies', () => {
    expect(isAdmitted(free, { allowUnfree: false })).toBe(true)
  })

  it('admits unfree dependencies through the flag or the predicate', () => {
    expect(isAdmitted(unfree, { allowUnfree: false })).toBe(false)
    expect(isAdmitted(unfree, { allowUnfree: true })).toBe(true)
    expect(isAdmitted(unfree, { allowUnfree: false, allowUnfreePredicate: dep => dep.name === 'steam-run' })).toBe(true)
    expect(isAdmitted(unfree, { allowUnfree: false, allowUnfreePredicate: () => false })).toBe(false)
  })

  it('throws for rejected dependencies', () => {
    expect(() => assertAdmitted(unfree, { allowUnfree: false })).toThrow(UnfreeDependencyError)
    expect(() => assertAdmitted(free, { allowUnfree: false })).not.toThrow()
  })

  it('lets the user tighten but not loosen the policy', () => {
    const predicate = () => true
    const base = { allowUnfree: true, allowUnfreePredicate: predicate }
    expect(withUnfreePolicy(base, true)).toBe(base)
    expect(withUnfreePolicy(base, false)).toEqual({ allowUnfree: false, allowUnfreePredicate: predicate })
    expect(withUnfreePolicy({ allowUnfree: false }, true)).toEqual({ allowUnfree: false })
  })
})
