import { describe, test, expect } from 'vitest'
import { bracketProblems, resolveBracket } from './brackets.ts'

const table = [
  { upTo: 100, name: 'small' },
  { upTo: 1_000, name: 'medium' },
  { upTo: null, name: 'large' },
]

describe('resolveBracket', () => {
  test('a value exactly on a bound selects that bound, not the next', () => {
    expect(resolveBracket(table, 100).name).toBe('small')
    expect(resolveBracket(table, 1_000).name).toBe('medium')
  })

  test('one past a bound moves to the next entry', () => {
    expect(resolveBracket(table, 101).name).toBe('medium')
    expect(resolveBracket(table, 1_001).name).toBe('large')
  })

  test('zero lands in the first entry', () => {
    expect(resolveBracket(table, 0).name).toBe('small')
  })

  test('falls back to the last entry when every bound is exceeded', () => {
    const bounded = [{ upTo: 10, name: 'a' }, { upTo: 20, name: 'b' }]
    expect(resolveBracket(bounded, 50).name).toBe('b')
  })

  test('throws on an empty table', () => {
    expect(() => resolveBracket([], 5)).toThrow('empty table')
  })
})

describe('bracketProblems', () => {
  test('accepts a sorted table', () => {
    expect(bracketProblems(table)).toEqual([])
  })

  test('rejects an empty table', () => {
    expect(bracketProblems([])).toEqual(['must have at least one entry'])
  })

  test('rejects an unbounded entry that is not last', () => {
    expect(bracketProblems([{ upTo: null }, { upTo: 5 }])).toEqual([
      'entry 0: only the last entry may be unbounded',
    ])
  })

  test('rejects bounds that do not strictly increase', () => {
    expect(bracketProblems([{ upTo: 10 }, { upTo: 10 }])).toEqual([
      'entry 1: bound 10 must be greater than 10',
    ])
    expect(bracketProblems([{ upTo: 200 }, { upTo: 100 }, { upTo: null }])).toEqual([
      'entry 1: bound 100 must be greater than 200',
    ])
  })
})
