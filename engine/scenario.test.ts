import { describe, test, expect } from 'vitest'
import { InvalidInputError } from './errors.ts'
import { DEFAULT_SCENARIO, corpusTokens, isDensity, parseScenario } from './scenario.ts'

describe('parseScenario', () => {
  test('no overrides gives the defaults', () => {
    expect(parseScenario()).toEqual(DEFAULT_SCENARIO)
  })

  test('overrides replace only the fields they name', () => {
    const scenario = parseScenario({ pages: 500, tokensPerPage: 1100 })
    expect(scenario.pages).toBe(500)
    expect(scenario.tokensPerPage).toBe(1100)
    expect(scenario.queriesPerMonth).toBe(30_000)
  })

  test('an explicit undefined keeps the base value', () => {
    expect(parseScenario({ pages: undefined }).pages).toBe(1_000)
  })

  test('layers onto a custom base', () => {
    const base = parseScenario({ queriesPerMonth: 1_000 })
    expect(parseScenario({ pages: 10 }, base)).toMatchObject({ pages: 10, queriesPerMonth: 1_000 })
  })

  test('rejects densities outside the four presets', () => {
    expect(() => parseScenario({ tokensPerPage: 500 })).toThrow(InvalidInputError)
  })

  test('rejects unknown fields', () => {
    expect(() => parseScenario({ pagez: 10 })).toThrow(InvalidInputError)
  })

  test('rejects negative counts and fractional pages', () => {
    try {
      parseScenario({ updatesPerMonth: -1, pages: 1.5 })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError)
      if (!(err instanceof InvalidInputError)) return
      expect(err.issues).toHaveLength(2)
      expect(err.issues.some(issue => issue.startsWith('pages: '))).toBe(true)
      expect(err.issues.some(issue => issue.startsWith('updatesPerMonth: '))).toBe(true)
      expect(err.mode).toBeUndefined()
    }
  })

  test('zero pages is structurally valid; the calculators decide', () => {
    expect(parseScenario({ pages: 0 }).pages).toBe(0)
  })
})

describe('helpers', () => {
  test('corpusTokens', () => {
    expect(corpusTokens(DEFAULT_SCENARIO)).toBe(600_000)
    expect(corpusTokens(parseScenario({ pages: 500, tokensPerPage: 800 }))).toBe(400_000)
  })

  test('isDensity', () => {
    expect(isDensity(400)).toBe(true)
    expect(isDensity(1100)).toBe(true)
    expect(isDensity(700)).toBe(false)
  })
})
