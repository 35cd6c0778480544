import { describe, test, expect } from 'vitest'
import { CALCULATORS, contextFor, evaluateAll, loadTables, summarize } from './compare.ts'
import { InvalidInputError } from './errors.ts'
import { grep } from './grep.ts'
import { rag } from './rag.ts'
import { parseScenario } from './scenario.ts'

const tables = loadTables()
const ctx = contextFor(tables)

describe('contextFor', () => {
  test('defaults to the catalog default plan', () => {
    expect(ctx.plan.key).toBe('claude-3.5-sonnet-1m')
    expect(ctx.retrieval).toBe(tables.catalog.retrieval)
  })

  test('unknown plan keys are invalid input', () => {
    expect(() => contextFor(tables, 'gpt-unknown')).toThrow(InvalidInputError)
  })
})

describe('evaluateAll', () => {
  test('runs every mode in display order', () => {
    const outcomes = evaluateAll(parseScenario(), ctx)
    expect(outcomes.map(o => o.mode)).toEqual(['long-context', 'long-context-cached', 'grep', 'rag'])
    expect(outcomes.every(o => o.ok)).toBe(true)
  })

  test('a field only rag needs blocks only rag', () => {
    const outcomes = evaluateAll(parseScenario({ topK: 0 }), ctx)
    expect(outcomes.map(o => o.ok)).toEqual([true, true, true, false])
    const failed = outcomes[3]
    if (!failed || failed.ok) throw new Error('expected rag to fail')
    expect(failed.error.mode).toBe('rag')
  })

  test('zero pages blocks every mode', () => {
    const outcomes = evaluateAll(parseScenario({ pages: 0 }), ctx)
    expect(outcomes.filter(o => o.ok)).toHaveLength(0)
  })

  test('a query too long for the reranker fails rag alone', () => {
    const outcomes = evaluateAll(parseScenario({ queryTokens: 5_000 }), ctx)
    expect(outcomes.map(o => o.ok)).toEqual([true, true, true, false])
  })

  test('re-supplying the same scenario gives identical output', () => {
    const input = { pages: 750, tokensPerPage: 800, queriesPerMonth: 12_345, avgGrepTries: 2.5 }
    const first = JSON.stringify(evaluateAll(parseScenario(input), ctx))
    const again = JSON.stringify(evaluateAll(parseScenario(JSON.parse(JSON.stringify(input))), ctx))
    expect(again).toBe(first)
  })
})

describe('summarize', () => {
  test('ranks cheapest first with savings against no cache', () => {
    const ranked = summarize(evaluateAll(parseScenario(), ctx))
    expect(ranked.map(r => r.result.mode)).toEqual(['rag', 'grep', 'long-context-cached', 'long-context'])
    expect(ranked.map(r => r.rank)).toEqual(['best', 'good', 'expensive', 'expensive'])
    expect(ranked[0]?.savingsPercent).toBeCloseTo(99.138063, 5)
    expect(ranked[1]?.savingsPercent).toBeCloseTo(94.352435, 5)
    expect(ranked[2]?.savingsPercent).toBeCloseTo(89.417026, 5)
    expect(ranked[3]?.savingsPercent).toBeNull()
  })

  test('failed modes are left out', () => {
    const ranked = summarize(evaluateAll(parseScenario({ topK: 0 }), ctx))
    expect(ranked).toHaveLength(3)
    expect(ranked[0]?.result.mode).toBe('grep')
  })

  test('without a baseline savings are zero', () => {
    const ranked = summarize(evaluateAll(parseScenario(), ctx, [grep, rag]))
    expect(ranked.map(r => r.savingsPercent)).toEqual([0, 0])
  })

  test('nothing to rank', () => {
    expect(summarize(evaluateAll(parseScenario({ pages: 0 }), ctx))).toEqual([])
  })
})

test('every calculator has a distinct mode', () => {
  expect(new Set(CALCULATORS.map(c => c.mode)).size).toBe(CALCULATORS.length)
})
