import { describe, test, expect } from 'vitest'
import { contextFor, evaluateAll, loadTables, summarize, type ModeOutcome } from '../engine/compare.ts'
import { listPlans } from '../engine/pricing.ts'
import { parseScenario } from '../engine/scenario.ts'
import type { CalculationResult } from '../engine/types.ts'
import {
  formatRate,
  renderBreakdown,
  renderComparison,
  renderErrors,
  renderHeader,
  renderPlans,
  renderReport,
  renderSummary,
  reportJson,
} from './report.ts'

const tables = loadTables()
const ctx = contextFor(tables)
const scenario = parseScenario()
const outcomes = evaluateAll(scenario, ctx)

const row = (label: string, cells: string[]) =>
  (label.padEnd(22) + cells.map(c => c.padEnd(26)).join('')).trimEnd()

function resultFor(mode: CalculationResult['mode'], list: readonly ModeOutcome[] = outcomes): CalculationResult {
  const outcome = list.find(o => o.mode === mode)
  if (!outcome?.ok) throw new Error(`no result for ${mode}`)
  return outcome.result
}

describe('renderHeader', () => {
  test('plan and knowledge base summary', () => {
    expect(renderHeader(ctx.plan, scenario)).toEqual([
      'Anthropic Claude Sonnet (claude-3.5-sonnet-1m)',
      'knowledge base: 1,000 pages x 600 tok/page = 600,000 tokens',
      '30,000 requests/month, 4 updates/month',
    ])
  })
})

describe('renderComparison', () => {
  test('one column per mode', () => {
    const lines = renderComparison(outcomes)
    expect(lines[0]).toBe(row('', ['Long Context (No Cache)', 'Long Context (Cache)', 'Just Grep', 'RAG w/ Vector DB']))
    expect(lines[1]).toBe('─'.repeat(126))
    expect(lines).toContain(row('input tokens/request', ['600,050', '600,050', '48,200', '2,450']))
    expect(lines).toContain(row('cost/request', ['$3.6228', '$0.3834', '$0.2046', '$0.0312']))
    expect(lines).toContain(row('monthly cost', ['$108,684', '$11,502', '$6,138', '$936.79']))
    expect(lines).toContain(row('ttft', ['4.30s', '1.07s', '12.60s', '2.00s']))
    expect(lines).toContain(row('throughput', ['62 tok/s', '62 tok/s', '90 tok/s', '120 tok/s']))
    expect(lines).toHaveLength(9)
  })

  test('failed modes show as invalid', () => {
    const lines = renderComparison(evaluateAll(parseScenario({ topK: 0 }), ctx))
    expect(lines).toContain(row('monthly cost', ['$108,684', '$11,502', '$6,138', 'invalid input']))
  })
})

describe('renderBreakdown', () => {
  const item = (name: string, value: string) => `  ${name.padEnd(18)}${value}`

  test('grep lists each call', () => {
    expect(renderBreakdown(resultFor('grep'), scenario)).toEqual([
      'Just Grep',
      item('input', '$0.1446/request'),
      item('output', '$0.0600/request'),
      item('llm calls', '4 (3 retries)'),
      item('tokens per call', '4,850 | 9,650 | 14,450 | 19,250'),
    ])
  })

  test('a single grep call has no retries', () => {
    const single = evaluateAll(parseScenario({ avgGrepTries: 2 }), ctx)
    expect(renderBreakdown(resultFor('grep', single), scenario)).toContain(item('llm calls', '2 (1 retry)'))
  })

  test('rag shows the retrieval pipeline', () => {
    expect(renderBreakdown(resultFor('rag'), scenario)).toEqual([
      'RAG w/ Vector DB',
      item('embedding', '$0.0000/request'),
      item('llm input', '$0.0073/request'),
      item('llm output', '$0.0150/request'),
      item('rerank', '$0.0080/request'),
      item('vector db', '$0.0009/request'),
      item('retrieved', '2,400 tokens (~4.0 pages)'),
      item('rerank calls', '4'),
      item('indexing/update', '400.00s'),
      item('indexing/request', '53.3 ms'),
      item('retrieval', '10.1 ms'),
      item('reranking', '150.0 ms'),
      item('e2e w/o indexing', '10.64s'),
    ])
  })

  test('cached long context splits the cache charges', () => {
    expect(renderBreakdown(resultFor('long-context-cached'), scenario)).toEqual([
      'Long Context (Cache)',
      item('cache write', '$0.0006/request'),
      item('cache storage', '$0.0000/request'),
      item('cache read', '$0.3600/request'),
      item('query input', '$0.0003/request'),
      item('output', '$0.0225/request'),
    ])
  })
})

describe('renderSummary', () => {
  test('ranked with savings against the baseline', () => {
    expect(renderSummary(summarize(outcomes))).toEqual([
      'cost ranking',
      `  1. ${'RAG w/ Vector DB'.padEnd(26)}${'$936.79/month'.padEnd(16)}+99.1% vs no cache`,
      `  2. ${'Just Grep'.padEnd(26)}${'$6,138/month'.padEnd(16)}+94.4% vs no cache`,
      `  3. ${'Long Context (Cache)'.padEnd(26)}${'$11,502/month'.padEnd(16)}+89.4% vs no cache`,
      `  4. ${'Long Context (No Cache)'.padEnd(26)}${'$108,684/month'.padEnd(16)}baseline`,
    ])
  })
})

describe('renderErrors', () => {
  test('nothing when every mode succeeded', () => {
    expect(renderErrors(outcomes)).toEqual([])
  })

  test('lists the failing modes with their issues', () => {
    expect(renderErrors(evaluateAll(parseScenario({ topK: 0 }), ctx))).toEqual([
      'invalid input',
      '  RAG w/ Vector DB: topK: Number must be greater than 0',
    ])
  })
})

describe('renderReport', () => {
  test('header, table, breakdowns, summary', () => {
    const lines = renderReport(ctx.plan, scenario, outcomes)
    expect(lines.slice(0, 4)).toEqual([...renderHeader(ctx.plan, scenario), ''])
    expect(lines.at(-1)).toBe(renderSummary(summarize(outcomes)).at(-1))
    expect(lines).toContain('Just Grep')
    expect(lines).not.toContain('invalid input')
  })
})

describe('reportJson', () => {
  test('results and ranking', () => {
    const json = reportJson(ctx.plan, scenario, evaluateAll(parseScenario({ topK: 0 }), ctx))
    expect(json.plan).toBe('claude-3.5-sonnet-1m')
    expect(json.results).toHaveLength(4)
    expect(json.results[3]).toEqual({
      mode: 'rag',
      label: 'RAG w/ Vector DB',
      error: 'rag: invalid input (topK: Number must be greater than 0)',
      issues: ['topK: Number must be greater than 0'],
    })
    expect(json.ranking.map(r => r.mode)).toEqual(['grep', 'long-context-cached', 'long-context'])
  })
})

describe('plans', () => {
  test('formatRate', () => {
    expect(formatRate(3)).toBe('$3.00')
    expect(formatRate(0.3)).toBe('$0.30')
    expect(formatRate(0.0875)).toBe('$0.0875')
  })

  test('renderPlans', () => {
    const lines = renderPlans(listPlans(tables.catalog), 'claude-3.5-sonnet-1m')
    expect(lines.slice(0, 6)).toEqual([
      'claude-3.5-sonnet-1m (default)',
      '  Anthropic Claude Sonnet · Anthropic · 1,000,000 token context window',
      `  ${'<=200,000'.padEnd(12)}in $3.00  out $15.00  cache write $3.75  cache read $0.30`,
      `  ${'above'.padEnd(12)}in $6.00  out $22.50  cache write $7.50  cache read $0.60`,
      '  Long-context pricing doubles input and raises output past 200k prompt tokens.',
      '',
    ])
    expect(lines[6]).toBe('gemini-1.5-flash-1m')
    expect(lines[8]).toBe(
      `  ${'above'.padEnd(12)}in $0.35  out $1.05  cache write $0.35  cache read $0.0875`,
    )
  })
})
