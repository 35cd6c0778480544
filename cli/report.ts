import { summarize, type ModeOutcome, type RankedResult } from '../engine/compare.ts'
import {
  formatCurrency,
  formatMilliseconds,
  formatNumber,
  formatPercentage,
  formatSeconds,
  formatThroughput,
} from '../engine/format.ts'
import { corpusTokens, type Scenario } from '../engine/scenario.ts'
import type { CalculationResult, PricingPlan, PricingTier } from '../engine/types.ts'

const LABEL_WIDTH = 22
const COL_WIDTH = 26
const INVALID = 'invalid input'

function row(label: string, cells: string[]): string {
  return (label.padEnd(LABEL_WIDTH) + cells.map(c => c.padEnd(COL_WIDTH)).join('')).trimEnd()
}

function hr(): string {
  return '─'.repeat(LABEL_WIDTH + COL_WIDTH * 4)
}

const METRICS: [string, (r: CalculationResult) => string][] = [
  ['input tokens/request', r => formatNumber(r.inputTokens)],
  ['cost/request', r => formatCurrency(r.costPerRequest, 4)],
  ['monthly cost', r => formatCurrency(r.monthlyCost)],
  ['avg e2e time', r => formatSeconds(r.latency.total)],
  ['ttft', r => formatSeconds(r.latency.ttft)],
  ['decode', r => formatSeconds(r.latency.decode)],
  ['throughput', r => formatThroughput(r.latency.throughput)],
]

export function renderHeader(plan: PricingPlan, scenario: Scenario): string[] {
  return [
    `${plan.label} (${plan.key})`,
    `knowledge base: ${formatNumber(scenario.pages)} pages x ${scenario.tokensPerPage} tok/page = ${formatNumber(corpusTokens(scenario))} tokens`,
    `${formatNumber(scenario.queriesPerMonth)} requests/month, ${scenario.updatesPerMonth} updates/month`,
  ]
}

/** Side-by-side table, one column per mode. */
export function renderComparison(outcomes: readonly ModeOutcome[]): string[] {
  const lines = [row('', outcomes.map(o => o.label)), hr()]
  for (const [label, cell] of METRICS) {
    lines.push(row(label, outcomes.map(o => o.ok ? cell(o.result) : INVALID)))
  }
  return lines
}

function costItems(result: CalculationResult): [string, number][] {
  switch (result.mode) {
    case 'long-context':
    case 'grep':
      return [['input', result.cost.input], ['output', result.cost.output]]
    case 'long-context-cached':
      return [
        ['cache write', result.cost.cacheWrite],
        ['cache storage', result.cost.cacheStorage],
        ['cache read', result.cost.cacheRead],
        ['query input', result.cost.queryInput],
        ['output', result.cost.output],
      ]
    case 'rag':
      return [
        ['embedding', result.cost.embedding],
        ['llm input', result.cost.llmInput],
        ['llm output', result.cost.llmOutput],
        ['rerank', result.cost.rerank],
        ['vector db', result.cost.vectorDb],
      ]
  }
}

function detailLines(result: CalculationResult, scenario: Scenario): string[] {
  const item = (name: string, value: string) => `  ${name.padEnd(18)}${value}`
  switch (result.mode) {
    case 'grep': {
      const retries = result.attempts.length - 1
      return [
        item('llm calls', `${result.attempts.length} (${retries} ${retries === 1 ? 'retry' : 'retries'})`),
        item('tokens per call', result.attempts.map(formatNumber).join(' | ')),
      ]
    }
    case 'rag': {
      const pages = result.retrievedTokens / scenario.tokensPerPage
      return [
        item('retrieved', `${formatNumber(result.retrievedTokens)} tokens (~${pages.toFixed(1)} pages)`),
        item('rerank calls', String(result.rerankCalls)),
        item('indexing/update', formatSeconds(result.latency.indexingPerUpdate)),
        item('indexing/request', formatMilliseconds(result.latency.indexingAmortized)),
        item('retrieval', formatMilliseconds(result.latency.retrieval)),
        item('reranking', formatMilliseconds(result.latency.reranking)),
        item('e2e w/o indexing', formatSeconds(result.latency.withoutIndexing)),
      ]
    }
    case 'long-context':
    case 'long-context-cached':
      return []
  }
}

/** Per-request cost breakdown plus mode-specific details. */
export function renderBreakdown(result: CalculationResult, scenario: Scenario): string[] {
  return [
    result.label,
    ...costItems(result).map(([name, value]) => `  ${name.padEnd(18)}${formatCurrency(value, 4)}/request`),
    ...detailLines(result, scenario),
  ]
}

export function renderSummary(ranked: readonly RankedResult[]): string[] {
  const lines = ['cost ranking']
  ranked.forEach(({ result, savingsPercent }, i) => {
    const cost = `${formatCurrency(result.monthlyCost)}/month`
    const note = savingsPercent === null ? 'baseline' : `${formatPercentage(savingsPercent)} vs no cache`
    lines.push(`  ${i + 1}. ${result.label.padEnd(COL_WIDTH)}${cost.padEnd(16)}${note}`)
  })
  return lines
}

export function renderErrors(outcomes: readonly ModeOutcome[]): string[] {
  const failed = outcomes.flatMap(o => o.ok ? [] : [o])
  if (failed.length === 0) return []
  return ['invalid input', ...failed.map(o => `  ${o.label}: ${o.error.issues.join('; ')}`)]
}

export function renderReport(plan: PricingPlan, scenario: Scenario, outcomes: readonly ModeOutcome[]): string[] {
  const lines = [...renderHeader(plan, scenario), '', ...renderComparison(outcomes), '']
  for (const outcome of outcomes) {
    if (outcome.ok) lines.push(...renderBreakdown(outcome.result, scenario), '')
  }
  const errors = renderErrors(outcomes)
  if (errors.length > 0) lines.push(...errors, '')
  lines.push(...renderSummary(summarize(outcomes)))
  return lines
}

export function reportJson(plan: PricingPlan, scenario: Scenario, outcomes: readonly ModeOutcome[]) {
  return {
    plan: plan.key,
    scenario,
    results: outcomes.map(o => o.ok
      ? o.result
      : { mode: o.mode, label: o.label, error: o.error.message, issues: o.error.issues }),
    ranking: summarize(outcomes).map(r => ({
      mode: r.result.mode,
      rank: r.rank,
      monthlyCost: r.result.monthlyCost,
      savingsPercent: r.savingsPercent,
    })),
  }
}

/** $/M rate, two decimals unless the rate needs more */
export function formatRate(rate: number): string {
  return Number(rate.toFixed(2)) === rate ? `$${rate.toFixed(2)}` : `$${rate}`
}

function tierLine(tier: PricingTier): string {
  const bound = tier.upTo === null ? 'above' : `<=${formatNumber(tier.upTo)}`
  const parts = [
    `in ${formatRate(tier.input)}`,
    `out ${formatRate(tier.output)}`,
    `cache write ${formatRate(tier.cacheWrite)}`,
    `cache read ${formatRate(tier.cacheRead)}`,
  ]
  if (tier.cacheStoragePerHour > 0) parts.push(`storage ${formatRate(tier.cacheStoragePerHour)}/h`)
  return `  ${bound.padEnd(12)}${parts.join('  ')}`
}

export function renderPlans(plans: readonly PricingPlan[], defaultPlan: string): string[] {
  const lines: string[] = []
  for (const plan of plans) {
    const marker = plan.key === defaultPlan ? ' (default)' : ''
    lines.push(`${plan.key}${marker}`)
    lines.push(`  ${plan.label} · ${plan.provider} · ${formatNumber(plan.contextWindow)} token context window`)
    lines.push(...plan.tiers.map(tierLine))
    if (plan.notes) lines.push(`  ${plan.notes}`)
    lines.push('')
  }
  return lines
}
