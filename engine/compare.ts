import { evaluate, type Calculator } from './calculator.ts'
import { InvalidInputError } from './errors.ts'
import { grep } from './grep.ts'
import { loadLatencyTable } from './latency.ts'
import { longContext, longContextCached } from './long-context.ts'
import { getPlan, loadPricingCatalog, type PricingCatalog } from './pricing.ts'
import { rag } from './rag.ts'
import type { Scenario } from './scenario.ts'
import type { CalcContext, CalculationResult, LatencyTable, Mode } from './types.ts'

// display order; the first is the savings baseline
export const CALCULATORS: readonly Calculator[] = [longContext, longContextCached, grep, rag]

const BASELINE_MODE: Mode = 'long-context'

export interface Tables {
  catalog: PricingCatalog
  latency: LatencyTable
}

/** Load and validate both static tables. Throws ConfigurationError. */
export function loadTables(extraPlans: readonly unknown[] = []): Tables {
  return {
    catalog: loadPricingCatalog(extraPlans),
    latency: loadLatencyTable(),
  }
}

export function contextFor(tables: Tables, planKey?: string): CalcContext {
  return {
    plan: getPlan(tables.catalog, planKey),
    retrieval: tables.catalog.retrieval,
    latency: tables.latency,
  }
}

export type ModeOutcome =
  | { mode: Mode; label: string; ok: true; result: CalculationResult }
  | { mode: Mode; label: string; ok: false; error: InvalidInputError }

/**
 * Run every calculator on the same scenario. A scenario that's invalid for
 * one mode only blocks that mode's result; anything other than
 * InvalidInputError propagates.
 */
export function evaluateAll(
  scenario: Scenario,
  ctx: CalcContext,
  calculators: readonly Calculator[] = CALCULATORS,
): ModeOutcome[] {
  return calculators.map((calculator): ModeOutcome => {
    const { mode, label } = calculator
    try {
      return { mode, label, ok: true, result: evaluate(calculator, scenario, ctx) }
    } catch (err) {
      if (err instanceof InvalidInputError) return { mode, label, ok: false, error: err }
      throw err
    }
  })
}

export type Rank = 'best' | 'good' | 'expensive'

export interface RankedResult {
  result: CalculationResult
  rank: Rank
  /** percent cheaper than uncached long context; null for the baseline itself */
  savingsPercent: number | null
}

/** Successful results, cheapest first. */
export function summarize(outcomes: readonly ModeOutcome[]): RankedResult[] {
  const results = outcomes.flatMap(o => o.ok ? [o.result] : [])
  const baseline = results.find(r => r.mode === BASELINE_MODE)?.monthlyCost ?? 0

  return [...results]
    .sort((a, b) => a.monthlyCost - b.monthlyCost)
    .map((result, index): RankedResult => ({
      result,
      rank: index === 0 ? 'best' : index === 1 ? 'good' : 'expensive',
      savingsPercent: result.mode === BASELINE_MODE
        ? null
        : baseline ? ((baseline - result.monthlyCost) / baseline) * 100 : 0,
    }))
}
