import { contextFor, evaluateAll, loadTables } from '../engine/compare.ts'
import { loadConfig } from '../engine/config.ts'
import { listPlans } from '../engine/pricing.ts'
import { parseScenario } from '../engine/scenario.ts'
import { COMPARE_HELP, parseCompareArgs } from './args.ts'
import { renderPlans, renderReport, reportJson } from './report.ts'

export async function runCompare(args: readonly string[]): Promise<void> {
  if (args.includes('-h') || args.includes('--help')) {
    console.log(COMPARE_HELP)
    return
  }

  const config = await loadConfig()
  const tables = loadTables(config.plans)
  const parsed = parseCompareArgs(args)

  // config file values sit between the built-in defaults and the flags
  const scenario = parseScenario(parsed.overrides, parseScenario(config.scenario))
  const ctx = contextFor(tables, parsed.plan ?? config.plan)
  const outcomes = evaluateAll(scenario, ctx)

  if (parsed.json) {
    console.log(JSON.stringify(reportJson(ctx.plan, scenario, outcomes), null, 2))
  } else {
    console.log(renderReport(ctx.plan, scenario, outcomes).join('\n'))
  }

  if (outcomes.every(o => !o.ok)) process.exitCode = 1
}

export async function runPlans(): Promise<void> {
  const config = await loadConfig()
  const { catalog } = loadTables(config.plans)
  console.log(renderPlans(listPlans(catalog), config.plan ?? catalog.defaultPlan).join('\n').trimEnd())
}
