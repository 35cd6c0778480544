import type { Calculator } from './calculator.ts'
import { estimateLatency } from './latency.ts'
import { resolveTier, tokenCost } from './pricing.ts'
import { commonRequirements, corpusTokens } from './scenario.ts'

/**
 * Whole knowledge base in every prompt, billed at full input price each
 * request. The tier is picked by the full prompt length.
 */
export const longContext: Calculator<'long-context'> = {
  mode: 'long-context',
  label: 'Long Context (No Cache)',
  requirements: commonRequirements,

  calculate(scenario, { plan, latency }) {
    const promptTokens = corpusTokens(scenario) + scenario.queryTokens
    const tier = resolveTier(plan, promptTokens)

    const input = tokenCost(promptTokens, tier.input)
    const output = tokenCost(scenario.outputTokens, tier.output)
    const costPerRequest = input + output

    return {
      mode: 'long-context',
      label: 'Long Context (No Cache)',
      monthlyCost: costPerRequest * scenario.queriesPerMonth,
      costPerRequest,
      inputTokens: promptTokens,
      latency: estimateLatency(latency, promptTokens, scenario.outputTokens),
      cost: { input, output },
    }
  },
}

/**
 * Knowledge base written to the prompt cache once per update and read back
 * on every request. Cache write and storage are monthly charges, spread
 * over the month's requests.
 */
export const longContextCached: Calculator<'long-context-cached'> = {
  mode: 'long-context-cached',
  label: 'Long Context (Cache)',
  requirements: commonRequirements,

  calculate(scenario, { plan, latency }) {
    const kbTokens = corpusTokens(scenario)
    const promptTokens = kbTokens + scenario.queryTokens
    const requests = scenario.queriesPerMonth

    // cached prefix is priced by its own length, the rest by the whole prompt
    const kbTier = resolveTier(plan, kbTokens)
    const promptTier = resolveTier(plan, promptTokens)

    const cacheWrite = tokenCost(kbTokens, kbTier.cacheWrite) * scenario.updatesPerMonth / requests
    const cacheStorage = tokenCost(kbTokens, kbTier.cacheStoragePerHour) * scenario.cacheStorageHoursPerMonth / requests
    const cacheRead = tokenCost(kbTokens, kbTier.cacheRead)
    const queryInput = tokenCost(scenario.queryTokens, promptTier.input)
    const output = tokenCost(scenario.outputTokens, promptTier.output)
    const costPerRequest = cacheWrite + cacheStorage + cacheRead + queryInput + output

    return {
      mode: 'long-context-cached',
      label: 'Long Context (Cache)',
      monthlyCost: costPerRequest * requests,
      costPerRequest,
      inputTokens: promptTokens,
      latency: estimateLatency(latency, promptTokens, scenario.outputTokens, { cached: true }),
      cost: { cacheWrite, cacheStorage, cacheRead, queryInput, output },
    }
  },
}
