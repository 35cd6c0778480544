import { z } from 'zod'
import type { Calculator } from './calculator.ts'
import { estimateLatency } from './latency.ts'
import { resolveTier, tokenCost } from './pricing.ts'
import { commonRequirements, type Scenario } from './scenario.ts'
import type { LlmLatency } from './types.ts'

/**
 * Prompt tokens for each LLM call of an agentic grep search.
 *
 * Every miss drags another batch of wrong documents into the conversation;
 * the final call carries all the misses plus the right document.
 */
export function grepAttempts(scenario: Scenario): number[] {
  const tries = Math.max(1, Math.floor(scenario.avgGrepTries))
  const failed = tries - 1
  const missTokens = scenario.grepDocsPerAttempt * scenario.pagesPerDocument * scenario.tokensPerPage
  const hitTokens = scenario.pagesPerDocument * scenario.tokensPerPage

  const attempts: number[] = []
  for (let i = 1; i <= failed; i++) {
    attempts.push(scenario.queryTokens + i * missTokens)
  }
  attempts.push(scenario.queryTokens + failed * missTokens + hitTokens)
  return attempts
}

export const grep: Calculator<'grep'> = {
  mode: 'grep',
  label: 'Just Grep',
  requirements: commonRequirements.extend({
    grepDocsPerAttempt: z.number().int().positive(),
    pagesPerDocument: z.number().int().positive(),
  }),

  calculate(scenario, { plan, latency }) {
    const attempts = grepAttempts(scenario)

    let input = 0
    let output = 0
    const total: LlmLatency = { network: 0, ttft: 0, decode: 0, throughput: 0, total: 0 }

    for (const promptTokens of attempts) {
      const tier = resolveTier(plan, promptTokens)
      input += tokenCost(promptTokens, tier.input)
      output += tokenCost(scenario.outputTokens, tier.output)

      const call = estimateLatency(latency, promptTokens, scenario.outputTokens)
      total.network += call.network
      total.ttft += call.ttft
      total.decode += call.decode
      total.total += call.total
      // report the last call's decode speed
      total.throughput = call.throughput
    }

    const costPerRequest = input + output

    return {
      mode: 'grep',
      label: 'Just Grep',
      monthlyCost: costPerRequest * scenario.queriesPerMonth,
      costPerRequest,
      inputTokens: attempts.reduce((sum, tokens) => sum + tokens, 0),
      latency: total,
      cost: { input, output },
      attempts,
    }
  },
}
