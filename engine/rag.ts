import { z } from 'zod'
import type { Calculator } from './calculator.ts'
import { InvalidInputError } from './errors.ts'
import {
  estimateIndexingLatency,
  estimateLatency,
  estimateRerankLatency,
  estimateRetrievalLatency,
} from './latency.ts'
import { resolveTier, tokenCost } from './pricing.ts'
import { commonRequirements, corpusTokens, type Scenario } from './scenario.ts'
import type { RetrievalPricing } from './types.ts'

/**
 * Reranker invocations needed per query. Each call sees the query plus as
 * many chunk tokens as fit in the reranker's context window; anything past
 * that spills into another call, billed at the same flat rate.
 */
export function rerankCalls(scenario: Scenario, retrieval: RetrievalPricing): number {
  const budget = retrieval.rerankContextTokens - scenario.queryTokens
  if (budget <= 0) {
    throw new InvalidInputError(
      [`queryTokens: ${scenario.queryTokens} leaves no room in the ${retrieval.rerankContextTokens}-token reranker window`],
      'rag',
    )
  }
  const rerankTokens = scenario.rerankTopK * scenario.tokensPerChunk
  return Math.max(1, Math.ceil(rerankTokens / budget))
}

export const rag: Calculator<'rag'> = {
  mode: 'rag',
  label: 'RAG w/ Vector DB',
  requirements: commonRequirements.extend({
    topK: z.number().int().positive(),
    rerankTopK: z.number().int().positive(),
    tokensPerChunk: z.number().int().positive(),
  }),

  calculate(scenario, { plan, retrieval, latency }) {
    const requests = scenario.queriesPerMonth
    const corpus = corpusTokens(scenario)
    const calls = rerankCalls(scenario, retrieval)

    const retrievedTokens = scenario.topK * scenario.tokensPerChunk
    const promptTokens = retrievedTokens + scenario.queryTokens
    const tier = resolveTier(plan, promptTokens)

    // re-embedding the corpus is a per-update charge spread over the month
    const embedding = tokenCost(corpus, retrieval.embeddingPerMillion) * scenario.updatesPerMonth / requests
    const llmInput = tokenCost(promptTokens, tier.input)
    const llmOutput = tokenCost(scenario.outputTokens, tier.output)
    const rerank = calls * retrieval.rerankPerQuery
    const vectorDb = scenario.vectorDbBaseCost / requests
    const costPerRequest = embedding + llmInput + llmOutput + rerank + vectorDb

    const llm = estimateLatency(latency, promptTokens, scenario.outputTokens)
    const indexingPerUpdate = estimateIndexingLatency(latency, corpus)
    const indexingAmortized = indexingPerUpdate * scenario.updatesPerMonth / requests
    const retrievalTime = estimateRetrievalLatency(latency, scenario.topK)
    const reranking = estimateRerankLatency(latency, scenario.rerankTopK)
    const withoutIndexing = retrievalTime + reranking + llm.total

    return {
      mode: 'rag',
      label: 'RAG w/ Vector DB',
      monthlyCost: costPerRequest * requests,
      costPerRequest,
      inputTokens: promptTokens,
      latency: {
        ...llm,
        indexingPerUpdate,
        indexingAmortized,
        retrieval: retrievalTime,
        reranking,
        withoutIndexing,
        total: indexingAmortized + withoutIndexing,
      },
      cost: { embedding, llmInput, llmOutput, rerank, vectorDb },
      retrievedTokens,
      rerankCalls: calls,
    }
  },
}
