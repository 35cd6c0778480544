// Shared engine types (provider-agnostic)

export type Mode = 'long-context' | 'long-context-cached' | 'grep' | 'rag'

// a step in an ordered lookup table; upTo null = unbounded (last entry only)
export interface Bracket {
  upTo: number | null
}

// rates are $/M tokens; storage is $/M tokens per hour
export interface PricingTier extends Bracket {
  input: number
  output: number
  cacheWrite: number
  cacheRead: number
  cacheStoragePerHour: number
}

export interface PricingPlan {
  key: string
  label: string
  provider: string
  modelName: string
  contextWindow: number
  notes?: string
  tiers: readonly PricingTier[]
}

export interface RetrievalPricing {
  embeddingPerMillion: number
  rerankPerQuery: number
  /** reranker context window; a query's chunks are split across calls past this */
  rerankContextTokens: number
}

export interface LatencyBracket extends Bracket {
  value: number
}

export interface RerankSample {
  docs: number
  seconds: number
}

export interface LatencyTable {
  networkOverheadSeconds: number
  /** multiplier applied to TTFT when the prefix is served from cache */
  cacheSpeedup: number
  ttft: readonly LatencyBracket[]
  throughput: readonly LatencyBracket[]
  embeddingTokensPerSecond: number
  retrieval: {
    baseSeconds: number
    secondsPer100TopK: number
  }
  rerank: readonly RerankSample[]
}

// everything a calculator reads besides the scenario
export interface CalcContext {
  plan: PricingPlan
  retrieval: RetrievalPricing
  latency: LatencyTable
}

// one LLM round trip, seconds (throughput in tok/s)
export interface LlmLatency {
  network: number
  ttft: number
  decode: number
  throughput: number
  total: number
}

export interface RagLatency extends LlmLatency {
  indexingPerUpdate: number
  indexingAmortized: number
  retrieval: number
  reranking: number
  /** end-to-end time ignoring amortized indexing */
  withoutIndexing: number
}

interface ResultBase {
  label: string
  monthlyCost: number
  costPerRequest: number
  /** prompt tokens sent per request, summed over every LLM call */
  inputTokens: number
}

// cost breakdowns are $ per request (amortized where the charge is monthly)
export type CalculationResult =
  | ResultBase & {
    mode: 'long-context'
    latency: LlmLatency
    cost: { input: number; output: number }
  }
  | ResultBase & {
    mode: 'long-context-cached'
    latency: LlmLatency
    cost: { cacheWrite: number; cacheStorage: number; cacheRead: number; queryInput: number; output: number }
  }
  | ResultBase & {
    mode: 'grep'
    latency: LlmLatency
    cost: { input: number; output: number }
    attempts: number[] // prompt tokens per LLM call
  }
  | ResultBase & {
    mode: 'rag'
    latency: RagLatency
    cost: { embedding: number; llmInput: number; llmOutput: number; rerank: number; vectorDb: number }
    retrievedTokens: number
    rerankCalls: number
  }

export type ResultFor<M extends Mode> = Extract<CalculationResult, { mode: M }>
