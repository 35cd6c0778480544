// Latency model: empirical TTFT/throughput curves by prompt length,
// plus the embedding, vector search and rerank steps a RAG request adds.

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { boundSchema, refineBrackets, resolveBracket } from './brackets.ts'
import { ConfigurationError, describeIssues } from './errors.ts'
import type { LatencyTable, LlmLatency, RerankSample } from './types.ts'

const LATENCY_FILE = new URL('../data/latency.json', import.meta.url)

const bracketSchema = z.object({
  upTo: boundSchema,
  value: z.number().positive(),
})

const rerankSchema = z.array(z.object({
  docs: z.number().positive(),
  seconds: z.number().nonnegative(),
})).min(1).superRefine((samples, ctx) => {
  samples.forEach((sample, i) => {
    const prev = samples[i - 1]
    if (!prev) return
    if (sample.docs <= prev.docs) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `sample ${i}: docs must be greater than ${prev.docs}` })
    }
    // extrapolation follows the last segment, so a falling curve would go negative
    if (sample.seconds < prev.seconds) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `sample ${i}: seconds must not be less than ${prev.seconds}` })
    }
  })
})

const latencySchema = z.object({
  networkOverheadSeconds: z.number().nonnegative(),
  cacheSpeedup: z.number().positive().max(1),
  ttft: z.array(bracketSchema).superRefine(refineBrackets),
  throughput: z.array(bracketSchema).superRefine(refineBrackets),
  embeddingTokensPerSecond: z.number().positive(),
  retrieval: z.object({
    baseSeconds: z.number().nonnegative(),
    secondsPer100TopK: z.number().nonnegative(),
  }),
  rerank: rerankSchema,
})

export function parseLatencyTable(raw: unknown, source = 'latency.json'): LatencyTable {
  const result = latencySchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigurationError(source, describeIssues(result.error.issues).join('; '))
  }
  return result.data
}

/** Read and validate data/latency.json. Call once at startup. */
export function loadLatencyTable(): LatencyTable {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(LATENCY_FILE, 'utf8'))
  } catch (err) {
    throw new ConfigurationError('latency.json', err instanceof Error ? err.message : String(err))
  }
  return parseLatencyTable(raw)
}

export function ttftAt(table: LatencyTable, promptTokens: number): number {
  return resolveBracket(table.ttft, promptTokens).value
}

export function throughputAt(table: LatencyTable, promptTokens: number): number {
  return resolveBracket(table.throughput, promptTokens).value
}

/**
 * Estimate one LLM call: network overhead + time to first token + decode.
 * With `cached`, the prefix is served from the prompt cache and TTFT shrinks
 * by the table's speedup factor; decode is unaffected.
 */
export function estimateLatency(
  table: LatencyTable,
  promptTokens: number,
  outputTokens: number,
  { cached = false }: { cached?: boolean } = {},
): LlmLatency {
  const network = table.networkOverheadSeconds
  const ttft = ttftAt(table, promptTokens) * (cached ? table.cacheSpeedup : 1)
  const throughput = throughputAt(table, promptTokens)
  const decode = outputTokens > 0 ? outputTokens / throughput : 0
  return { network, ttft, decode, throughput, total: network + ttft + decode }
}

/**
 * Piecewise-linear lookup through (docs, seconds) samples. Below the first
 * sample the first value holds; past the last, the final segment's slope
 * carries on.
 */
export function interpolate(samples: readonly RerankSample[], docs: number): number {
  const first = samples[0]
  if (!first) throw new Error('interpolate: no samples')
  if (docs <= first.docs || samples.length === 1) return first.seconds

  for (let i = 1; i < samples.length; i++) {
    const lo = samples[i - 1]
    const hi = samples[i]
    if (!lo || !hi) break
    if (docs <= hi.docs || i === samples.length - 1) {
      return lo.seconds + (hi.seconds - lo.seconds) * (docs - lo.docs) / (hi.docs - lo.docs)
    }
  }
  return first.seconds
}

export function estimateRerankLatency(table: LatencyTable, docs: number): number {
  return interpolate(table.rerank, docs)
}

export function estimateRetrievalLatency(table: LatencyTable, topK: number): number {
  return table.retrieval.baseSeconds + (topK / 100) * table.retrieval.secondsPer100TopK
}

/** Seconds to embed the whole corpus once. */
export function estimateIndexingLatency(table: LatencyTable, corpusTokens: number): number {
  return corpusTokens / table.embeddingTokensPerSecond
}
