// Model pricing tables (per million tokens)
// tiers are keyed by prompt length; longer prompts can land in a pricier tier

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { boundSchema, refineBrackets, resolveBracket } from './brackets.ts'
import { ConfigurationError, InvalidInputError, describeIssues } from './errors.ts'
import type { PricingPlan, PricingTier, RetrievalPricing } from './types.ts'

const M = 1_000_000

const PRICING_FILE = new URL('../data/pricing-plans.json', import.meta.url)

const rate = z.number().nonnegative()

const tierSchema = z.object({
  upTo: boundSchema,
  input: rate,
  output: rate,
  cacheWrite: rate,
  cacheRead: rate,
  cacheStoragePerHour: rate.optional().default(0),
})

export const planSchema = z.object({
  key: z.string().min(1),
  label: z.string().min(1),
  provider: z.string().min(1),
  modelName: z.string().min(1),
  contextWindow: z.number().int().positive(),
  notes: z.string().optional(),
  tiers: z.array(tierSchema).superRefine(refineBrackets),
})

const retrievalSchema = z.object({
  embeddingPerMillion: rate,
  rerankPerQuery: rate,
  rerankContextTokens: z.number().int().positive(),
})

const pricingFileSchema = z.object({
  defaultPlan: z.string().min(1),
  retrieval: retrievalSchema,
  // plans are parsed one at a time so errors can name the offending plan
  plans: z.array(z.unknown()),
})

export interface PricingCatalog {
  defaultPlan: string
  retrieval: RetrievalPricing
  plans: ReadonlyMap<string, PricingPlan>
}

function planName(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'key' in raw && typeof raw.key === 'string') {
    return raw.key
  }
  return 'unnamed plan'
}

function parsePlan(raw: unknown, source: string): PricingPlan {
  const result = planSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigurationError(`${source} (${planName(raw)})`, describeIssues(result.error.issues).join('; '))
  }
  return result.data
}

/**
 * Build a catalog from the raw pricing file plus any user-supplied plans.
 * Throws ConfigurationError for an empty or unsorted tier table, duplicate
 * keys, or a default plan that doesn't exist.
 */
export function createPricingCatalog(
  raw: unknown,
  extraPlans: readonly unknown[] = [],
  source = 'pricing-plans.json',
): PricingCatalog {
  const parsed = pricingFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError(source, describeIssues(parsed.error.issues).join('; '))
  }

  const plans = new Map<string, PricingPlan>()
  const add = (plan: PricingPlan, from: string) => {
    if (plans.has(plan.key)) {
      throw new ConfigurationError(from, `duplicate plan key ${plan.key}`)
    }
    plans.set(plan.key, plan)
  }

  for (const plan of parsed.data.plans) add(parsePlan(plan, source), source)
  for (const plan of extraPlans) add(parsePlan(plan, 'config'), 'config')

  if (!plans.has(parsed.data.defaultPlan)) {
    throw new ConfigurationError(source, `default plan ${parsed.data.defaultPlan} is not defined`)
  }

  return {
    defaultPlan: parsed.data.defaultPlan,
    retrieval: parsed.data.retrieval,
    plans,
  }
}

/** Read and validate data/pricing-plans.json. Call once at startup. */
export function loadPricingCatalog(extraPlans: readonly unknown[] = []): PricingCatalog {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(PRICING_FILE, 'utf8'))
  } catch (err) {
    throw new ConfigurationError('pricing-plans.json', err instanceof Error ? err.message : String(err))
  }
  return createPricingCatalog(raw, extraPlans)
}

export function getPlan(catalog: PricingCatalog, key: string = catalog.defaultPlan): PricingPlan {
  const plan = catalog.plans.get(key)
  if (!plan) {
    throw new InvalidInputError([`unknown pricing plan: ${key} (available: ${[...catalog.plans.keys()].join(', ')})`])
  }
  return plan
}

/** Plans sorted by display label. */
export function listPlans(catalog: PricingCatalog): PricingPlan[] {
  return [...catalog.plans.values()].sort((a, b) => a.label.localeCompare(b.label))
}

export function resolveTier(plan: PricingPlan, promptTokens: number): PricingTier {
  return resolveBracket(plan.tiers, promptTokens)
}

/** Dollar cost of `tokens` at a $/M rate. Unrounded. */
export function tokenCost(tokens: number, ratePerMillion: number): number {
  return (tokens / M) * ratePerMillion
}
