import { z } from 'zod'
import { InvalidInputError, describeIssues } from './errors.ts'

export const DENSITIES = [400, 600, 800, 1100] as const
export type Density = typeof DENSITIES[number]

export const DENSITY_LABELS: Record<Density, string> = {
  400: 'sparse',
  600: 'typical',
  800: 'dense',
  1100: 'images',
}

const density = z.union([z.literal(400), z.literal(600), z.literal(800), z.literal(1100)])
const int = z.number().int()
const count = z.number().int().nonnegative()

// structural rules only; which fields must be positive depends on the mode
const scenarioFields = {
  pages: int,
  tokensPerPage: density,
  queriesPerMonth: int,
  queryTokens: count,
  outputTokens: count,
  topK: int,
  tokensPerChunk: int,
  rerankTopK: int,
  avgGrepTries: z.number().finite(),
  grepDocsPerAttempt: int,
  pagesPerDocument: int,
  updatesPerMonth: count,
  cacheStorageHoursPerMonth: z.number().finite().nonnegative(),
  vectorDbBaseCost: z.number().finite().nonnegative(),
}

export const scenarioSchema = z.object(scenarioFields).strict()
export const scenarioOverridesSchema = z.object(scenarioFields).partial().strict()

export type Scenario = z.infer<typeof scenarioSchema>
export type ScenarioOverrides = z.infer<typeof scenarioOverridesSchema>

export const DEFAULT_SCENARIO: Readonly<Scenario> = {
  pages: 1_000,
  tokensPerPage: 600,
  queriesPerMonth: 30_000, // 1,000 requests/day
  queryTokens: 50,
  outputTokens: 1_000,
  topK: 3,
  tokensPerChunk: 800,
  rerankTopK: 20,
  avgGrepTries: 4,
  grepDocsPerAttempt: 1,
  pagesPerDocument: 8,
  updatesPerMonth: 4,
  // storage is opt-in: hours per month the cache is kept warm
  cacheStorageHoursPerMonth: 0,
  vectorDbBaseCost: 26,
}

const positive = z.number().int().positive()

// every mode bills per request, so both of these divide or multiply everything
export const commonRequirements = z.object({
  pages: positive,
  queriesPerMonth: positive,
})

/**
 * Merge partial overrides onto a base scenario and validate the result.
 * Throws InvalidInputError listing every bad field.
 */
export function parseScenario(overrides: unknown = {}, base: Scenario = DEFAULT_SCENARIO): Scenario {
  const parsed = scenarioOverridesSchema.safeParse(overrides)
  if (!parsed.success) {
    throw new InvalidInputError(describeIssues(parsed.error.issues))
  }

  // an explicit undefined keeps the base value
  const defined = Object.fromEntries(Object.entries(parsed.data).filter(([, value]) => value !== undefined))

  const result = scenarioSchema.safeParse({ ...base, ...defined })
  if (!result.success) {
    throw new InvalidInputError(describeIssues(result.error.issues))
  }
  return result.data
}

export function corpusTokens(scenario: Scenario): number {
  return scenario.pages * scenario.tokensPerPage
}

export function isDensity(n: number): n is Density {
  return DENSITIES.some(d => d === n)
}
