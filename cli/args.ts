import { InvalidInputError } from '../engine/errors.ts'
import { DENSITIES, DENSITY_LABELS, type Scenario } from '../engine/scenario.ts'

export interface CompareArgs {
  overrides: Partial<Record<keyof Scenario, number>>
  plan?: string
  json: boolean
}

const NUMERIC_FLAGS: Record<string, keyof Scenario> = {
  '--pages': 'pages',
  '--density': 'tokensPerPage',
  '--queries': 'queriesPerMonth',
  '--query-tokens': 'queryTokens',
  '--output-tokens': 'outputTokens',
  '--top-k': 'topK',
  '--chunk-tokens': 'tokensPerChunk',
  '--rerank-top-k': 'rerankTopK',
  '--grep-tries': 'avgGrepTries',
  '--grep-docs': 'grepDocsPerAttempt',
  '--pages-per-doc': 'pagesPerDocument',
  '--updates': 'updatesPerMonth',
  '--storage-hours': 'cacheStorageHoursPerMonth',
  '--vector-db-cost': 'vectorDbBaseCost',
}

const DAYS_PER_MONTH = 30

function parseNumber(flag: string, value: string): number {
  // density also takes its name: --density dense
  if (flag === '--density') {
    const named = DENSITIES.find(d => DENSITY_LABELS[d] === value)
    if (named) return named
  }
  const n = Number(value)
  if (value.trim() === '' || Number.isNaN(n)) {
    throw new InvalidInputError([`${flag}: expected a number, got "${value}"`])
  }
  return n
}

/**
 * Parse `compare` options. Accepts `--flag value` and `--flag=value`.
 * Values are only checked for being numbers here; ranges are the
 * scenario schema's job.
 */
export function parseCompareArgs(args: readonly string[]): CompareArgs {
  const parsed: CompareArgs = { overrides: {}, json: false }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? ''
    if (arg === '--json') {
      parsed.json = true
      continue
    }

    const eq = arg.indexOf('=')
    const flag = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg
    const field = NUMERIC_FLAGS[flag]
    if (!field && flag !== '--plan' && flag !== '--per-day') {
      throw new InvalidInputError([`unknown option: ${arg}`])
    }

    let value: string
    if (flag !== arg) {
      value = arg.slice(eq + 1)
    } else {
      const next = args[i + 1]
      if (next === undefined) throw new InvalidInputError([`${flag} needs a value`])
      value = next
      i++
    }

    if (flag === '--plan') {
      parsed.plan = value
    } else if (flag === '--per-day') {
      const perDay = parseNumber(flag, value)
      if (!Number.isInteger(perDay)) {
        throw new InvalidInputError([`${flag}: expected a whole number of requests, got "${value}"`])
      }
      parsed.overrides.queriesPerMonth = perDay * DAYS_PER_MONTH
    } else if (field) {
      parsed.overrides[field] = parseNumber(flag, value)
    }
  }

  return parsed
}

export const COMPARE_HELP = `usage: context-cost compare [options]

options:
  --pages <n>            knowledge base size in pages
  --density <n|name>     tokens per page: 400 sparse, 600 typical, 800 dense, 1100 images
  --queries <n>          requests per month
  --per-day <n>          requests per day (x30)
  --query-tokens <n>     tokens in the user's question, added to every prompt (default 50)
  --output-tokens <n>    tokens generated per answer
  --top-k <n>            chunks fed to the LLM (RAG)
  --chunk-tokens <n>     tokens per chunk (RAG)
  --rerank-top-k <n>     chunks sent to the reranker (RAG)
  --grep-tries <n>       average attempts before grep finds the right file
  --grep-docs <n>        wrong documents pulled in per failed attempt
  --pages-per-doc <n>    pages per document (grep)
  --updates <n>          knowledge base updates per month
  --storage-hours <n>    hours per month the prompt cache is kept warm (default 0)
  --vector-db-cost <n>   vector database base cost, $/month
  --plan <key>           pricing plan (see: context-cost plans)
  --json                 print results as JSON`
