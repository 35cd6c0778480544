import { DENSITIES, DENSITY_LABELS, type Scenario } from '../engine/scenario.ts'

type NumericKey = Exclude<keyof Scenario, 'tokensPerPage'>

export type Field =
  | { kind: 'number'; key: NumericKey; label: string; step: number; min: number; max: number }
  | { kind: 'density'; label: string }
  | { kind: 'plan'; label: string }

// interactive ranges, not hard limits
export const FIELDS: readonly Field[] = [
  { kind: 'density', label: 'document density' },
  { kind: 'number', key: 'pages', label: 'knowledge base pages', step: 100, min: 100, max: 10_000 },
  { kind: 'number', key: 'updatesPerMonth', label: 'kb updates / month', step: 1, min: 0, max: 30 },
  { kind: 'number', key: 'queriesPerMonth', label: 'requests / month', step: 3_000, min: 3_000, max: 3_000_000 },
  { kind: 'plan', label: 'pricing plan' },
  { kind: 'number', key: 'avgGrepTries', label: 'grep tries', step: 1, min: 1, max: 10 },
  { kind: 'number', key: 'grepDocsPerAttempt', label: 'docs per grep call', step: 1, min: 1, max: 10 },
  { kind: 'number', key: 'topK', label: 'rag top-k', step: 1, min: 1, max: 20 },
  { kind: 'number', key: 'vectorDbBaseCost', label: 'vector db $/month', step: 1, min: 0, max: 1_000 },
]

export interface TuiState {
  scenario: Scenario
  planKey: string
  selected: number
}

export function moveSelection(state: TuiState, delta: number): TuiState {
  const n = FIELDS.length
  return { ...state, selected: (((state.selected + delta) % n) + n) % n }
}

function cycle<T>(options: readonly T[], current: T, direction: 1 | -1): T {
  const index = options.indexOf(current)
  const next = options[(index + direction + options.length) % options.length]
  return next ?? current
}

function withField(scenario: Scenario, key: NumericKey, value: number): Scenario {
  const next = { ...scenario }
  next[key] = value
  return next
}

/** Step the selected field one notch left (-1) or right (+1). */
export function stepField(state: TuiState, direction: 1 | -1, planKeys: readonly string[]): TuiState {
  const field = FIELDS[state.selected]
  if (!field) return state

  switch (field.kind) {
    case 'density':
      return { ...state, scenario: { ...state.scenario, tokensPerPage: cycle(DENSITIES, state.scenario.tokensPerPage, direction) } }
    case 'plan':
      return planKeys.length === 0 ? state : { ...state, planKey: cycle(planKeys, state.planKey, direction) }
    case 'number': {
      const value = Math.min(field.max, Math.max(field.min, state.scenario[field.key] + direction * field.step))
      return { ...state, scenario: withField(state.scenario, field.key, value) }
    }
  }
}

export function fieldValue(state: TuiState, field: Field): string {
  switch (field.kind) {
    case 'density':
      return `${state.scenario.tokensPerPage} tok/page (${DENSITY_LABELS[state.scenario.tokensPerPage]})`
    case 'plan':
      return state.planKey
    case 'number':
      return String(state.scenario[field.key])
  }
}
