import { useMemo, useState } from 'react'
import { render, Box, Text, useInput, useApp } from 'ink'
import { contextFor, evaluateAll, loadTables, summarize, type Tables } from '../engine/compare.ts'
import { loadConfig } from '../engine/config.ts'
import { getPlan, listPlans } from '../engine/pricing.ts'
import { parseScenario } from '../engine/scenario.ts'
import { renderComparison, renderErrors, renderSummary } from '../cli/report.ts'
import { FIELDS, fieldValue, moveSelection, stepField, type TuiState } from './tui-state.ts'

function Parameters({ state }: { state: TuiState }) {
  return (
    <Box flexDirection="column" borderStyle="round" paddingX={1}>
      {FIELDS.map((field, i) => {
        const active = i === state.selected
        return (
          <Text key={field.label} color={active ? 'cyan' : undefined} bold={active}>
            {active ? '› ' : '  '}
            {field.label.padEnd(24)}
            {fieldValue(state, field)}
          </Text>
        )
      })}
    </Box>
  )
}

function App({ tables, initial }: { tables: Tables; initial: TuiState }) {
  const { exit } = useApp()
  const [state, setState] = useState(initial)
  const planKeys = useMemo(() => listPlans(tables.catalog).map(p => p.key), [tables])

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      exit()
      return
    }
    if (key.upArrow) setState(s => moveSelection(s, -1))
    else if (key.downArrow) setState(s => moveSelection(s, 1))
    else if (key.leftArrow) setState(s => stepField(s, -1, planKeys))
    else if (key.rightArrow) setState(s => stepField(s, 1, planKeys))
  })

  // recomputed on every keypress
  const ctx = contextFor(tables, state.planKey)
  const outcomes = evaluateAll(state.scenario, ctx)
  const lines = [
    ...renderComparison(outcomes),
    '',
    ...renderErrors(outcomes),
    ...renderSummary(summarize(outcomes)),
  ]

  return (
    <Box flexDirection="column">
      <Text bold>{ctx.plan.label}</Text>
      <Parameters state={state} />
      <Box flexDirection="column" paddingX={1}>
        {lines.map((line, i) => (
          <Text key={i}>{line}</Text>
        ))}
      </Box>
      <Text dimColor>↑/↓ select · ←/→ adjust · q quit</Text>
    </Box>
  )
}

export default async function runTui(): Promise<void> {
  const config = await loadConfig()
  const tables = loadTables(config.plans)
  const scenario = parseScenario(config.scenario)
  const planKey = getPlan(tables.catalog, config.plan).key

  const { waitUntilExit } = render(<App tables={tables} initial={{ scenario, planKey, selected: 0 }} />)
  await waitUntilExit()
}
