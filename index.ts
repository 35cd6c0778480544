#!/usr/bin/env node

const command = process.argv[2]
const args = process.argv.slice(3)

const USAGE = `context-cost - what does answering questions over your documents cost?

usage:
  context-cost compare [options]   compare long context, prompt caching, grep and RAG
  context-cost plans               list pricing plans
  context-cost tui                 interactive calculator

run "context-cost compare --help" for scenario options
`

try {
  switch (command) {
    case 'compare': {
      const { runCompare } = await import('./cli/cli.ts')
      await runCompare(args)
      break
    }
    case 'plans': {
      const { runPlans } = await import('./cli/cli.ts')
      await runPlans()
      break
    }
    case 'tui': {
      const mod = await import('./client/tui.tsx')
      await mod.default()
      break
    }
    case undefined:
    case '-h':
    case '--help':
      console.log(USAGE)
      break
    default:
      console.error(`unknown command: ${command}`)
      console.error(USAGE)
      process.exitCode = 1
  }
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err))
  process.exitCode = 1
}

export {}
