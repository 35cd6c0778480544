import type { ZodIssue } from 'zod'
import type { Mode } from './types.ts'

// raised while loading pricing/latency tables; aborts startup
export class ConfigurationError extends Error {
  constructor(readonly source: string, message: string) {
    super(`${source}: ${message}`)
    this.name = 'ConfigurationError'
  }
}

// raised before computation when a scenario can't be evaluated
export class InvalidInputError extends Error {
  constructor(readonly issues: string[], readonly mode?: Mode) {
    super(`${mode ? `${mode}: ` : ''}invalid input (${issues.join('; ')})`)
    this.name = 'InvalidInputError'
  }
}

export function describeIssues(issues: ZodIssue[]): string[] {
  return issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}
