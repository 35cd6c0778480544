import type { z } from 'zod'
import { InvalidInputError, describeIssues } from './errors.ts'
import type { Scenario } from './scenario.ts'
import type { CalcContext, Mode, ResultFor } from './types.ts'

export interface Calculator<M extends Mode = Mode> {
  mode: M
  label: string
  /** fields this mode needs to be positive; checked before calculate() */
  requirements: z.ZodTypeAny
  calculate(scenario: Scenario, ctx: CalcContext): ResultFor<M>
}

/**
 * Validate the scenario against the calculator's requirements, then run it.
 * Throws InvalidInputError tagged with the calculator's mode.
 */
export function evaluate<M extends Mode>(calculator: Calculator<M>, scenario: Scenario, ctx: CalcContext): ResultFor<M> {
  const check = calculator.requirements.safeParse(scenario)
  if (!check.success) {
    throw new InvalidInputError(describeIssues(check.error.issues), calculator.mode)
  }
  return calculator.calculate(scenario, ctx)
}
