import { z } from 'zod'
import type { Bracket } from './types.ts'

/**
 * Pick the entry covering `n`: the first whose bound is >= n (or unbounded),
 * falling back to the last entry for anything past every bound.
 */
export function resolveBracket<T extends Bracket>(brackets: readonly T[], n: number): T {
  for (const bracket of brackets) {
    if (bracket.upTo === null || n <= bracket.upTo) return bracket
  }
  const last = brackets.at(-1)
  if (!last) throw new Error('resolveBracket: empty table')
  return last
}

export function bracketProblems(brackets: readonly Bracket[]): string[] {
  if (brackets.length === 0) return ['must have at least one entry']

  const problems: string[] = []
  brackets.forEach((bracket, i) => {
    if (bracket.upTo === null) {
      if (i !== brackets.length - 1) problems.push(`entry ${i}: only the last entry may be unbounded`)
      return
    }
    const prev = brackets[i - 1]
    if (prev && prev.upTo !== null && bracket.upTo <= prev.upTo) {
      problems.push(`entry ${i}: bound ${bracket.upTo} must be greater than ${prev.upTo}`)
    }
  })
  return problems
}

// zod superRefine hook for any bracket array
export function refineBrackets(brackets: readonly Bracket[], ctx: z.RefinementCtx): void {
  for (const message of bracketProblems(brackets)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message })
  }
}

export const boundSchema = z.number().positive().nullable()
