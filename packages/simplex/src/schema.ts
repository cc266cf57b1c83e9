import { z } from 'zod'
import { isSolverLogger } from './logger'
import type { SolverLogger } from './logger'
import { DEFAULT_SIMPLEX_CONFIG, PIVOT_RULE_NAMES } from './types'
import type { LinearProgram, PivotEvent, PivotRule, SimplexConfig } from './types'
import { ProblemSchemaError, SimplexConfigError } from './errors'

function isPivotRule(value: unknown): value is PivotRule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'selectEntering' in value &&
    typeof value.selectEntering === 'function' &&
    'selectLeaving' in value &&
    typeof value.selectLeaving === 'function'
  )
}

const coefficient = z.number().finite()

export const simplexConfigSchema = z.object({
  tolerance: z.number().positive('Tolerance must be positive').finite(),
  maxIterations: z.number().int().nonnegative().optional(),
  verbose: z.boolean(),
  pivotRule: z.union([
    z.enum(PIVOT_RULE_NAMES),
    z.custom<PivotRule>(isPivotRule, 'Expected a pivot rule name or object'),
  ]),
  logger: z.custom<SolverLogger>(isSolverLogger, 'Expected a logger with debug()'),
  onPivot: z
    .custom<(event: PivotEvent) => void>((v) => typeof v === 'function', 'Expected a function')
    .optional(),
})

export const linearProgramSchema = z.object({
  c: z.array(coefficient),
  A: z.array(z.array(coefficient)),
  b: z.array(coefficient),
  maximize: z.boolean().default(true),
})

export type LinearProgramInput = z.input<typeof linearProgramSchema>

/** Merge overrides onto the defaults and validate. */
export function resolveConfig(config: Partial<SimplexConfig> = {}): SimplexConfig {
  const result = simplexConfigSchema.safeParse({ ...DEFAULT_SIMPLEX_CONFIG, ...config })
  if (!result.success) {
    throw new SimplexConfigError(result.error.flatten().fieldErrors)
  }
  return result.data
}

/**
 * Validate an already-decoded problem object (e.g. parsed JSON).
 * Only checks types; dimension consistency is checked by the solver.
 */
export function parseLinearProgram(input: unknown): LinearProgram {
  const result = linearProgramSchema.safeParse(input)
  if (!result.success) {
    throw new ProblemSchemaError(result.error.flatten().fieldErrors)
  }
  return result.data
}
