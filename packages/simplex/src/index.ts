/**
 * @lp-tableau/simplex
 *
 * Dense-tableau primal Simplex for  optimize cᵀx  s.t.  Ax ≤ b, x ≥ 0.
 * Pluggable pivot rules (Dantzig, Bland), explicit basis tracking,
 * iteration cap, shadow prices and an optional JSON-lines trace.
 */

// ─── Types & Configuration ────────────────────────────────────────────────
export type {
  LinearProgram,
  Tableau,
  PivotRule,
  PivotRuleName,
  PivotEvent,
  SimplexConfig,
  SimplexResult,
  SolveStatus,
} from './types'

export {
  DEFAULT_SIMPLEX_CONFIG,
  PIVOT_RULE_NAMES,
  defaultMaxIterations,
} from './types'

// ─── Solver ───────────────────────────────────────────────────────────────
export { solve, trySolve, validateProblem } from './solver'
export { dantzigRule, blandRule, resolvePivotRule } from './pivot-rules'

// ─── Tableau Operations ───────────────────────────────────────────────────
export {
  buildTableau,
  pivot,
  ratioTest,
  isOptimal,
  extractSolution,
  extractSlacks,
  extractDuals,
  objectiveValue,
  variableLabel,
} from './tableau'

// ─── Errors ───────────────────────────────────────────────────────────────
export {
  SimplexError,
  DimensionError,
  InvalidCoefficientError,
  InfeasibleOriginError,
  SimplexConfigError,
  ProblemSchemaError,
} from './errors'
export type { FieldErrors } from './errors'

// ─── Validation ───────────────────────────────────────────────────────────
export {
  simplexConfigSchema,
  linearProgramSchema,
  resolveConfig,
  parseLinearProgram,
} from './schema'
export type { LinearProgramInput } from './schema'

// ─── Verification ─────────────────────────────────────────────────────────
export { evaluateObjective, checkFeasibility } from './verify'
export type { FeasibilityReport } from './verify'

// ─── Logging ──────────────────────────────────────────────────────────────
export { jsonLineLogger, stdoutLogger, silentLogger } from './logger'
export type { SolverLogger, LineSink, LogFields } from './logger'
