/**
 * Core types for the tableau Simplex solver.
 */

import type { SolverLogger } from './logger'
import { stdoutLogger } from './logger'

// ─── Problem ───────────────────────────────────────────────────────────────

/** optimize cᵀx subject to Ax ≤ b, x ≥ 0 */
export interface LinearProgram {
  /** Objective coefficients (n) */
  c: readonly number[]
  /** Constraint matrix, m rows of n coefficients */
  A: readonly (readonly number[])[]
  /** Right-hand sides (m), each ≥ 0 */
  b: readonly number[]
  /** Maximize when true (default), minimize otherwise */
  maximize?: boolean
}

// ─── Tableau ───────────────────────────────────────────────────────────────

/**
 * Dense (m+1) × (n+m+1) tableau.
 *
 * Rows 0..m-1 hold [A | I | b], row m holds the reduced costs of all n+m
 * columns followed by the negated objective value of the current vertex.
 * Costs are always stored for minimization.
 */
export interface Tableau {
  /** Constraint rows */
  m: number
  /** Decision variables (slack columns follow at n..n+m-1) */
  n: number
  /** Row stride: n + m + 1 */
  width: number
  /** Row-major cells, (m+1) * width */
  data: Float64Array
  /** Basic column of each constraint row */
  basis: Int32Array
}

// ─── Pivot Rules ───────────────────────────────────────────────────────────

export type PivotRuleName = 'dantzig' | 'bland'

export const PIVOT_RULE_NAMES = ['dantzig', 'bland'] as const satisfies readonly PivotRuleName[]

/** Entering/leaving selection policy. Both selectors return -1 when nothing qualifies. */
export interface PivotRule {
  readonly name: string
  selectEntering(tableau: Tableau, tolerance: number): number
  selectLeaving(tableau: Tableau, entering: number, tolerance: number): number
}

// ─── Configuration ─────────────────────────────────────────────────────────

export interface PivotEvent {
  /** Pivots performed so far, this one included */
  iteration: number
  entering: number
  leavingRow: number
  /** Column that left the basis */
  leavingVariable: number
  /** Winning minimum ratio */
  ratio: number
  pivotElement: number
  /** Objective value of the new vertex, in the caller's sense */
  objectiveValue: number
}

export interface SimplexConfig {
  /** Zero threshold for the optimality and ratio tests (default: 1e-10) */
  tolerance: number
  /** Pivot cap (default: max(50, 10·(m+n))) */
  maxIterations?: number
  /** Emit a diagnostic trace through `logger` (default: false) */
  verbose: boolean
  /** Entering/leaving policy (default: 'dantzig') */
  pivotRule: PivotRuleName | PivotRule
  /** Trace sink used when verbose */
  logger: SolverLogger
  /** Called after every pivot, regardless of verbosity */
  onPivot?: (event: PivotEvent) => void
}

export const DEFAULT_SIMPLEX_CONFIG: SimplexConfig = {
  tolerance: 1e-10,
  verbose: false,
  pivotRule: 'dantzig',
  logger: stdoutLogger,
}

export const MIN_DEFAULT_ITERATIONS = 50

export function defaultMaxIterations(m: number, n: number): number {
  return Math.max(MIN_DEFAULT_ITERATIONS, 10 * (m + n))
}

// ─── Result ────────────────────────────────────────────────────────────────

export type SolveStatus =
  | 'optimal'
  | 'unbounded'
  | 'infeasible_origin'
  | 'max_iterations_exceeded'

export interface SimplexResult {
  /** cᵀx at the final vertex; null when unbounded or rejected */
  optimalValue: number | null
  /** Values of the n decision variables at the final vertex */
  solution: number[]
  status: SolveStatus
  /** Pivots performed */
  iterations: number
  /** b − Ax per constraint */
  slacks: number[]
  /** Shadow price per constraint, in the caller's objective sense */
  duals: number[]
  /** Basic column per constraint row */
  basis: number[]
}
