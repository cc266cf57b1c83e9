/**
 * Primal Simplex on an explicit tableau.
 *
 *   optimize cᵀx  s.t.  Ax ≤ b, x ≥ 0, b ≥ 0
 *
 * Starts from the all-slack basis (the origin) and pivots until no reduced
 * cost is negative, the entering column has no positive entry (unbounded),
 * or the iteration cap is reached. Each call owns its tableau; nothing is
 * shared between calls.
 */

import type {
  LinearProgram,
  PivotEvent,
  SimplexConfig,
  SimplexResult,
  SolveStatus,
  Tableau,
} from './types'
import { defaultMaxIterations } from './types'
import { DimensionError, InfeasibleOriginError, InvalidCoefficientError, SimplexError } from './errors'
import { resolveConfig } from './schema'
import { resolvePivotRule } from './pivot-rules'
import {
  buildTableau,
  cell,
  extractDuals,
  extractSlacks,
  extractSolution,
  isOptimal,
  objectiveValue,
  pivot,
  rhs,
  variableLabel,
} from './tableau'

// ─── Input Checks ──────────────────────────────────────────────────────────

function assertFinite(value: number, location: string): void {
  if (!Number.isFinite(value)) throw new InvalidCoefficientError(location, value)
}

/**
 * Throws DimensionError / InvalidCoefficientError / InfeasibleOriginError.
 * Runs before any tableau is allocated.
 */
export function validateProblem(problem: LinearProgram): void {
  const { c, A, b } = problem
  const n = c.length

  if (A.length !== b.length) throw new DimensionError('A (rows)', b.length, A.length)
  for (let i = 0; i < A.length; i++) {
    if (A[i].length !== n) throw new DimensionError(`A[${i}]`, n, A[i].length)
  }

  c.forEach((v, j) => assertFinite(v, `c[${j}]`))
  A.forEach((row, i) => row.forEach((v, j) => assertFinite(v, `A[${i}][${j}]`)))
  b.forEach((v, i) => assertFinite(v, `b[${i}]`))

  for (let i = 0; i < b.length; i++) {
    if (b[i] < 0) throw new InfeasibleOriginError(i, b[i])
  }
}

// ─── Solve ─────────────────────────────────────────────────────────────────

function buildResult(
  t: Tableau,
  status: SolveStatus,
  iterations: number,
  maximize: boolean,
): SimplexResult {
  return {
    optimalValue: status === 'unbounded' ? null : objectiveValue(t, maximize),
    solution: extractSolution(t),
    status,
    iterations,
    slacks: extractSlacks(t),
    duals: extractDuals(t, maximize),
    basis: Array.from(t.basis),
  }
}

/**
 * Solve the LP. Structural problems (shape, non-finite entries, negative b)
 * throw; unboundedness and the iteration cap are reported via `status`.
 */
export function solve(
  problem: LinearProgram,
  config: Partial<SimplexConfig> = {},
): SimplexResult {
  const cfg = resolveConfig(config)
  validateProblem(problem)

  const maximize = problem.maximize ?? true
  const { c, A, b } = problem
  const m = b.length
  const n = c.length
  const tolerance = cfg.tolerance
  const maxIterations = cfg.maxIterations ?? defaultMaxIterations(m, n)
  const rule = resolvePivotRule(cfg.pivotRule)
  const log = cfg.verbose ? cfg.logger : null

  log?.debug('simplex.start', { m, n, maximize, maxIterations, pivotRule: rule.name })

  const t = buildTableau(c, A, b, maximize)
  let iterations = 0
  let status: SolveStatus

  for (;;) {
    if (isOptimal(t, tolerance)) {
      status = 'optimal'
      break
    }
    if (iterations >= maxIterations) {
      status = 'max_iterations_exceeded'
      break
    }

    const entering = rule.selectEntering(t, tolerance)
    if (entering < 0) {
      throw new SimplexError(`Pivot rule "${rule.name}" found no entering column on a non-optimal tableau`)
    }

    const leavingRow = rule.selectLeaving(t, entering, tolerance)
    if (leavingRow < 0) {
      log?.debug('simplex.unbounded', { iteration: iterations, entering: variableLabel(t, entering) })
      status = 'unbounded'
      break
    }

    const pivotElement = cell(t, leavingRow, entering)
    if (!(pivotElement > tolerance)) {
      throw new SimplexError(
        `Pivot rule "${rule.name}" chose row ${leavingRow} with non-positive pivot ${pivotElement}`,
      )
    }

    const leavingVariable = t.basis[leavingRow]
    const ratio = rhs(t, leavingRow) / pivotElement
    pivot(t, leavingRow, entering)
    iterations++

    const event: PivotEvent = {
      iteration: iterations,
      entering,
      leavingRow,
      leavingVariable,
      ratio,
      pivotElement,
      objectiveValue: objectiveValue(t, maximize),
    }
    log?.debug('simplex.pivot', {
      iteration: iterations,
      entering: variableLabel(t, entering),
      leaving: variableLabel(t, leavingVariable),
      row: leavingRow,
      ratio,
      objective: event.objectiveValue,
    })
    cfg.onPivot?.(event)
  }

  const result = buildResult(t, status, iterations, maximize)
  log?.debug('simplex.done', { status, iterations, objective: result.optimalValue })
  return result
}

/**
 * Like `solve`, but a negative right-hand side is reported as a result with
 * status 'infeasible_origin' instead of an InfeasibleOriginError.
 */
export function trySolve(
  problem: LinearProgram,
  config: Partial<SimplexConfig> = {},
): SimplexResult {
  try {
    return solve(problem, config)
  } catch (err) {
    if (!(err instanceof InfeasibleOriginError)) throw err
    const n = problem.c.length
    const m = problem.b.length
    return {
      optimalValue: null,
      solution: new Array<number>(n).fill(0),
      status: err.status,
      iterations: 0,
      slacks: [...problem.b],
      duals: new Array<number>(m).fill(0),
      basis: Array.from({ length: m }, (_, i) => n + i),
    }
  }
}
