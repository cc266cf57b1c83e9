/**
 * Independent checks of a reported vertex against the original problem.
 */

import type { LinearProgram } from './types'
import { DEFAULT_SIMPLEX_CONFIG } from './types'
import { DimensionError } from './errors'

export interface FeasibilityReport {
  feasible: boolean
  /** Largest violation of Ax ≤ b or x ≥ 0, 0 when none */
  maxViolation: number
}

/** cᵀx */
export function evaluateObjective(c: readonly number[], x: readonly number[]): number {
  if (c.length !== x.length) throw new DimensionError('x', c.length, x.length)
  let sum = 0
  for (let j = 0; j < c.length; j++) {
    sum += c[j] * x[j]
  }
  return sum
}

export function checkFeasibility(
  problem: LinearProgram,
  x: readonly number[],
  tolerance: number = DEFAULT_SIMPLEX_CONFIG.tolerance,
): FeasibilityReport {
  const { A, b, c } = problem
  if (x.length !== c.length) throw new DimensionError('x', c.length, x.length)

  let maxViolation = 0
  for (let j = 0; j < x.length; j++) {
    maxViolation = Math.max(maxViolation, -x[j])
  }
  for (let i = 0; i < A.length; i++) {
    const lhs = evaluateObjective(A[i], x)
    maxViolation = Math.max(maxViolation, lhs - b[i])
  }

  return { feasible: maxViolation <= tolerance, maxViolation }
}
