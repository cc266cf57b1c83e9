/**
 * Dense tableau construction, row reduction and read-out.
 *
 *   [ A | I | b ]    rows 0..m-1, slack basis
 *   [ c'| 0 | 0 ]    row m, c' = -c when maximizing
 *
 * Row operations keep the system equivalent to the original one; the basis
 * array is updated by `pivot` and nowhere else.
 */

import type { Tableau } from './types'

/** Build the starting tableau. Inputs must already be validated. */
export function buildTableau(
  c: readonly number[],
  A: readonly (readonly number[])[],
  b: readonly number[],
  maximize: boolean,
): Tableau {
  const m = b.length
  const n = c.length
  const width = n + m + 1
  const data = new Float64Array((m + 1) * width)
  const basis = new Int32Array(m)

  for (let i = 0; i < m; i++) {
    const row = A[i]
    const base = i * width
    for (let j = 0; j < n; j++) {
      data[base + j] = row[j]
    }
    data[base + n + i] = 1
    data[base + width - 1] = b[i]
    basis[i] = n + i
  }

  const objective = m * width
  for (let j = 0; j < n; j++) {
    data[objective + j] = maximize ? -c[j] : c[j]
  }

  return { m, n, width, data, basis }
}

// ─── Cell Access ───────────────────────────────────────────────────────────

export function cell(t: Tableau, row: number, col: number): number {
  return t.data[row * t.width + col]
}

export function rhs(t: Tableau, row: number): number {
  return t.data[row * t.width + t.width - 1]
}

export function reducedCost(t: Tableau, col: number): number {
  return t.data[t.m * t.width + col]
}

/** n decision columns followed by m slack columns */
export function columnCount(t: Tableau): number {
  return t.width - 1
}

/** x1..xn for decision columns, s1..sm for slacks */
export function variableLabel(t: Tableau, col: number): string {
  return col < t.n ? `x${col + 1}` : `s${col - t.n + 1}`
}

// ─── Tests & Row Reduction ─────────────────────────────────────────────────

/** True when no reduced cost is below -tolerance. */
export function isOptimal(t: Tableau, tolerance: number): boolean {
  const cols = columnCount(t)
  for (let j = 0; j < cols; j++) {
    if (reducedCost(t, j) < -tolerance) return false
  }
  return true
}

/**
 * Minimum ratio test over rows whose entering-column entry exceeds
 * tolerance. Ties keep the lowest row index. Returns -1 when no row
 * qualifies, i.e. the entering direction is unbounded.
 */
export function ratioTest(t: Tableau, entering: number, tolerance: number): number {
  let best = -1
  let bestRatio = Infinity
  for (let i = 0; i < t.m; i++) {
    const a = cell(t, i, entering)
    if (a <= tolerance) continue
    const ratio = rhs(t, i) / a
    if (ratio < bestRatio) {
      bestRatio = ratio
      best = i
    }
  }
  return best
}

/**
 * Pivot on (row, col): normalize the pivot row, eliminate `col` from every
 * other row including the objective row, and record `col` as basic in `row`.
 */
export function pivot(t: Tableau, row: number, col: number): void {
  const { width, data } = t
  const base = row * width
  const element = data[base + col]

  for (let j = 0; j < width; j++) {
    data[base + j] /= element
  }
  data[base + col] = 1

  for (let i = 0; i <= t.m; i++) {
    if (i === row) continue
    const offset = i * width
    const factor = data[offset + col]
    if (factor === 0) continue
    for (let j = 0; j < width; j++) {
      data[offset + j] -= factor * data[base + j]
    }
    data[offset + col] = 0
  }

  t.basis[row] = col
}

// ─── Read-out ──────────────────────────────────────────────────────────────

function positiveZero(value: number): number {
  return value === 0 ? 0 : value
}

/** Decision variable values at the current vertex. */
export function extractSolution(t: Tableau): number[] {
  const solution = new Array<number>(t.n).fill(0)
  for (let i = 0; i < t.m; i++) {
    const col = t.basis[i]
    if (col < t.n) solution[col] = positiveZero(rhs(t, i))
  }
  return solution
}

/** Slack variable values (b − Ax) at the current vertex. */
export function extractSlacks(t: Tableau): number[] {
  const slacks = new Array<number>(t.m).fill(0)
  for (let i = 0; i < t.m; i++) {
    const col = t.basis[i]
    if (col >= t.n) slacks[col - t.n] = positiveZero(rhs(t, i))
  }
  return slacks
}

/** Objective value of the current vertex, in the caller's sense. */
export function objectiveValue(t: Tableau, maximize: boolean): number {
  const cornerCell = rhs(t, t.m)
  return positiveZero(maximize ? cornerCell : -cornerCell)
}

/**
 * Shadow prices from the slack columns of the objective row. The reduced
 * cost of slack i is -yᵢ for the internal minimization.
 */
export function extractDuals(t: Tableau, maximize: boolean): number[] {
  const duals = new Array<number>(t.m)
  for (let i = 0; i < t.m; i++) {
    const r = reducedCost(t, t.n + i)
    duals[i] = positiveZero(maximize ? r : -r)
  }
  return duals
}
