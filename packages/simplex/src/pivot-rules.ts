/**
 * Entering/leaving selection policies.
 *
 * dantzig: most negative reduced cost, lowest row on ratio ties. Fast in
 *          practice, can cycle on degenerate tableaus.
 * bland:   lowest-index improving column, lowest-index basic variable on
 *          ratio ties. Never cycles.
 */

import type { PivotRule, PivotRuleName, Tableau } from './types'
import { cell, columnCount, ratioTest, reducedCost, rhs } from './tableau'

export const dantzigRule: PivotRule = {
  name: 'dantzig',

  selectEntering(t: Tableau, tolerance: number): number {
    let entering = -1
    let mostNegative = -tolerance
    const cols = columnCount(t)
    for (let j = 0; j < cols; j++) {
      const r = reducedCost(t, j)
      if (r < mostNegative) {
        mostNegative = r
        entering = j
      }
    }
    return entering
  },

  selectLeaving(t: Tableau, entering: number, tolerance: number): number {
    return ratioTest(t, entering, tolerance)
  },
}

export const blandRule: PivotRule = {
  name: 'bland',

  selectEntering(t: Tableau, tolerance: number): number {
    const cols = columnCount(t)
    for (let j = 0; j < cols; j++) {
      if (reducedCost(t, j) < -tolerance) return j
    }
    return -1
  },

  selectLeaving(t: Tableau, entering: number, tolerance: number): number {
    let leaving = -1
    let bestRatio = Infinity
    for (let i = 0; i < t.m; i++) {
      const a = cell(t, i, entering)
      if (a <= tolerance) continue
      const ratio = rhs(t, i) / a
      if (leaving === -1 || ratio < bestRatio - tolerance) {
        leaving = i
        bestRatio = ratio
      } else if (ratio <= bestRatio + tolerance && t.basis[i] < t.basis[leaving]) {
        leaving = i
        bestRatio = Math.min(ratio, bestRatio)
      }
    }
    return leaving
  },
}

const BUILT_IN_RULES: Record<PivotRuleName, PivotRule> = {
  dantzig: dantzigRule,
  bland: blandRule,
}

export function resolvePivotRule(rule: PivotRuleName | PivotRule): PivotRule {
  return typeof rule === 'string' ? BUILT_IN_RULES[rule] : rule
}
