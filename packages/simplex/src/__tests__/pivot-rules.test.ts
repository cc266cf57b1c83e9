import { describe, it, expect } from 'vitest'
import { dantzigRule, blandRule, resolvePivotRule } from '../pivot-rules'
import type { Tableau } from '../types'

const TOL = 1e-10

/** One constraint x1 + x2 + s1 = 5, objective row [-1, -3, 0 | 0] */
function twoCandidateColumns(): Tableau {
  return {
    m: 1,
    n: 2,
    width: 4,
    data: new Float64Array([
      1, 1, 1, 5,
      -1, -3, 0, 0,
    ]),
    basis: new Int32Array([2]),
  }
}

/**
 * Rows tie on the ratio test (2/1 and 4/2) while the basis lists them in
 * reverse index order: row 0 holds s2, row 1 holds s1.
 */
function tiedRatios(): Tableau {
  return {
    m: 2,
    n: 1,
    width: 4,
    data: new Float64Array([
      1, 0, 1, 2,
      2, 1, 0, 4,
      -1, 0, 0, 0,
    ]),
    basis: new Int32Array([2, 1]),
  }
}

describe('dantzigRule', () => {
  it('enters the most negative reduced cost', () => {
    expect(dantzigRule.selectEntering(twoCandidateColumns(), TOL)).toBe(1)
  })

  it('breaks entering ties by lowest column', () => {
    const t = twoCandidateColumns()
    t.data[4] = -3
    expect(dantzigRule.selectEntering(t, TOL)).toBe(0)
  })

  it('leaves by lowest row on ratio ties', () => {
    expect(dantzigRule.selectLeaving(tiedRatios(), 0, TOL)).toBe(0)
  })

  it('finds nothing to enter when every cost is within tolerance', () => {
    expect(dantzigRule.selectEntering(twoCandidateColumns(), 5)).toBe(-1)
  })
})

describe('blandRule', () => {
  it('enters the first improving column', () => {
    expect(blandRule.selectEntering(twoCandidateColumns(), TOL)).toBe(0)
  })

  it('leaves by lowest basic variable on ratio ties', () => {
    expect(blandRule.selectLeaving(tiedRatios(), 0, TOL)).toBe(1)
  })

  it('prefers a strictly smaller ratio over a lower basic index', () => {
    const t = tiedRatios()
    t.data[3] = 1 // row 0 ratio becomes 1
    expect(blandRule.selectLeaving(t, 0, TOL)).toBe(0)
  })

  it('reports an unbounded column', () => {
    const t = tiedRatios()
    t.data[0] = -1
    t.data[4] = 0
    expect(blandRule.selectLeaving(t, 0, TOL)).toBe(-1)
  })
})

describe('resolvePivotRule', () => {
  it('maps names to the built-in rules', () => {
    expect(resolvePivotRule('dantzig')).toBe(dantzigRule)
    expect(resolvePivotRule('bland')).toBe(blandRule)
  })

  it('passes custom rules through', () => {
    const custom = { ...blandRule, name: 'custom' }
    expect(resolvePivotRule(custom)).toBe(custom)
  })
})
