/**
 * Structural errors raised before any tableau is built.
 *
 * Unboundedness and the iteration cap are problem outcomes, reported through
 * `SimplexResult.status`, and never thrown.
 */

export type FieldErrors = Partial<Record<string, string[]>>

export class SimplexError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SimplexError'
  }
}

/** Shapes of c, A and b disagree. */
export class DimensionError extends SimplexError {
  constructor(
    public readonly location: string,
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Dimension mismatch at ${location}: expected ${expected}, got ${actual}`)
    this.name = 'DimensionError'
  }
}

/** A coefficient is NaN or infinite. */
export class InvalidCoefficientError extends SimplexError {
  constructor(
    public readonly location: string,
    public readonly value: number,
  ) {
    super(`Coefficient at ${location} must be finite, got ${value}`)
    this.name = 'InvalidCoefficientError'
  }
}

/** b[row] < 0, so the all-slack starting basis is not feasible. */
export class InfeasibleOriginError extends SimplexError {
  readonly status = 'infeasible_origin' as const

  constructor(
    public readonly row: number,
    public readonly value: number,
  ) {
    super(
      `Right-hand side b[${row}] = ${value} is negative; ` +
      `the origin is not a feasible starting vertex`,
    )
    this.name = 'InfeasibleOriginError'
  }
}

/** Solver options rejected by the config schema. */
export class SimplexConfigError extends SimplexError {
  constructor(public readonly fields: FieldErrors) {
    super(`Invalid solver configuration: ${describeFields(fields)}`)
    this.name = 'SimplexConfigError'
  }
}

/** Untrusted problem input rejected by the problem schema. */
export class ProblemSchemaError extends SimplexError {
  constructor(public readonly fields: FieldErrors) {
    super(`Invalid linear program: ${describeFields(fields)}`)
    this.name = 'ProblemSchemaError'
  }
}

function describeFields(fields: FieldErrors): string {
  return Object.entries(fields)
    .map(([key, messages]) => `${key} (${(messages ?? []).join(', ')})`)
    .join('; ')
}
