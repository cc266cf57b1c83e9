/**
 * Diagnostic trace sinks for the solver.
 *
 * The default sink emits one JSON line per event to stdout:
 *   { ts, level, event, ...fields }
 * The solver only writes to it when `verbose` is set.
 */

export type LogFields = Record<string, unknown>

export interface SolverLogger {
  debug(event: string, fields?: LogFields): void
}

/** Anything with a Node-style `write(string)`, e.g. process.stdout */
export interface LineSink {
  write(chunk: string): unknown
}

export function jsonLineLogger(
  sink: LineSink,
  now: () => Date = () => new Date(),
): SolverLogger {
  return {
    debug(event, fields = {}) {
      const entry = {
        ts: now().toISOString(),
        level: 'debug',
        event,
        ...fields,
      }
      sink.write(JSON.stringify(entry) + '\n')
    },
  }
}

// Resolves process.stdout at call time
export const stdoutLogger: SolverLogger = {
  debug(event, fields) {
    jsonLineLogger(process.stdout).debug(event, fields)
  },
}

export const silentLogger: SolverLogger = {
  debug() {},
}

export function isSolverLogger(value: unknown): value is SolverLogger {
  return (
    typeof value === 'object' &&
    value !== null &&
    'debug' in value &&
    typeof value.debug === 'function'
  )
}
