import { describe, it, expect, vi, afterEach } from 'vitest'
import { jsonLineLogger, silentLogger, stdoutLogger, isSolverLogger } from '../logger'
import type { LogFields } from '../logger'
import { solve } from '../solver'

const FIXED = new Date('2026-01-02T03:04:05.000Z')

function recordingLogger() {
  const entries: Array<{ event: string; fields: LogFields | undefined }> = []
  return {
    entries,
    debug(event: string, fields?: LogFields) {
      entries.push({ event, fields })
    },
  }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('jsonLineLogger', () => {
  it('writes one JSON line per event', () => {
    const lines: string[] = []
    const logger = jsonLineLogger({ write: (chunk: string) => lines.push(chunk) }, () => FIXED)
    logger.debug('simplex.pivot', { iteration: 1, entering: 'x1' })
    expect(lines).toEqual([
      '{"ts":"2026-01-02T03:04:05.000Z","level":"debug","event":"simplex.pivot","iteration":1,"entering":"x1"}\n',
    ])
  })

  it('writes an entry without fields', () => {
    const lines: string[] = []
    jsonLineLogger({ write: (chunk: string) => lines.push(chunk) }, () => FIXED).debug('simplex.start')
    expect(JSON.parse(lines[0])).toEqual({
      ts: '2026-01-02T03:04:05.000Z',
      level: 'debug',
      event: 'simplex.start',
    })
  })

  it('stdoutLogger writes to process.stdout', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    stdoutLogger.debug('simplex.done', { status: 'optimal' })
    expect(write).toHaveBeenCalledTimes(1)
    const line = String(write.mock.calls[0][0])
    expect(JSON.parse(line)).toMatchObject({ level: 'debug', event: 'simplex.done', status: 'optimal' })
  })
})

describe('isSolverLogger', () => {
  it('recognises loggers', () => {
    expect(isSolverLogger(silentLogger)).toBe(true)
    expect(isSolverLogger({ debug: 1 })).toBe(false)
    expect(isSolverLogger(null)).toBe(false)
  })
})

describe('verbose solving', () => {
  const textbook = { c: [3, 2], A: [[1, 1], [1, 0], [0, 1]], b: [4, 2, 3] }

  it('traces start, each pivot and the outcome', () => {
    const logger = recordingLogger()
    solve(textbook, { verbose: true, logger })
    expect(logger.entries).toEqual([
      {
        event: 'simplex.start',
        fields: { m: 3, n: 2, maximize: true, maxIterations: 50, pivotRule: 'dantzig' },
      },
      {
        event: 'simplex.pivot',
        fields: { iteration: 1, entering: 'x1', leaving: 's2', row: 1, ratio: 2, objective: 6 },
      },
      {
        event: 'simplex.pivot',
        fields: { iteration: 2, entering: 'x2', leaving: 's1', row: 0, ratio: 2, objective: 10 },
      },
      {
        event: 'simplex.done',
        fields: { status: 'optimal', iterations: 2, objective: 10 },
      },
    ])
  })

  it('logs the unbounded column', () => {
    const logger = recordingLogger()
    solve({ c: [1, 1], A: [[1, -1]], b: [1] }, { verbose: true, logger })
    expect(logger.entries.map((e) => e.event)).toEqual([
      'simplex.start',
      'simplex.pivot',
      'simplex.unbounded',
      'simplex.done',
    ])
    expect(logger.entries[2].fields).toEqual({ iteration: 1, entering: 'x2' })
  })

  it('stays silent unless verbose', () => {
    const logger = recordingLogger()
    solve(textbook, { logger })
    expect(logger.entries).toEqual([])
  })

  it('does not change the result', () => {
    const quiet = solve(textbook)
    const traced = solve(textbook, { verbose: true, logger: silentLogger })
    expect(traced).toEqual(quiet)
  })
})
