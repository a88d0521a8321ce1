import { describe, expect, it } from 'vitest'
import { buildViabilityReport, median, percentile, renderViabilityReport, wilsonInterval } from '../report.js'
import { failingRun, passingRun } from './helpers.js'

const GENERATED_AT = new Date('2026-01-15T09:30:00.000Z')

/** 8 of 10 passing, failures apart */
function eightOfTen(durationMs = 60_000) {
  return Array.from({ length: 10 }, (_, i) =>
    i === 3 || i === 7 ? failingRun({ durationMs }) : passingRun({ durationMs })
  )
}

describe('wilsonInterval', () => {
  it('brackets the observed proportion', () => {
    const ci = wilsonInterval(8, 10)
    expect(ci.low).toBeCloseTo(0.4902, 3)
    expect(ci.high).toBeCloseTo(0.9433, 3)
  })

  it('is [0, 0] without observations', () => {
    expect(wilsonInterval(0, 0)).toEqual({ low: 0, high: 0 })
  })
})

describe('median and percentile', () => {
  it('computes medians for odd and even lengths', () => {
    expect(median([3, 1, 2])).toBe(2)
    expect(median([4, 1, 3, 2])).toBe(2.5)
    expect(median([])).toBeNull()
  })

  it('interpolates between closest ranks', () => {
    expect(percentile([1, 2, 3, 4], 50)).toBe(2.5)
    expect(percentile([50, 10, 40, 20, 30], 95)).toBeCloseTo(48)
    expect(percentile([5, 9], 100)).toBe(9)
    expect(percentile([], 95)).toBeNull()
  })
})

describe('buildViabilityReport', () => {
  it('gives GO when pass rate, stability and latency meet the criteria', () => {
    const report = buildViabilityReport(eightOfTen())

    expect(report.total).toBe(10)
    expect(report.passes).toBe(8)
    expect(report.passRate).toBe(0.8)
    expect(report.longestFailureStreak).toBe(1)
    expect(report.longestSuccessStreak).toBe(3)
    expect(report.durationP50Ms).toBe(60_000)
    expect(report.verdict).toBe('GO')
  })

  it('uses the CI lower bound when asked', () => {
    expect(buildViabilityReport(eightOfTen(), { useCiLowerBound: true }).verdict).toBe('NO-GO')
  })

  it('fails the latency gate for slow runs', () => {
    const report = buildViabilityReport(eightOfTen(200_000))
    expect(report.latencyOk).toBe(false)
    expect(report.verdict).toBe('NO-GO')
  })

  it('fails the stability gate on a long failure streak', () => {
    const runs = [
      ...Array.from({ length: 7 }, () => passingRun()),
      failingRun(),
      failingRun(),
      failingRun(),
    ]

    const report = buildViabilityReport(runs, { targetPassRate: 0.5 })

    expect(report.stabilityOk).toBe(false)
    expect(report.verdict).toBe('NO-GO')
  })

  it('stays CONDITIONAL below the minimum number of runs', () => {
    expect(buildViabilityReport([passingRun(), passingRun()]).verdict).toBe('CONDITIONAL')
  })

  it('sums per-run counters', () => {
    const report = buildViabilityReport([
      passingRun({ blockedCount: 2, challengeCount: 1, challengeSolvedCount: 1 }),
      passingRun({ blockedCount: 1, timeoutCount: 3, solverFailedCount: 2 }),
    ])

    expect(report.totals).toEqual({
      blocked: 3,
      challenges: 1,
      challengesSolved: 1,
      solverFailures: 2,
      timeouts: 3,
      enriched: 6,
      failed: 0,
      skipped: 0,
    })
  })
})

describe('renderViabilityReport', () => {
  it('renders results, the runs table and the verdict', () => {
    const report = buildViabilityReport(Array.from({ length: 10 }, () => passingRun()))
    const lines = renderViabilityReport(report, { title: 'Board A viability', generatedAt: GENERATED_AT }).split('\n')

    expect(lines[0]).toBe('# Board A viability')
    expect(lines).toContain('**Generated:** 2026-01-15T09:30:00.000Z  ')
    expect(lines).toContain('**Runs:** 10  ')
    expect(lines).toContain('- Passes: **10/10** (pass = at least one new item)')
    expect(lines).toContain('- Duration p50: **60.0s**')
    expect(lines).toContain('| 1 | yes | 3 | direct | completed | 60.0s | 100.0% | 0 | 0 | 0 | 0 |')
    expect(lines).toContain('**GO**')
    expect(lines).toContain('Basis: point estimate (100.0%) vs threshold 80.0%.')
    expect(lines).toContain('Gates: stability=PASS, latency=PASS.')
  })

  it('explains a CONDITIONAL verdict and shows missing coverage as a dash', () => {
    const report = buildViabilityReport([failingRun(), passingRun()])
    const lines = renderViabilityReport(report, { title: 'Short series', generatedAt: GENERATED_AT }).split('\n')

    expect(lines).toContain('| 1 | no | 0 | direct | completed | 60.0s | - | 0 | 0 | 0 | 0 |')
    expect(lines).toContain('Verdict is CONDITIONAL because measured runs (2) < minimum (10).')
  })
})
