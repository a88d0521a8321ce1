/**
 * Viability Report
 *
 * Summarizes a series of runs into a GO / NO-GO verdict:
 * - pass rate with a Wilson 95% interval
 * - stability gate: longest failure streak below the limit
 * - latency gate: run duration p50 and p95 under their limits
 * - CONDITIONAL until enough runs have been measured
 */

import { isPassingRun, longestStreak } from './escalation/policy.js'
import { enrichmentCoverage } from './metrics/emit.js'
import type { RunMetrics } from './types.js'

export type Verdict = 'GO' | 'NO-GO' | 'CONDITIONAL'

export interface ViabilityCriteria {
  targetPassRate: number
  minRunsForVerdict: number
  /** Compare the CI lower bound instead of the point estimate */
  useCiLowerBound: boolean
  /** Longest failure streak must stay below this */
  maxFailureStreak: number
  latencyP50Ms: number
  latencyP95Ms: number
}

export const DEFAULT_VIABILITY_CRITERIA: ViabilityCriteria = {
  targetPassRate: 0.8,
  minRunsForVerdict: 10,
  useCiLowerBound: false,
  maxFailureStreak: 3,
  latencyP50Ms: 180_000,
  latencyP95Ms: 420_000,
}

export interface ReportTotals {
  blocked: number
  challenges: number
  challengesSolved: number
  solverFailures: number
  timeouts: number
  enriched: number
  failed: number
  skipped: number
}

export interface ViabilityReport {
  criteria: ViabilityCriteria
  runs: readonly RunMetrics[]
  total: number
  passes: number
  passRate: number
  passRateCi: { low: number; high: number }
  durationP50Ms: number | null
  durationP95Ms: number | null
  longestSuccessStreak: number
  longestFailureStreak: number
  totals: ReportTotals
  stabilityOk: boolean
  latencyOk: boolean
  verdict: Verdict
}

/**
 * Wilson score interval for a binomial proportion. [0, 0] when n is 0.
 */
export function wilsonInterval(successes: number, n: number, z = 1.96): { low: number; high: number } {
  if (n <= 0) return { low: 0, high: 0 }
  const phat = successes / n
  const z2 = z * z
  const denom = 1 + z2 / n
  const center = (phat + z2 / (2 * n)) / denom
  const radius = (z * Math.sqrt((phat * (1 - phat) + z2 / (4 * n)) / n)) / denom
  return { low: Math.max(0, center - radius), high: Math.min(1, center + radius) }
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  if (sorted.length % 2 === 1) return sorted[mid]
  return (sorted[mid - 1] + sorted[mid]) / 2
}

/** Linear interpolation between closest ranks */
export function percentile(values: readonly number[], p: number): number | null {
  if (values.length === 0) return null
  if (p <= 0) return Math.min(...values)
  if (p >= 100) return Math.max(...values)

  const sorted = [...values].sort((a, b) => a - b)
  const k = (sorted.length - 1) * (p / 100)
  const lower = Math.floor(k)
  const upper = Math.ceil(k)
  if (lower === upper) return sorted[k]
  return sorted[lower] * (upper - k) + sorted[upper] * (k - lower)
}

export function buildViabilityReport(
  runs: readonly RunMetrics[],
  criteria: Partial<ViabilityCriteria> = {}
): ViabilityReport {
  const c: ViabilityCriteria = { ...DEFAULT_VIABILITY_CRITERIA, ...criteria }
  const flags = runs.map(isPassingRun)
  const total = runs.length
  const passes = flags.filter(Boolean).length
  const passRate = total === 0 ? 0 : passes / total
  const passRateCi = wilsonInterval(passes, total)

  const durations = runs.map((run) => run.durationMs)
  const durationP50Ms = median(durations)
  const durationP95Ms = percentile(durations, 95)

  const longestSuccessStreak = longestStreak(flags, true)
  const longestFailureStreak = longestStreak(flags, false)

  const totals: ReportTotals = {
    blocked: 0,
    challenges: 0,
    challengesSolved: 0,
    solverFailures: 0,
    timeouts: 0,
    enriched: 0,
    failed: 0,
    skipped: 0,
  }
  for (const run of runs) {
    totals.blocked += run.blockedCount
    totals.challenges += run.challengeCount
    totals.challengesSolved += run.challengeSolvedCount
    totals.solverFailures += run.solverFailedCount
    totals.timeouts += run.timeoutCount
    totals.enriched += run.itemsEnriched
    totals.failed += run.itemsFailed
    totals.skipped += run.itemsSkipped
  }

  const stabilityOk = longestFailureStreak < c.maxFailureStreak
  const latencyOk =
    durationP50Ms === null ||
    durationP95Ms === null ||
    (durationP50Ms <= c.latencyP50Ms && durationP95Ms <= c.latencyP95Ms)

  let verdict: Verdict = 'CONDITIONAL'
  if (total >= c.minRunsForVerdict) {
    const basis = c.useCiLowerBound ? passRateCi.low : passRate
    verdict = basis >= c.targetPassRate && stabilityOk && latencyOk ? 'GO' : 'NO-GO'
  }

  return {
    criteria: c,
    runs,
    total,
    passes,
    passRate,
    passRateCi,
    durationP50Ms,
    durationP95Ms,
    longestSuccessStreak,
    longestFailureStreak,
    totals,
    stabilityOk,
    latencyOk,
    verdict,
  }
}

const pct = (value: number) => `${(value * 100).toFixed(1)}%`
const seconds = (ms: number) => `${(ms / 1000).toFixed(1)}s`

export interface RenderReportOptions {
  title: string
  generatedAt?: Date
}

export function renderViabilityReport(report: ViabilityReport, options: RenderReportOptions): string {
  const c = report.criteria
  const generatedAt = (options.generatedAt ?? new Date()).toISOString()
  const lines: string[] = []

  lines.push(`# ${options.title}`)
  lines.push('')
  lines.push(`**Generated:** ${generatedAt}  `)
  lines.push(`**Runs:** ${report.total}  `)
  lines.push(`**Target Pass Rate:** ${pct(c.targetPassRate)}  `)
  lines.push(
    `**Pass Rate (95% CI, Wilson):** ${pct(report.passRate)} (CI: ${pct(report.passRateCi.low)} - ${pct(report.passRateCi.high)})`
  )
  lines.push('')
  lines.push('## Criteria')
  lines.push('')
  lines.push(`- Minimum runs for a verdict: **${c.minRunsForVerdict}**`)
  lines.push(`- Pass threshold: **${pct(c.targetPassRate)}** (basis: ${c.useCiLowerBound ? 'CI lower bound' : 'point estimate'})`)
  lines.push(`- Stability gate: longest failure streak **< ${c.maxFailureStreak}**`)
  lines.push(`- Latency gate: p50 <= **${seconds(c.latencyP50Ms)}**, p95 <= **${seconds(c.latencyP95Ms)}**`)
  lines.push('')
  lines.push('## Results')
  lines.push('')
  lines.push(`- Passes: **${report.passes}/${report.total}** (pass = at least one new item)`)
  if (report.durationP50Ms !== null) lines.push(`- Duration p50: **${seconds(report.durationP50Ms)}**`)
  if (report.durationP95Ms !== null) lines.push(`- Duration p95: **${seconds(report.durationP95Ms)}**`)
  if (report.total > 0) {
    lines.push(`- Longest success streak: **${report.longestSuccessStreak}**`)
    lines.push(`- Longest failure streak: **${report.longestFailureStreak}**`)
  }
  lines.push(`- Blocked (sum): **${report.totals.blocked}**`)
  lines.push(`- Challenges (sum): **${report.totals.challenges}**`)
  lines.push(`- Challenges solved (sum): **${report.totals.challengesSolved}**`)
  lines.push(`- Solver failures (sum): **${report.totals.solverFailures}**`)
  lines.push(`- Timeouts (sum): **${report.totals.timeouts}**`)
  lines.push('')
  lines.push('## Runs')
  lines.push('')
  lines.push('| Run | Pass | New items | Mode | Status | Duration | Coverage | Blocked | Challenges | Solved | Solver failures |')
  lines.push('|---:|:---:|---:|---|---|---:|---:|---:|---:|---:|---:|')
  report.runs.forEach((run, index) => {
    const coverage = enrichmentCoverage(run)
    lines.push(
      `| ${index + 1} | ${isPassingRun(run) ? 'yes' : 'no'} | ${run.itemsSeen - run.itemsDeduped} | ${run.mode} | ` +
        `${run.status} | ${seconds(run.durationMs)} | ${coverage === null ? '-' : pct(coverage)} | ` +
        `${run.blockedCount} | ${run.challengeCount} | ${run.challengeSolvedCount} | ${run.solverFailedCount} |`
    )
  })
  lines.push('')
  lines.push('## Verdict')
  lines.push('')
  lines.push(`**${report.verdict}**`)
  lines.push('')
  if (report.verdict === 'CONDITIONAL') {
    lines.push(`Verdict is CONDITIONAL because measured runs (${report.total}) < minimum (${c.minRunsForVerdict}).`)
  } else {
    const basis = c.useCiLowerBound
      ? `CI lower bound (${pct(report.passRateCi.low)})`
      : `point estimate (${pct(report.passRate)})`
    lines.push(`Basis: ${basis} vs threshold ${pct(c.targetPassRate)}.`)
    lines.push(`Gates: stability=${report.stabilityOk ? 'PASS' : 'FAIL'}, latency=${report.latencyOk ? 'PASS' : 'FAIL'}.`)
  }
  lines.push('')

  return lines.join('\n')
}
