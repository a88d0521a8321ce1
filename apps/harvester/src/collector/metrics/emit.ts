/**
 * Collector Metrics Emission
 *
 * Structured log events only; no metrics backend. Run snapshots can also
 * be written to disk as JSON for the viability report.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { ILogger } from '@boardwatch/logger'
import { loggers } from '../../config/logger.js'
import type { CollectionMode, EscalationDecision, RunCounters, RunMetrics } from '../types.js'

const LOW_COVERAGE_ALERT_THRESHOLD = 0.5
const MIN_ITEMS_FOR_ALERT = 10

/**
 * Fraction of items that left enrichment enriched. null when no item
 * reached a fetch outcome.
 */
export function enrichmentCoverage(counters: Pick<RunCounters, 'itemsEnriched' | 'itemsFailed'>): number | null {
  const attempted = counters.itemsEnriched + counters.itemsFailed
  if (attempted === 0) return null
  return counters.itemsEnriched / attempted
}

function runSummary(metrics: RunMetrics) {
  return {
    runId: metrics.runId,
    source: metrics.source,
    mode: metrics.mode,
    routeId: metrics.routeId,
    status: metrics.status,
    itemsSeen: metrics.itemsSeen,
    itemsRejected: metrics.itemsRejected,
    itemsDeduped: metrics.itemsDeduped,
    itemsEnqueued: metrics.itemsEnqueued,
    itemsEnriched: metrics.itemsEnriched,
    itemsFailed: metrics.itemsFailed,
    itemsSkipped: metrics.itemsSkipped,
    blockedCount: metrics.blockedCount,
    challengeCount: metrics.challengeCount,
    challengeSolvedCount: metrics.challengeSolvedCount,
    solverFailedCount: metrics.solverFailedCount,
    timeoutCount: metrics.timeoutCount,
    coverage: enrichmentCoverage(metrics),
    durationMs: metrics.durationMs,
  }
}

export function recordRunCompleted(metrics: RunMetrics, log: ILogger = loggers.metrics): void {
  log.info('COLLECT_RUN_COMPLETED', {
    event_name: 'COLLECT_RUN_COMPLETED',
    ...runSummary(metrics),
  })

  const attempted = metrics.itemsEnriched + metrics.itemsFailed
  const coverage = enrichmentCoverage(metrics)
  if (attempted >= MIN_ITEMS_FOR_ALERT && coverage !== null && coverage < LOW_COVERAGE_ALERT_THRESHOLD) {
    log.warn('COLLECT_ALERT_LOW_COVERAGE', {
      event_name: 'COLLECT_ALERT_LOW_COVERAGE',
      runId: metrics.runId,
      source: metrics.source,
      coverage,
      attempted,
      threshold: LOW_COVERAGE_ALERT_THRESHOLD,
    })
  }
}

export function recordRunAborted(metrics: RunMetrics, error: unknown, log: ILogger = loggers.metrics): void {
  log.error(
    'COLLECT_RUN_ABORTED',
    {
      event_name: 'COLLECT_RUN_ABORTED',
      ...runSummary(metrics),
      abortReason: metrics.abortReason,
    },
    error
  )
}

export function recordEscalationDecided(
  payload: { decision: EscalationDecision; mode: CollectionMode; nextMode: CollectionMode; batch: number },
  log: ILogger = loggers.escalation
): void {
  const { decision, ...rest } = payload
  log.info('COLLECT_ESCALATION_DECIDED', {
    event_name: 'COLLECT_ESCALATION_DECIDED',
    ...rest,
    recommendation: decision.recommendation,
    passRate: decision.passRate,
    coverageRate: decision.coverageRate,
    longestFailureStreak: decision.longestFailureStreak,
    runs: decision.runs,
    depletedRuns: decision.depletedRuns,
    reason: decision.reason,
  })
}

export function recordRouteSwitched(
  payload: { fromRouteId?: string; toRouteId: string; batch: number },
  log: ILogger = loggers.escalation
): void {
  log.warn('COLLECT_ROUTE_SWITCHED', {
    event_name: 'COLLECT_ROUTE_SWITCHED',
    ...payload,
  })
}

/** YYYYMMDD_HHMMSS in UTC */
export function formatFileTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0')
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  )
}

export function renderMetricsPath(template: string, at: Date = new Date()): string {
  return template.split('{timestamp}').join(formatFileTimestamp(at))
}

/**
 * Write a snapshot as pretty JSON. Returns the path written.
 */
export async function writeRunMetricsJson(
  metrics: RunMetrics,
  template: string,
  at: Date = new Date()
): Promise<string> {
  const path = renderMetricsPath(template, at)
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, `${JSON.stringify(metrics, null, 2)}\n`, 'utf8')
  return path
}
