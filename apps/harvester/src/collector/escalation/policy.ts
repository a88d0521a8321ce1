/**
 * Escalation Policy
 *
 * Pure function of a batch of run metrics and targets. No I/O, no clock.
 *
 * Decision table, first match wins:
 *   1. longest failure streak >= maxFailureStreak  -> not_ready
 *   2. pass rate and coverage both on target       -> direct
 *   3. challenge solving available, unused         -> escalate_challenge_solving
 *   4. alternate route available, unused           -> escalate_alternate_route
 *   5. otherwise                                   -> not_ready
 *
 * "Unused" means no run in the batch was collected in that mode.
 */

import {
  DEFAULT_ESCALATION_TARGETS,
  type CollectionMode,
  type EscalationCapabilities,
  type EscalationDecision,
  type EscalationRecommendation,
  type EscalationTargets,
  type RunMetrics,
} from '../types.js'

/** The fields of a run the policy reads */
export type PolicyRun = Pick<
  RunMetrics,
  'itemsSeen' | 'itemsDeduped' | 'itemsEnriched' | 'itemsFailed' | 'mode' | 'status'
>

const NO_CAPABILITIES: EscalationCapabilities = {
  challengeSolvingAvailable: false,
  alternateRouteAvailable: false,
}

/**
 * A run passes when it produced at least one item that was not already
 * fingerprinted, whatever its final status.
 */
export function isPassingRun(run: Pick<PolicyRun, 'itemsSeen' | 'itemsDeduped'>): boolean {
  return run.itemsSeen - run.itemsDeduped >= 1
}

/** Saw items, but every one had been seen by an earlier run */
export function isDepletedRun(run: Pick<PolicyRun, 'itemsSeen' | 'itemsDeduped'>): boolean {
  return run.itemsSeen > 0 && run.itemsDeduped >= run.itemsSeen
}

/** Longest run of consecutive entries equal to `value` */
export function longestStreak(flags: readonly boolean[], value: boolean): number {
  let longest = 0
  let current = 0
  for (const flag of flags) {
    current = flag === value ? current + 1 : 0
    if (current > longest) longest = current
  }
  return longest
}

/**
 * Enriched items over items that reached a fetch outcome, summed across
 * the batch. 1 when nothing was attempted.
 */
export function batchCoverage(batch: readonly Pick<PolicyRun, 'itemsEnriched' | 'itemsFailed'>[]): number {
  let enriched = 0
  let attempted = 0
  for (const run of batch) {
    enriched += run.itemsEnriched
    attempted += run.itemsEnriched + run.itemsFailed
  }
  return attempted === 0 ? 1 : enriched / attempted
}

/**
 * @param batch runs in chronological order
 */
export function evaluateEscalation(
  batch: readonly PolicyRun[],
  targets: EscalationTargets = DEFAULT_ESCALATION_TARGETS,
  capabilities: EscalationCapabilities = NO_CAPABILITIES
): EscalationDecision {
  const runs = batch.length
  const passing = batch.map(isPassingRun)
  const passCount = passing.filter(Boolean).length
  const passRate = runs === 0 ? 0 : passCount / runs
  const coverageRate = batchCoverage(batch)
  const longestFailureStreak = longestStreak(passing, false)
  const depletedRuns = batch.filter(isDepletedRun).length

  const decide = (recommendation: EscalationRecommendation, reason: string): EscalationDecision => ({
    passRate,
    coverageRate,
    longestFailureStreak,
    recommendation,
    runs,
    depletedRuns,
    reason,
  })

  if (runs === 0) {
    return decide('not_ready', 'no runs in batch')
  }

  if (longestFailureStreak >= targets.maxFailureStreak) {
    return decide(
      'not_ready',
      `${longestFailureStreak} consecutive failing runs (max ${targets.maxFailureStreak})`
    )
  }

  if (passRate >= targets.passRateTarget && coverageRate >= targets.coverageTarget) {
    return decide('direct', 'pass rate and coverage on target')
  }

  const shortfall = describeShortfall(passRate, coverageRate, targets)
  const modesUsed = new Set<CollectionMode>(batch.map((run) => run.mode))

  if (capabilities.challengeSolvingAvailable && !modesUsed.has('challenge_solving')) {
    return decide('escalate_challenge_solving', shortfall)
  }

  if (capabilities.alternateRouteAvailable && !modesUsed.has('alternate_route')) {
    return decide('escalate_alternate_route', shortfall)
  }

  return decide('not_ready', `${shortfall}; no unused escalation left`)
}

function describeShortfall(passRate: number, coverageRate: number, targets: EscalationTargets): string {
  const parts: string[] = []
  if (passRate < targets.passRateTarget) {
    parts.push(`pass rate ${passRate.toFixed(2)} < ${targets.passRateTarget}`)
  }
  if (coverageRate < targets.coverageTarget) {
    parts.push(`coverage ${coverageRate.toFixed(2)} < ${targets.coverageTarget}`)
  }
  return parts.join(', ')
}

/**
 * Mode for the next batch. `direct` keeps the current mode: a batch that
 * only met targets after escalating is not de-escalated. not_ready has no
 * next mode.
 */
export function nextModeFor(
  recommendation: EscalationRecommendation,
  current: CollectionMode
): CollectionMode | null {
  switch (recommendation) {
    case 'direct':
      return current
    case 'escalate_challenge_solving':
      return 'challenge_solving'
    case 'escalate_alternate_route':
      return 'alternate_route'
    case 'not_ready':
      return null
  }
}
