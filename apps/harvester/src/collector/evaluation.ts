/**
 * Reliability Evaluation
 *
 * Repeats collection runs in batches. After each batch the escalation
 * policy picks the next batch's mode: stay, turn on challenge solving, or
 * move to the next alternate egress route. Stops on not_ready, on a fatal
 * abort, on cancellation, or after maxBatches.
 *
 * An escalation counts as unused when the last batch did not run in that
 * mode, so a failing evaluation may alternate between challenge solving and
 * alternate routes. Each move to alternate_route takes a fresh route from
 * the pool; once the pool is spent the policy has nothing left and the
 * evaluation ends not_ready.
 */

import type { ILogger } from '@boardwatch/logger'
import { loggers } from '../config/logger.js'
import type { EscalationSettings, EvaluationSettings } from '../config/settings.js'
import { sleep as defaultSleep, type SleepFn } from '../utils/sleep.js'
import { EgressExhaustedError, errorMessage, isFatalError } from './errors.js'
import { evaluateEscalation, nextModeFor } from './escalation/policy.js'
import { RoutePool } from './escalation/route-pool.js'
import { recordEscalationDecided, recordRouteSwitched } from './metrics/emit.js'
import type { RunOrchestrator } from './orchestrator.js'
import type { CollectionMode, EscalationDecision, RouteConfig, RouteSwitcher, RunMetrics } from './types.js'

export type EvaluationStopReason = 'max_batches' | 'not_ready' | 'aborted' | 'cancelled'

export interface BatchSummary {
  batch: number
  mode: CollectionMode
  routeId?: string
  runs: RunMetrics[]
  decision: EscalationDecision
}

export interface EvaluationResult {
  batches: BatchSummary[]
  /** Every run, in order, across all batches */
  runs: RunMetrics[]
  stoppedBy: EvaluationStopReason
  /** Mode the next batch would have used */
  finalMode: CollectionMode
  error?: unknown
}

export interface EvaluationOptions<TDetail> {
  orchestrator: RunOrchestrator<TDetail>
  settings: EvaluationSettings
  escalation: EscalationSettings
  /** Defaults to the configured alternate route ids */
  routes?: RoutePool
  routeSwitcher?: RouteSwitcher
  initialMode?: CollectionMode
  signal?: AbortSignal
  sleep?: SleepFn
  logger?: ILogger
}

export async function runEvaluation<TDetail>(options: EvaluationOptions<TDetail>): Promise<EvaluationResult> {
  const { orchestrator, settings, escalation, signal } = options
  const routes = options.routes ?? RoutePool.fromIds(escalation.alternateRoutes)
  const wait = options.sleep ?? defaultSleep
  const log = options.logger ?? loggers.evaluation

  const batches: BatchSummary[] = []
  const allRuns: RunMetrics[] = []
  let mode: CollectionMode = options.initialMode ?? 'direct'
  let route: RouteConfig | undefined

  const finish = (stoppedBy: EvaluationStopReason, error?: unknown): EvaluationResult => {
    log.info('Evaluation finished', { stoppedBy, batches: batches.length, runs: allRuns.length, finalMode: mode })
    return { batches, runs: allRuns, stoppedBy, finalMode: mode, error }
  }

  for (let batch = 1; batch <= settings.maxBatches; batch++) {
    const runs: RunMetrics[] = []
    let fatal: unknown

    for (let index = 0; index < escalation.batchSize; index++) {
      if (signal?.aborted) break

      if (allRuns.length > 0 && settings.runDelayMs > 0) {
        await wait(settings.runDelayMs, signal)
        if (signal?.aborted) break
      }

      const result = await orchestrator.run({ mode, route, signal })
      runs.push(result.metrics)
      allRuns.push(result.metrics)

      if (result.error !== undefined && isFatalError(result.error)) {
        fatal = result.error
        break
      }
    }

    const decision = evaluateEscalation(runs, escalation.targets, {
      challengeSolvingAvailable: escalation.challengeSolvingEnabled,
      alternateRouteAvailable: !routes.isExhausted(),
    })
    batches.push({ batch, mode, routeId: route?.id, runs, decision })

    if (fatal !== undefined) {
      log.error('Evaluation aborted by fatal run error', { batch, error: errorMessage(fatal) })
      return finish('aborted', fatal)
    }
    if (signal?.aborted) {
      return finish('cancelled')
    }

    const nextMode = nextModeFor(decision.recommendation, mode)
    recordEscalationDecided({ decision, mode, nextMode: nextMode ?? mode, batch })

    if (nextMode === null) {
      return finish('not_ready')
    }

    if (decision.recommendation === 'escalate_alternate_route') {
      const nextRoute = routes.next()
      if (!nextRoute) {
        return finish('aborted', new EgressExhaustedError('No unused alternate route left', { batch }))
      }
      try {
        await options.routeSwitcher?.switchRoute(nextRoute)
      } catch (error) {
        log.error('Route switch failed', { batch, routeId: nextRoute.id }, error)
        return finish('aborted', error)
      }
      recordRouteSwitched({ fromRouteId: route?.id, toRouteId: nextRoute.id, batch })
      route = nextRoute
    }

    mode = nextMode
  }

  return finish('max_batches')
}
