/**
 * Run Metrics Aggregator
 *
 * Named counters for one run. Updates are synchronous, so concurrent queue
 * workers on the event loop cannot lose increments. snapshot() returns a
 * frozen copy; before complete() it is labeled partial.
 */

import type { ILogger } from '@boardwatch/logger'
import { loggers } from '../../config/logger.js'
import type {
  CollectionMode,
  RunCounter,
  RunCounters,
  RunEvent,
  RunMetrics,
  RunStatus,
} from '../types.js'

/** Oldest events are dropped past this many */
const MAX_EVENTS = 500

export interface RunMetricsInit {
  runId: string
  source: string
  mode: CollectionMode
  routeId?: string
  now?: () => number
  logger?: ILogger
}

const ZERO_COUNTERS: RunCounters = {
  itemsSeen: 0,
  itemsRejected: 0,
  itemsDeduped: 0,
  itemsEnqueued: 0,
  itemsEnriched: 0,
  itemsFailed: 0,
  itemsSkipped: 0,
  enrichmentAttempts: 0,
  transientFailures: 0,
  terminalFailures: 0,
  blockedCount: 0,
  challengeCount: 0,
  challengeSolvedCount: 0,
  solverFailedCount: 0,
  timeoutCount: 0,
}

export function emptyCounters(): RunCounters {
  return { ...ZERO_COUNTERS }
}

export class RunMetricsAggregator {
  readonly runId: string
  readonly source: string
  readonly mode: CollectionMode
  readonly routeId?: string

  private readonly counters: RunCounters = emptyCounters()
  private readonly events: RunEvent[] = []
  private readonly now: () => number
  private readonly log: ILogger
  private readonly startedAtMs: number
  private final: RunMetrics | null = null

  constructor(init: RunMetricsInit) {
    this.runId = init.runId
    this.source = init.source
    this.mode = init.mode
    this.routeId = init.routeId
    this.now = init.now ?? Date.now
    this.log = init.logger ?? loggers.metrics
    this.startedAtMs = this.now()
  }

  get isComplete(): boolean {
    return this.final !== null
  }

  increment(counter: RunCounter, amount = 1): void {
    if (this.final) {
      this.log.warn('Ignoring increment on finalized run metrics', { runId: this.runId, counter })
      return
    }
    this.counters[counter] += amount
  }

  get(counter: RunCounter): number {
    return this.counters[counter]
  }

  recordEvent(kind: string, data: Record<string, unknown> = {}): void {
    if (this.final) return

    const event: RunEvent = { t: new Date(this.now()).toISOString(), kind }
    for (const [key, value] of Object.entries(data)) {
      if (value !== undefined && value !== null) event[key] = value
    }
    this.events.push(event)
    if (this.events.length > MAX_EVENTS) {
      this.events.shift()
    }
  }

  /**
   * Freeze the run. Later increments are ignored. Calling twice returns
   * the first snapshot.
   */
  complete(status: Exclude<RunStatus, 'running'>, abortReason?: string): RunMetrics {
    if (this.final) return this.final
    this.final = this.build(status, false, abortReason)
    return this.final
  }

  snapshot(): RunMetrics {
    return this.final ?? this.build('running', true)
  }

  /**
   * enriched + failed + skipped must equal the number of items that
   * entered the queue.
   */
  outcomesBalanced(): boolean {
    const c = this.counters
    return c.itemsEnriched + c.itemsFailed + c.itemsSkipped === c.itemsEnqueued
  }

  private build(status: RunStatus, partial: boolean, abortReason?: string): RunMetrics {
    const endedAtMs = this.now()
    const metrics: RunMetrics = {
      ...this.counters,
      runId: this.runId,
      source: this.source,
      mode: this.mode,
      routeId: this.routeId,
      status,
      partial,
      startedAt: new Date(this.startedAtMs).toISOString(),
      endedAt: partial ? undefined : new Date(endedAtMs).toISOString(),
      durationMs: Math.max(0, endedAtMs - this.startedAtMs),
      abortReason,
      events: Object.freeze(this.events.map((event) => Object.freeze({ ...event }))),
    }
    return Object.freeze(metrics)
  }
}
