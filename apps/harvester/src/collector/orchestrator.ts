/**
 * Run Orchestrator
 *
 * Sequences one collection run:
 *
 *   idle -> collecting -> filtering -> enriching -> finalizing -> idle
 *
 * Any fatal error (store unavailable, fingerprint not persisted, egress
 * exhausted) moves the run to `aborted`. Finalizing still happens: every
 * run ends with a frozen RunMetrics snapshot, never with a bare exception.
 *
 * The orchestrator owns the fingerprint store. It is opened on the first
 * run and closed by close().
 */

import { createId } from '@paralleldrive/cuid2'
import { withLogContext, type ILogger } from '@boardwatch/logger'
import { loggers } from '../config/logger.js'
import type { QueueSettings } from '../config/settings.js'
import { createWorkflowLogger, type WorkflowLogger } from '../config/structured-log.js'
import type { SleepFn } from '../utils/sleep.js'
import { errorMessage, isFatalError } from './errors.js'
import { createItem, dedupeKey } from './keys.js'
import { RunMetricsAggregator } from './metrics/aggregator.js'
import { recordRunAborted, recordRunCompleted, writeRunMetricsJson } from './metrics/emit.js'
import { EnrichmentQueue } from './queue/enrichment-queue.js'
import type { ExtractorRegistry } from './registry.js'
import type {
  ChallengeSolver,
  CollectionMode,
  DetailFetcher,
  EnrichmentOutcome,
  FingerprintStore,
  Item,
  ItemCollector,
  RouteConfig,
  RunMetrics,
} from './types.js'

export type OrchestratorState = 'idle' | 'collecting' | 'filtering' | 'enriching' | 'finalizing' | 'aborted'

export interface RunOrchestratorOptions<TDetail> {
  collectors: readonly ItemCollector[]
  extractors: ExtractorRegistry
  fetcher: DetailFetcher<TDetail>
  /** Called once, on the first run */
  openStore: () => Promise<FingerprintStore>
  queue: QueueSettings
  /** Used only in escalated modes */
  challengeSolver?: ChallengeSolver
  /** `{timestamp}` is replaced per run. Empty or omitted: no file is written */
  runMetricsPathTemplate?: string
  onOutcome?: (outcome: EnrichmentOutcome<TDetail>) => void | Promise<void>
  now?: () => number
  sleep?: SleepFn
  logger?: ILogger
}

export interface RunOptions {
  mode?: CollectionMode
  route?: RouteConfig
  signal?: AbortSignal
  runId?: string
}

export interface RunResult<TDetail> {
  runId: string
  metrics: RunMetrics
  outcomes: EnrichmentOutcome<TDetail>[]
  /** Path of the written metrics JSON, if any */
  metricsPath?: string
  /** The error that aborted the run */
  error?: unknown
}

export class RunOrchestrator<TDetail = unknown> {
  private readonly options: RunOrchestratorOptions<TDetail>
  private readonly now: () => number
  private readonly log: ILogger
  private store: FingerprintStore | null = null
  private currentState: OrchestratorState = 'idle'
  private active = false
  private lastRouteId?: string

  constructor(options: RunOrchestratorOptions<TDetail>) {
    // Fail at construction, not mid-run, when a source has no extractor
    for (const collector of options.collectors) {
      options.extractors.require(collector.source)
    }
    this.options = options
    this.now = options.now ?? Date.now
    this.log = options.logger ?? loggers.orchestrator
  }

  get state(): OrchestratorState {
    return this.currentState
  }

  async run(runOptions: RunOptions = {}): Promise<RunResult<TDetail>> {
    if (this.active) {
      throw new Error('A run is already in progress')
    }
    this.active = true

    const runId = runOptions.runId ?? createId()
    try {
      return await withLogContext({ runId }, () => this.execute(runId, runOptions))
    } finally {
      this.active = false
    }
  }

  async close(): Promise<void> {
    const store = this.store
    this.store = null
    if (store) {
      await store.close()
    }
  }

  private async execute(runId: string, runOptions: RunOptions): Promise<RunResult<TDetail>> {
    const mode = runOptions.mode ?? 'direct'
    const route = runOptions.route
    const source = this.options.collectors.map((c) => c.source).join(',')
    const metrics = new RunMetricsAggregator({
      runId,
      source,
      mode,
      routeId: route?.id,
      now: this.now,
    })
    const wlog = createWorkflowLogger(this.log, {
      workflow: 'collect',
      stage: 'run',
      runId,
      source,
      mode,
      routeId: route?.id,
    })
    const outcomes: EnrichmentOutcome<TDetail>[] = []

    if (route && route.id !== this.lastRouteId) {
      metrics.recordEvent('route_switched', { from: this.lastRouteId, to: route.id })
    }
    this.lastRouteId = route?.id

    wlog.info('COLLECT_RUN_STARTED')

    try {
      this.transition('collecting')
      const store = await this.ensureStore()
      const items = await this.collect(runId, metrics, wlog, runOptions)

      this.transition('filtering')
      const fresh = await this.filter(items, store, metrics)
      wlog.child({ stage: 'filter' }).info('COLLECT_FILTERED', {
        seen: metrics.get('itemsSeen'),
        deduped: metrics.get('itemsDeduped'),
        fresh: fresh.length,
      })

      this.transition('enriching')
      await this.enrich(fresh, metrics, outcomes, runOptions)
    } catch (error) {
      this.transition('aborted')
      metrics.recordEvent('run_aborted', { reason: errorMessage(error) })
      const snapshot = metrics.complete('aborted', errorMessage(error))
      recordRunAborted(snapshot, error)
      if (!isFatalError(error)) {
        wlog.error('COLLECT_RUN_UNEXPECTED_ERROR', {}, error)
      }
      const metricsPath = await this.persistSnapshot(snapshot, wlog)
      return { runId, metrics: snapshot, outcomes, metricsPath, error }
    }

    this.transition('finalizing')
    const cancelled = runOptions.signal?.aborted === true
    const snapshot = cancelled ? metrics.complete('aborted', 'cancelled') : metrics.complete('completed')
    if (!metrics.outcomesBalanced()) {
      wlog.warn('COLLECT_OUTCOMES_UNBALANCED', {
        enqueued: snapshot.itemsEnqueued,
        enriched: snapshot.itemsEnriched,
        failed: snapshot.itemsFailed,
        skipped: snapshot.itemsSkipped,
      })
    }
    recordRunCompleted(snapshot)
    const metricsPath = await this.persistSnapshot(snapshot, wlog)
    this.transition('idle')

    return { runId, metrics: snapshot, outcomes, metricsPath }
  }

  private async ensureStore(): Promise<FingerprintStore> {
    if (!this.store) {
      this.store = await this.options.openStore()
    }
    return this.store
  }

  /**
   * Run every collector concurrently and extract items. A collector that
   * throws a non-fatal error keeps what it produced; the run continues.
   */
  private async collect(
    runId: string,
    metrics: RunMetricsAggregator,
    wlog: WorkflowLogger,
    runOptions: RunOptions
  ): Promise<Item[]> {
    const batches = await Promise.all(
      this.options.collectors.map(async (collector) => {
        const extractor = this.options.extractors.require(collector.source)
        const clog = wlog.child({ stage: 'collect', source: collector.source })
        const items: Item[] = []

        try {
          for await (const raw of collector.collect({ runId, signal: runOptions.signal, route: runOptions.route })) {
            const result = extractor.extract(raw)
            if (!result.ok) {
              metrics.increment('itemsRejected')
              clog.debug('COLLECT_RECORD_REJECTED', { reason: result.reason })
              continue
            }
            metrics.increment('itemsSeen')
            items.push(createItem(collector.source, result.fields))
          }
        } catch (error) {
          if (isFatalError(error)) throw error
          metrics.recordEvent('collector_failed', { source: collector.source, reason: errorMessage(error) })
          clog.warn('COLLECT_SOURCE_FAILED', { collected: items.length }, error)
        }

        return items
      })
    )

    return batches.flat()
  }

  /**
   * Drop items already fingerprinted (by this or an earlier run) and
   * record the rest. Recording happens at first sight, before enrichment.
   */
  private async filter(items: Item[], store: FingerprintStore, metrics: RunMetricsAggregator): Promise<Item[]> {
    const fresh: Item[] = []
    const thisRun = new Set<string>()

    for (const item of items) {
      const key = dedupeKey(item)
      if (thisRun.has(key) || store.seen(key)) {
        metrics.increment('itemsDeduped')
        continue
      }
      thisRun.add(key)

      const outcome = await store.record(key, item.source, new Date(this.now()))
      if (outcome === 'duplicate') {
        // Another process recorded it between seen() and record()
        metrics.increment('itemsDeduped')
        continue
      }
      fresh.push(item)
    }

    return fresh
  }

  private async enrich(
    items: Item[],
    metrics: RunMetricsAggregator,
    outcomes: EnrichmentOutcome<TDetail>[],
    runOptions: RunOptions
  ): Promise<void> {
    const settings = this.options.queue
    const mode = runOptions.mode ?? 'direct'
    const queue = new EnrichmentQueue<TDetail>({
      concurrency: settings.concurrency,
      maxAttempts: settings.maxAttempts,
      backoff: settings.backoff,
      fetchTimeoutMs: settings.fetchTimeoutMs,
      metrics,
      challengeSolver: mode === 'direct' ? undefined : this.options.challengeSolver,
      route: runOptions.route,
      now: this.now,
      sleep: this.options.sleep,
    })

    const limit = settings.enrichmentEnabled ? (settings.enrichLimit ?? items.length) : 0
    const selected = items.slice(0, limit)
    const overflow = items.slice(limit)

    // Items over the limit still enter the queue so the outcome counts balance
    for (const item of overflow) queue.enqueue(item)
    const reason = settings.enrichmentEnabled ? 'enrich limit reached' : 'enrichment disabled'
    for (const outcome of queue.skipPending(reason)) {
      await this.deliver(outcome, outcomes, metrics)
    }

    for (const item of selected) queue.enqueue(item)
    if (selected.length === 0) return

    try {
      for await (const outcome of queue.run(this.options.fetcher, { signal: runOptions.signal })) {
        await this.deliver(outcome, outcomes, metrics)
      }
    } finally {
      // Left early on a fatal error: account for whatever is still waiting
      outcomes.push(...queue.skipPending('aborted'))
    }
  }

  /** A handler error is per-item: logged and recorded, never aborting the run */
  private async deliver(
    outcome: EnrichmentOutcome<TDetail>,
    outcomes: EnrichmentOutcome<TDetail>[],
    metrics: RunMetricsAggregator
  ): Promise<void> {
    outcomes.push(outcome)
    if (!this.options.onOutcome) return

    try {
      await this.options.onOutcome(outcome)
    } catch (error) {
      if (isFatalError(error)) throw error
      metrics.recordEvent('outcome_handler_failed', { key: outcome.key, reason: errorMessage(error) })
      this.log.warn('Outcome handler failed', { key: outcome.key, status: outcome.status }, error)
    }
  }

  private async persistSnapshot(snapshot: RunMetrics, wlog: WorkflowLogger): Promise<string | undefined> {
    const template = this.options.runMetricsPathTemplate
    if (!template) return undefined

    try {
      return await writeRunMetricsJson(snapshot, template, new Date(this.now()))
    } catch (error) {
      wlog.warn('COLLECT_METRICS_WRITE_FAILED', {}, error)
      return undefined
    }
  }

  private transition(next: OrchestratorState): void {
    const previous = this.currentState
    this.currentState = next
    this.log.debug('Run state changed', { from: previous, to: next })
  }
}
