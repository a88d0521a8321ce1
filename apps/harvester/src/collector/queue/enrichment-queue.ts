/**
 * Enrichment Queue
 *
 * Bounded worker pool that fetches detail for new items. Each item ends in
 * exactly one terminal outcome (enriched, failed or skipped), streamed to
 * the caller as it happens.
 *
 * Failure handling:
 * - terminal: failed immediately
 * - transient, blocked: retried with exponential backoff until maxAttempts
 * - challenge_detected: if a solver is configured and it succeeds, retried
 *   at once; otherwise treated like blocked
 *
 * Claiming an item is synchronous, so no two workers ever hold the same key.
 */

import type { ILogger } from '@boardwatch/logger'
import { loggers } from '../../config/logger.js'
import { sleep as defaultSleep, type SleepFn } from '../../utils/sleep.js'
import { ConfigurationError, classifyThrown, errorMessage, isFatalError } from '../errors.js'
import { dedupeKey } from '../keys.js'
import type { RunMetricsAggregator } from '../metrics/aggregator.js'
import {
  DEFAULT_BACKOFF,
  type BackoffPolicy,
  type ChallengeSolver,
  type DetailFetcher,
  type EnrichmentOutcome,
  type FetchDetailResult,
  type FetchFailure,
  type Item,
  type QueueItem,
  type RouteConfig,
} from '../types.js'

export const DEFAULT_FETCH_TIMEOUT_MS = 45_000

export interface EnrichmentQueueOptions {
  /** Upper bound on in-flight fetches; must be >= 1 */
  concurrency: number
  /** 0 is treated as a single attempt */
  maxAttempts: number
  backoff?: BackoffPolicy
  /** Hard upper bound on one fetch attempt */
  fetchTimeoutMs?: number
  metrics?: RunMetricsAggregator
  challengeSolver?: ChallengeSolver
  route?: RouteConfig
  now?: () => number
  sleep?: SleepFn
  logger?: ILogger
}

export interface QueueRunOptions {
  /** Stops dispatch; in-flight fetches finish, waiting items are skipped */
  signal?: AbortSignal
}

/**
 * Delay before the next attempt, given how many attempts have been made.
 */
export function computeBackoffDelay(attemptCount: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
  const delay = policy.baseDelayMs * 2 ** attemptCount
  return Math.min(delay, policy.maxDelayMs)
}

type AttemptResult<TDetail> = FetchDetailResult<TDetail> | { ok: false; fatal: unknown }

type Emit<TDetail> = (outcome: EnrichmentOutcome<TDetail>) => void

export class EnrichmentQueue<TDetail = unknown> {
  readonly concurrency: number
  readonly maxAttempts: number

  private readonly backoff: BackoffPolicy
  private readonly fetchTimeoutMs: number
  private readonly metrics?: RunMetricsAggregator
  private readonly challengeSolver?: ChallengeSolver
  private readonly route?: RouteConfig
  private readonly now: () => number
  private readonly sleep: SleepFn
  private readonly log: ILogger

  private readonly waiting: QueueItem[] = []
  private readonly inFlight = new Set<string>()
  private readonly known = new Set<string>()
  private waiters: Array<() => void> = []
  private running = false
  private stopping = false
  private fatal: { error: unknown } | null = null

  constructor(options: EnrichmentQueueOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new ConfigurationError(`Enrichment concurrency must be an integer >= 1, got ${options.concurrency}`, {
        concurrency: options.concurrency,
      })
    }
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 0) {
      throw new ConfigurationError(`Enrichment maxAttempts must be an integer >= 0, got ${options.maxAttempts}`, {
        maxAttempts: options.maxAttempts,
      })
    }

    this.concurrency = options.concurrency
    this.maxAttempts = Math.max(1, options.maxAttempts)
    this.backoff = options.backoff ?? DEFAULT_BACKOFF
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
    this.metrics = options.metrics
    this.challengeSolver = options.challengeSolver
    this.route = options.route
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
    this.log = options.logger ?? loggers.queue
  }

  /** Items waiting for a worker (not counting in-flight) */
  get pendingCount(): number {
    return this.waiting.length
  }

  get inFlightCount(): number {
    return this.inFlight.size
  }

  /**
   * Add an item. Returns false if the same key was already enqueued on
   * this queue.
   */
  enqueue(item: Item): boolean {
    const key = dedupeKey(item)
    if (this.known.has(key)) return false

    this.known.add(key)
    item.status = 'pending'
    this.waiting.push({
      key,
      item,
      attemptCount: 0,
      maxAttempts: this.maxAttempts,
      nextEligibleAt: this.now(),
    })
    this.metrics?.increment('itemsEnqueued')
    this.wake()
    return true
  }

  /**
   * Remove every waiting item and mark it skipped. In-flight items are
   * left alone.
   */
  skipPending(reason: string): EnrichmentOutcome<TDetail>[] {
    const drained = this.waiting.splice(0, this.waiting.length)
    return drained.map((entry) => this.finishSkipped(entry, reason))
  }

  /**
   * Drain the queue through `fetcher`, yielding one outcome per item.
   *
   * Completes when every item is terminal. On cancellation, or when a
   * collaborator throws a fatal error, dispatch stops, in-flight attempts
   * finish, and every remaining item is yielded as skipped. A fatal error
   * is rethrown after the last outcome.
   */
  async *run(
    fetcher: DetailFetcher<TDetail>,
    options: QueueRunOptions = {}
  ): AsyncGenerator<EnrichmentOutcome<TDetail>, void, undefined> {
    if (this.running) {
      throw new Error('EnrichmentQueue is already running')
    }
    this.running = true

    const { signal } = options
    const buffer: EnrichmentOutcome<TDetail>[] = []
    const state = { finished: false }
    let notify: (() => void) | null = null

    const signalConsumer = () => {
      const resolve = notify
      notify = null
      resolve?.()
    }
    const emit: Emit<TDetail> = (outcome) => {
      buffer.push(outcome)
      signalConsumer()
    }
    const onAbort = () => this.wake()
    signal?.addEventListener('abort', onAbort, { once: true })

    const workers = Array.from({ length: this.concurrency }, (_, index) =>
      this.work(index, fetcher, emit, signal)
    )
    const settled = Promise.all(workers).then(() => {
      state.finished = true
      signalConsumer()
    })

    try {
      for (;;) {
        const next = buffer.shift()
        if (next) {
          yield next
          continue
        }
        if (state.finished) break
        await new Promise<void>((resolve) => {
          notify = resolve
        })
      }

      if (this.waiting.length > 0) {
        const reason = this.fatal ? 'aborted' : 'cancelled'
        this.log.info('Skipping items left in queue', { reason, count: this.waiting.length })
        for (const outcome of this.skipPending(reason)) {
          yield outcome
        }
      }

      if (this.fatal) {
        throw this.fatal.error
      }
    } finally {
      this.stopping = true
      this.wake()
      await settled
      signal?.removeEventListener('abort', onAbort)
      this.running = false
      this.stopping = false
      this.fatal = null
    }
  }

  private async work(
    workerId: number,
    fetcher: DetailFetcher<TDetail>,
    emit: Emit<TDetail>,
    signal?: AbortSignal
  ): Promise<void> {
    for (;;) {
      if (this.stopping || signal?.aborted) return

      const now = this.now()
      const entry = this.claim(now)
      if (entry) {
        await this.process(workerId, entry, fetcher, emit)
        continue
      }

      if (this.waiting.length === 0) {
        if (this.inFlight.size === 0) {
          // Nothing left anywhere: let idle siblings exit too
          this.wake()
          return
        }
        await this.waitForChange()
        continue
      }

      const delay = Math.max(0, this.earliestEligibleAt() - now)
      await this.waitUntil(delay)
    }
  }

  private claim(now: number): QueueItem | null {
    const index = this.waiting.findIndex((entry) => entry.nextEligibleAt <= now && !this.inFlight.has(entry.key))
    if (index === -1) return null

    const [entry] = this.waiting.splice(index, 1)
    this.inFlight.add(entry.key)
    return entry
  }

  private async process(
    workerId: number,
    entry: QueueItem,
    fetcher: DetailFetcher<TDetail>,
    emit: Emit<TDetail>
  ): Promise<void> {
    try {
      entry.attemptCount += 1
      entry.item.status = 'in_progress'
      this.metrics?.increment('enrichmentAttempts')
      this.log.debug('Fetching detail', { workerId, key: entry.key, attempt: entry.attemptCount })

      const result = await this.attempt(entry, fetcher)
      if ('fatal' in result) {
        throw result.fatal
      }

      if (result.ok) {
        emit(this.finishEnriched(entry, result.detail))
        return
      }

      const outcome = await this.handleFailure(entry, result.error)
      if (outcome) emit(outcome)
    } catch (error) {
      // Fatal collaborator error: stop dispatching, the run rethrows it
      this.fatal ??= { error }
      this.stopping = true
      this.log.error('Fatal error during enrichment', { key: entry.key }, error)
      emit(this.finishSkipped(entry, 'aborted'))
    } finally {
      this.inFlight.delete(entry.key)
      this.wake()
    }
  }

  /**
   * One fetch, bounded by the hard timeout. Never rejects: fatal errors
   * come back as a value so a late rejection after a timeout is not lost.
   *
   * A timed-out fetch that ignores its signal still holds the worker and
   * the key until it settles.
   */
  private async attempt(entry: QueueItem, fetcher: DetailFetcher<TDetail>): Promise<AttemptResult<TDetail>> {
    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined
    let timedOut = false

    const timeout = new Promise<AttemptResult<TDetail>>((resolve) => {
      timer = setTimeout(() => {
        timedOut = true
        controller.abort()
        resolve({
          ok: false,
          error: {
            kind: 'transient',
            cause: 'timeout',
            message: `Detail fetch exceeded ${this.fetchTimeoutMs}ms`,
          },
        })
      }, this.fetchTimeoutMs)
    })

    const fetching = this.invoke(entry, fetcher, controller.signal)

    try {
      const first = await Promise.race([fetching, timeout])
      if (!timedOut) return first

      const late = await fetching
      return 'fatal' in late ? late : first
    } finally {
      clearTimeout(timer)
    }
  }

  private async invoke(
    entry: QueueItem,
    fetcher: DetailFetcher<TDetail>,
    signal: AbortSignal
  ): Promise<AttemptResult<TDetail>> {
    try {
      return await fetcher.fetchDetail(entry.item, { attempt: entry.attemptCount, signal, route: this.route })
    } catch (error) {
      if (isFatalError(error)) {
        return { ok: false, fatal: error }
      }
      return { ok: false, error: classifyThrown(error) }
    }
  }

  /**
   * Returns the terminal outcome, or null when the item was put back for
   * another attempt.
   */
  private async handleFailure(entry: QueueItem, failure: FetchFailure): Promise<EnrichmentOutcome<TDetail> | null> {
    entry.lastError = failure
    this.countFailure(failure)

    switch (failure.kind) {
      case 'terminal':
        return this.finishFailed(entry, failure)

      case 'challenge_detected': {
        if (this.challengeSolver && (await this.solveChallenge(entry, failure))) {
          return this.retryOrFail(entry, failure, 0)
        }
        return this.retryOrFail(entry, failure, computeBackoffDelay(entry.attemptCount, this.backoff))
      }

      case 'blocked':
      case 'transient':
        return this.retryOrFail(entry, failure, computeBackoffDelay(entry.attemptCount, this.backoff))
    }
  }

  private async solveChallenge(entry: QueueItem, failure: FetchFailure): Promise<boolean> {
    const solver = this.challengeSolver
    if (!solver) return false

    try {
      const result = await solver.solve({
        itemKey: entry.key,
        source: entry.item.source,
        attempt: entry.attemptCount,
        failure,
        route: this.route,
      })
      if (result.ok) {
        this.metrics?.increment('challengeSolvedCount')
        this.metrics?.recordEvent('challenge_solved', { key: entry.key, attempt: entry.attemptCount })
        return true
      }
      this.metrics?.increment('solverFailedCount')
      this.metrics?.recordEvent('solver_failed', { key: entry.key, reason: result.reason })
      return false
    } catch (error) {
      if (isFatalError(error)) throw error
      this.metrics?.increment('solverFailedCount')
      this.metrics?.recordEvent('solver_failed', { key: entry.key, reason: errorMessage(error) })
      this.log.warn('Challenge solver threw', { key: entry.key }, error)
      return false
    }
  }

  private retryOrFail(entry: QueueItem, failure: FetchFailure, delayMs: number): EnrichmentOutcome<TDetail> | null {
    if (entry.attemptCount >= entry.maxAttempts) {
      return this.finishFailed(entry, failure)
    }

    entry.nextEligibleAt = this.now() + delayMs
    entry.item.status = 'pending'
    this.waiting.push(entry)
    this.log.debug('Retry scheduled', {
      key: entry.key,
      attempt: entry.attemptCount,
      delayMs,
      kind: failure.kind,
    })
    return null
  }

  private countFailure(failure: FetchFailure): void {
    const metrics = this.metrics
    if (!metrics) return

    switch (failure.kind) {
      case 'transient':
        metrics.increment('transientFailures')
        if (failure.cause === 'timeout') metrics.increment('timeoutCount')
        break
      case 'terminal':
        metrics.increment('terminalFailures')
        break
      case 'blocked':
        metrics.increment('blockedCount')
        break
      case 'challenge_detected':
        metrics.increment('challengeCount')
        break
    }
  }

  private finishEnriched(entry: QueueItem, detail: TDetail): EnrichmentOutcome<TDetail> {
    entry.item.status = 'enriched'
    this.metrics?.increment('itemsEnriched')
    return { status: 'enriched', key: entry.key, item: entry.item, attempts: entry.attemptCount, detail }
  }

  private finishFailed(entry: QueueItem, error: FetchFailure): EnrichmentOutcome<TDetail> {
    entry.item.status = 'failed'
    this.metrics?.increment('itemsFailed')
    this.log.warn('Enrichment failed', {
      key: entry.key,
      attempts: entry.attemptCount,
      kind: error.kind,
      cause: error.cause,
      statusCode: error.statusCode,
    })
    return { status: 'failed', key: entry.key, item: entry.item, attempts: entry.attemptCount, error }
  }

  private finishSkipped(entry: QueueItem, reason: string): EnrichmentOutcome<TDetail> {
    entry.item.status = 'skipped'
    this.metrics?.increment('itemsSkipped')
    return { status: 'skipped', key: entry.key, item: entry.item, attempts: entry.attemptCount, reason }
  }

  private earliestEligibleAt(): number {
    let earliest = Number.POSITIVE_INFINITY
    for (const entry of this.waiting) {
      if (entry.nextEligibleAt < earliest) earliest = entry.nextEligibleAt
    }
    return earliest
  }

  private waitForChange(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve)
    })
  }

  /** Sleep until `delayMs` passes or the queue changes, whichever is first */
  private async waitUntil(delayMs: number): Promise<void> {
    const controller = new AbortController()
    const changed = this.waitForChange().then(() => controller.abort())
    await Promise.race([this.sleep(delayMs, controller.signal), changed])
  }

  private wake(): void {
    const waiters = this.waiters
    this.waiters = []
    for (const resolve of waiters) resolve()
  }
}
