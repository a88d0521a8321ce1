/**
 * Collector Core Types
 *
 * Items, queue entries, fetch results, run metrics and escalation decisions
 * shared by the fingerprint store, enrichment queue, policy engine and
 * run orchestrator.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Items
// ═══════════════════════════════════════════════════════════════════════════════

export type EnrichmentStatus = 'pending' | 'in_progress' | 'enriched' | 'failed' | 'skipped'

/**
 * A candidate record. The payload is opaque to the core.
 *
 * IMPORTANT: when `naturalKey` is present it is the dedupe key of record;
 * `derivedKey` is only used for items without one.
 */
export interface Item {
  /** Source-provided id (e.g. a board's posting id) */
  naturalKey?: string

  /** sha256 of normalized title|organization|location|link */
  derivedKey: string

  /** Source identifier (extractor id) */
  source: string

  /** Link used by detail fetchers, if the source provides one */
  link?: string

  payload: Record<string, unknown>

  status: EnrichmentStatus
}

/**
 * Fields a source extractor pulls out of a raw record.
 * Everything not needed for identity stays in `payload`.
 */
export interface ExtractedFields {
  naturalKey?: string
  title?: string
  organization?: string
  location?: string
  link?: string
  payload: Record<string, unknown>
}

export type RawRecord = Record<string, unknown>

export type ExtractResult =
  | { ok: true; fields: ExtractedFields }
  | { ok: false; reason: string }

/**
 * Per-source extraction capability, selected by source id.
 */
export interface SourceExtractor {
  readonly id: string
  extract(raw: RawRecord): ExtractResult
}

export interface CollectContext {
  runId: string
  signal?: AbortSignal
  route?: RouteConfig
}

/**
 * Collection capability for one source (search pages, feeds, APIs).
 * Several collectors may feed the same run.
 */
export interface ItemCollector {
  readonly source: string
  collect(ctx: CollectContext): AsyncIterable<RawRecord> | Iterable<RawRecord>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fingerprints
// ═══════════════════════════════════════════════════════════════════════════════

export interface FingerprintRecord {
  key: string
  source: string
  /** ISO 8601 */
  firstSeen: string
}

export type RecordOutcome = 'recorded' | 'duplicate'

export interface FingerprintLoadStats {
  loaded: number
  skipped: number
}

/**
 * Cross-run set of seen item keys.
 *
 * `record` resolves 'duplicate' for keys already present and rejects with
 * FingerprintPersistError when the write did not reach storage.
 */
export interface FingerprintStore {
  seen(key: string): boolean
  record(key: string, source: string, timestamp?: Date): Promise<RecordOutcome>
  count(): number
  readonly loadStats: FingerprintLoadStats
  close(): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Detail fetching
// ═══════════════════════════════════════════════════════════════════════════════

export type FetchFailureKind = 'transient' | 'terminal' | 'blocked' | 'challenge_detected'

export type FetchFailureCause =
  | 'timeout'
  | 'rate_limited'
  | 'network'
  | 'server_error'
  | 'not_found'
  | 'invalid_target'
  | 'forbidden'
  | 'challenge'
  | 'unknown'

export interface FetchFailure {
  kind: FetchFailureKind
  cause?: FetchFailureCause
  message: string
  statusCode?: number
}

export type FetchDetailResult<TDetail> =
  | { ok: true; detail: TDetail }
  | { ok: false; error: FetchFailure }

export interface FetchContext {
  attempt: number
  /** Aborted when the per-item hard timeout elapses */
  signal: AbortSignal
  route?: RouteConfig
}

/**
 * Detail capability supplied by a collaborator (HTTP, browser, API client).
 * Failures are returned, not thrown.
 */
export interface DetailFetcher<TDetail> {
  fetchDetail(item: Item, ctx: FetchContext): Promise<FetchDetailResult<TDetail>>
}

export interface ChallengeContext {
  itemKey: string
  source: string
  attempt: number
  failure: FetchFailure
  route?: RouteConfig
}

export type SolveResult = { ok: true } | { ok: false; reason: string }

export interface ChallengeSolver {
  solve(ctx: ChallengeContext): Promise<SolveResult>
}

export interface RouteConfig {
  id: string
  [setting: string]: unknown
}

export interface RouteSwitcher {
  switchRoute(route: RouteConfig): Promise<void> | void
}

// ═══════════════════════════════════════════════════════════════════════════════
// Enrichment queue
// ═══════════════════════════════════════════════════════════════════════════════

export interface QueueItem {
  key: string
  item: Item
  attemptCount: number
  maxAttempts: number
  /** Epoch ms */
  nextEligibleAt: number
  lastError?: FetchFailure
}

export type TerminalStatus = 'enriched' | 'failed' | 'skipped'

export type EnrichmentOutcome<TDetail> =
  | { status: 'enriched'; key: string; item: Item; attempts: number; detail: TDetail }
  | { status: 'failed'; key: string; item: Item; attempts: number; error: FetchFailure }
  | { status: 'skipped'; key: string; item: Item; attempts: number; reason: string }

export interface BackoffPolicy {
  baseDelayMs: number
  maxDelayMs: number
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run metrics
// ═══════════════════════════════════════════════════════════════════════════════

export const RUN_COUNTERS = [
  'itemsSeen',
  'itemsRejected',
  'itemsDeduped',
  'itemsEnqueued',
  'itemsEnriched',
  'itemsFailed',
  'itemsSkipped',
  'enrichmentAttempts',
  'transientFailures',
  'terminalFailures',
  'blockedCount',
  'challengeCount',
  'challengeSolvedCount',
  'solverFailedCount',
  'timeoutCount',
] as const

export type RunCounter = (typeof RUN_COUNTERS)[number]

export type RunCounters = Record<RunCounter, number>

export type CollectionMode = 'direct' | 'challenge_solving' | 'alternate_route'

export type RunStatus = 'running' | 'completed' | 'aborted'

export interface RunEvent {
  /** ISO 8601 */
  t: string
  kind: string
  [key: string]: unknown
}

/**
 * Frozen counters for one run. `partial` is true for snapshots taken
 * before the run was finalized.
 */
export interface RunMetrics extends RunCounters {
  runId: string
  source: string
  mode: CollectionMode
  routeId?: string
  status: RunStatus
  partial: boolean
  startedAt: string
  endedAt?: string
  durationMs: number
  abortReason?: string
  events: readonly RunEvent[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Escalation
// ═══════════════════════════════════════════════════════════════════════════════

export type EscalationRecommendation =
  | 'direct'
  | 'escalate_challenge_solving'
  | 'escalate_alternate_route'
  | 'not_ready'

export interface EscalationTargets {
  passRateTarget: number
  coverageTarget: number
  maxFailureStreak: number
}

export const DEFAULT_ESCALATION_TARGETS: EscalationTargets = {
  passRateTarget: 0.85,
  coverageTarget: 0.8,
  maxFailureStreak: 3,
}

export interface EscalationCapabilities {
  challengeSolvingAvailable: boolean
  alternateRouteAvailable: boolean
}

export interface EscalationDecision {
  passRate: number
  coverageRate: number
  longestFailureStreak: number
  recommendation: EscalationRecommendation
  runs: number
  /** Runs that saw items but every one was already fingerprinted */
  depletedRuns: number
  reason: string
}
