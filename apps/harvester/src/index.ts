/**
 * Harvester - collection reliability engine
 *
 * Fingerprint store, enrichment queue, run metrics, escalation policy and
 * run orchestration. Collectors, detail fetchers and challenge solvers are
 * supplied by the caller.
 */

import './env.js'

export * from './collector/types.js'
export * from './collector/errors.js'
export { normalizeText, normalizeLink, deriveItemKey, dedupeKey, createItem } from './collector/keys.js'
export { ExtractorRegistry, createFieldMapExtractor } from './collector/registry.js'
export type { FieldMap, FieldMapExtractorOptions } from './collector/registry.js'
export * from './collector/store/index.js'
export { RunMetricsAggregator, emptyCounters } from './collector/metrics/aggregator.js'
export type { RunMetricsInit } from './collector/metrics/aggregator.js'
export {
  enrichmentCoverage,
  recordRunCompleted,
  recordRunAborted,
  recordEscalationDecided,
  recordRouteSwitched,
  renderMetricsPath,
  writeRunMetricsJson,
} from './collector/metrics/emit.js'
export { EnrichmentQueue, computeBackoffDelay, DEFAULT_FETCH_TIMEOUT_MS } from './collector/queue/enrichment-queue.js'
export type { EnrichmentQueueOptions, QueueRunOptions } from './collector/queue/enrichment-queue.js'
export {
  evaluateEscalation,
  isPassingRun,
  isDepletedRun,
  longestStreak,
  batchCoverage,
  nextModeFor,
} from './collector/escalation/policy.js'
export type { PolicyRun } from './collector/escalation/policy.js'
export { RoutePool } from './collector/escalation/route-pool.js'
export { RunOrchestrator } from './collector/orchestrator.js'
export type { OrchestratorState, RunOrchestratorOptions, RunOptions, RunResult } from './collector/orchestrator.js'
export { createRunOrchestrator } from './collector/setup.js'
export type { CollectorDependencies } from './collector/setup.js'
export { runEvaluation } from './collector/evaluation.js'
export type { BatchSummary, EvaluationOptions, EvaluationResult, EvaluationStopReason } from './collector/evaluation.js'
export {
  buildViabilityReport,
  renderViabilityReport,
  wilsonInterval,
  median,
  percentile,
  DEFAULT_VIABILITY_CRITERIA,
} from './collector/report.js'
export type { ViabilityCriteria, ViabilityReport, Verdict, ReportTotals, RenderReportOptions } from './collector/report.js'
export { detectChallenge } from './collector/fetch/challenge-detector.js'
export type { ChallengeSignal } from './collector/fetch/challenge-detector.js'
export { HttpDetailFetcher, DEFAULT_DETAIL_HEADERS } from './collector/fetch/http-detail-fetcher.js'
export type { HttpDetail, HttpDetailFetcherOptions } from './collector/fetch/http-detail-fetcher.js'
export { loadHarvesterConfig } from './config/settings.js'
export type {
  HarvesterConfig,
  QueueSettings,
  StoreSettings,
  EscalationSettings,
  EvaluationSettings,
} from './config/settings.js'
export { createRedisClient, redisConnection } from './config/redis.js'
export { logger, loggers } from './config/logger.js'
