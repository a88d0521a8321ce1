/**
 * Harvester settings
 *
 * Read from environment variables (see env.ts for .env.local loading) and
 * validated once. Invalid values raise ConfigurationError listing every
 * offending variable.
 */

import { z } from 'zod'
import { ConfigurationError } from '../collector/errors.js'
import type { BackoffPolicy, EscalationTargets } from '../collector/types.js'

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes')

const routeList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((route) => route.trim())
      .filter((route) => route.length > 0)
  )

const envSchema = z.object({
  ENRICH_CONCURRENCY: z.coerce.number().int().min(1, 'concurrency must be at least 1').default(3),
  ENRICH_MAX_ATTEMPTS: z.coerce.number().int().min(0).default(3),
  ENRICH_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(1000),
  ENRICH_BACKOFF_MAX_MS: z.coerce.number().int().min(0).default(30000),
  ENRICH_FETCH_TIMEOUT_MS: z.coerce.number().int().min(1).default(45000),
  ENRICH_LIMIT: z.coerce.number().int().min(0).optional(),
  ENRICH_ENABLED: booleanFromEnv.default('true'),

  FINGERPRINT_BACKEND: z.enum(['file', 'redis']).default('file'),
  FINGERPRINT_STORE_PATH: z.string().min(1).default('output/fingerprints.jsonl'),
  FINGERPRINT_REDIS_NAMESPACE: z.string().min(1).default('boardwatch:fingerprints'),

  ESCALATION_PASS_RATE_TARGET: z.coerce.number().min(0).max(1).default(0.85),
  ESCALATION_COVERAGE_TARGET: z.coerce.number().min(0).max(1).default(0.8),
  ESCALATION_MAX_FAILURE_STREAK: z.coerce.number().int().min(1).default(3),
  ESCALATION_BATCH_SIZE: z.coerce.number().int().min(1).default(10),
  CHALLENGE_SOLVING_ENABLED: booleanFromEnv.default('false'),
  ALTERNATE_ROUTES: routeList.default(''),

  EVALUATION_MAX_BATCHES: z.coerce.number().int().min(1).default(3),
  EVALUATION_RUN_DELAY_MS: z.coerce.number().int().min(0).default(0),
  EVALUATION_MIN_RUNS_FOR_VERDICT: z.coerce.number().int().min(1).default(10),

  RUN_METRICS_PATH_TEMPLATE: z.string().default('output/run_metrics_{timestamp}.json'),
})

export interface QueueSettings {
  concurrency: number
  maxAttempts: number
  backoff: BackoffPolicy
  fetchTimeoutMs: number
  enrichLimit?: number
  enrichmentEnabled: boolean
}

export interface StoreSettings {
  backend: 'file' | 'redis'
  path: string
  redisNamespace: string
}

export interface EscalationSettings {
  targets: EscalationTargets
  batchSize: number
  challengeSolvingEnabled: boolean
  alternateRoutes: string[]
}

export interface EvaluationSettings {
  maxBatches: number
  runDelayMs: number
  minRunsForVerdict: number
}

export interface HarvesterConfig {
  queue: QueueSettings
  store: StoreSettings
  escalation: EscalationSettings
  evaluation: EvaluationSettings
  /** Empty string disables writing run metrics to disk */
  runMetricsPathTemplate: string
}

/**
 * Validate environment variables into a typed config.
 * Empty strings count as unset so `FOO=` falls back to the default.
 *
 * @throws ConfigurationError
 */
export function loadHarvesterConfig(env: NodeJS.ProcessEnv = process.env): HarvesterConfig {
  const input: Record<string, string> = {}
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]
    if (value !== undefined && value.trim() !== '') {
      input[key] = value.trim()
    }
  }

  const parsed = envSchema.safeParse(input)
  if (!parsed.success) {
    throw ConfigurationError.fromZod(parsed.error, 'Invalid harvester configuration')
  }

  const e = parsed.data
  if (e.ENRICH_BACKOFF_MAX_MS < e.ENRICH_BACKOFF_BASE_MS) {
    throw new ConfigurationError(
      'Invalid harvester configuration: ENRICH_BACKOFF_MAX_MS must be >= ENRICH_BACKOFF_BASE_MS'
    )
  }

  const config: HarvesterConfig = {
    queue: {
      concurrency: e.ENRICH_CONCURRENCY,
      maxAttempts: e.ENRICH_MAX_ATTEMPTS,
      backoff: { baseDelayMs: e.ENRICH_BACKOFF_BASE_MS, maxDelayMs: e.ENRICH_BACKOFF_MAX_MS },
      fetchTimeoutMs: e.ENRICH_FETCH_TIMEOUT_MS,
      enrichLimit: e.ENRICH_LIMIT,
      enrichmentEnabled: e.ENRICH_ENABLED,
    },
    store: {
      backend: e.FINGERPRINT_BACKEND,
      path: e.FINGERPRINT_STORE_PATH,
      redisNamespace: e.FINGERPRINT_REDIS_NAMESPACE,
    },
    escalation: {
      targets: {
        passRateTarget: e.ESCALATION_PASS_RATE_TARGET,
        coverageTarget: e.ESCALATION_COVERAGE_TARGET,
        maxFailureStreak: e.ESCALATION_MAX_FAILURE_STREAK,
      },
      batchSize: e.ESCALATION_BATCH_SIZE,
      challengeSolvingEnabled: e.CHALLENGE_SOLVING_ENABLED,
      alternateRoutes: e.ALTERNATE_ROUTES,
    },
    evaluation: {
      maxBatches: e.EVALUATION_MAX_BATCHES,
      runDelayMs: e.EVALUATION_RUN_DELAY_MS,
      minRunsForVerdict: e.EVALUATION_MIN_RUNS_FOR_VERDICT,
    },
    runMetricsPathTemplate: env.RUN_METRICS_PATH_TEMPLATE === '' ? '' : e.RUN_METRICS_PATH_TEMPLATE,
  }

  return Object.freeze(config)
}
