import type { HarvesterConfig } from '../config/settings.js'
import { RunOrchestrator, type RunOrchestratorOptions } from './orchestrator.js'
import { openFingerprintStore, type FingerprintRedisClient } from './store/index.js'

export type CollectorDependencies<TDetail> = Pick<
  RunOrchestratorOptions<TDetail>,
  'collectors' | 'extractors' | 'fetcher' | 'challengeSolver' | 'onOutcome' | 'now' | 'sleep' | 'logger'
> & {
  /** Shared client for the redis fingerprint backend */
  redisClient?: FingerprintRedisClient
}

/**
 * Wire an orchestrator from loaded settings. Challenge solving is only
 * handed to the orchestrator when enabled in config.
 */
export function createRunOrchestrator<TDetail>(
  config: HarvesterConfig,
  deps: CollectorDependencies<TDetail>
): RunOrchestrator<TDetail> {
  const { redisClient, challengeSolver, ...rest } = deps
  return new RunOrchestrator<TDetail>({
    ...rest,
    challengeSolver: config.escalation.challengeSolvingEnabled ? challengeSolver : undefined,
    openStore: () => openFingerprintStore(config.store, { redisClient }),
    queue: config.queue,
    runMetricsPathTemplate: config.runMetricsPathTemplate,
  })
}
