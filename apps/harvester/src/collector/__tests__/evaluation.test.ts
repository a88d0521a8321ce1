import { describe, expect, it, vi } from 'vitest'
import type { EscalationSettings, EvaluationSettings } from '../../config/settings.js'
import { StoreUnavailableError } from '../errors.js'
import { RoutePool } from '../escalation/route-pool.js'
import { runEvaluation } from '../evaluation.js'
import { RunOrchestrator } from '../orchestrator.js'
import { ExtractorRegistry, createFieldMapExtractor } from '../registry.js'
import type { FingerprintStore, ItemCollector, RawRecord } from '../types.js'
import { FakeClock, InMemoryFingerprintStore, createSilentLogger } from './helpers.js'

/** Run i yields one new posting when script[i] is true, nothing otherwise */
function scriptedCollector(script: boolean[]): ItemCollector {
  let runs = 0
  return {
    source: 'board-a',
    collect: (): RawRecord[] => {
      const index = runs++
      return script[index % script.length] ? [{ id: `post-${index}`, title: 'Engineer' }] : []
    },
  }
}

function createOrchestrator(
  script: boolean[],
  openStore: () => Promise<FingerprintStore> = async () => new InMemoryFingerprintStore()
) {
  const clock = new FakeClock()
  return new RunOrchestrator<string>({
    collectors: [scriptedCollector(script)],
    extractors: new ExtractorRegistry().register(
      createFieldMapExtractor({ id: 'board-a', fields: { naturalKey: 'id', title: 'title' } })
    ),
    fetcher: { fetchDetail: async () => ({ ok: true, detail: 'detail' }) },
    openStore,
    queue: {
      concurrency: 1,
      maxAttempts: 1,
      backoff: { baseDelayMs: 10, maxDelayMs: 10 },
      fetchTimeoutMs: 1000,
      enrichmentEnabled: true,
    },
    now: clock.now,
    sleep: clock.sleep,
    logger: createSilentLogger(),
  })
}

const SETTINGS: EvaluationSettings = { maxBatches: 2, runDelayMs: 0, minRunsForVerdict: 10 }

function escalation(overrides: Partial<EscalationSettings> = {}): EscalationSettings {
  return {
    targets: { passRateTarget: 0.85, coverageTarget: 0.8, maxFailureStreak: 3 },
    batchSize: 4,
    challengeSolvingEnabled: false,
    alternateRoutes: [],
    ...overrides,
  }
}

describe('runEvaluation', () => {
  it('keeps the direct mode while targets are met', async () => {
    const result = await runEvaluation({
      orchestrator: createOrchestrator([true]),
      settings: SETTINGS,
      escalation: escalation({ batchSize: 3 }),
      logger: createSilentLogger(),
    })

    expect(result.stoppedBy).toBe('max_batches')
    expect(result.runs).toHaveLength(6)
    expect(result.batches.map((b) => b.decision.recommendation)).toEqual(['direct', 'direct'])
    expect(result.finalMode).toBe('direct')
  })

  it('stops when a batch is not ready', async () => {
    const result = await runEvaluation({
      orchestrator: createOrchestrator([false]),
      settings: SETTINGS,
      escalation: escalation({ batchSize: 3, challengeSolvingEnabled: true }),
      logger: createSilentLogger(),
    })

    expect(result.stoppedBy).toBe('not_ready')
    expect(result.runs).toHaveLength(3)
    expect(result.batches[0].decision.reason).toBe('3 consecutive failing runs (max 3)')
  })

  it('escalates to challenge solving and then to an alternate route', async () => {
    const switchRoute = vi.fn()

    const result = await runEvaluation({
      orchestrator: createOrchestrator([true, false]),
      settings: SETTINGS,
      escalation: escalation({ challengeSolvingEnabled: true }),
      routes: RoutePool.fromIds(['route-a']),
      routeSwitcher: { switchRoute },
      logger: createSilentLogger(),
    })

    expect(result.batches.map((b) => [b.mode, b.decision.recommendation])).toEqual([
      ['direct', 'escalate_challenge_solving'],
      ['challenge_solving', 'escalate_alternate_route'],
    ])
    expect(result.batches[1].runs.every((run) => run.mode === 'challenge_solving')).toBe(true)
    expect(switchRoute).toHaveBeenCalledWith({ id: 'route-a' })
    expect(result.stoppedBy).toBe('max_batches')
    expect(result.finalMode).toBe('alternate_route')
  })

  it('alternates escalations until the route pool is spent', async () => {
    const switchRoute = vi.fn()

    const result = await runEvaluation({
      orchestrator: createOrchestrator([true, false]),
      settings: { ...SETTINGS, maxBatches: 10 },
      escalation: escalation({ challengeSolvingEnabled: true }),
      routes: RoutePool.fromIds(['route-a']),
      routeSwitcher: { switchRoute },
      logger: createSilentLogger(),
    })

    expect(result.batches.map((b) => [b.mode, b.routeId, b.decision.recommendation])).toEqual([
      ['direct', undefined, 'escalate_challenge_solving'],
      ['challenge_solving', undefined, 'escalate_alternate_route'],
      ['alternate_route', 'route-a', 'escalate_challenge_solving'],
      ['challenge_solving', 'route-a', 'not_ready'],
    ])
    expect(result.batches[3].decision.reason).toBe('pass rate 0.50 < 0.85; no unused escalation left')
    expect(switchRoute).toHaveBeenCalledTimes(1)
    expect(result.stoppedBy).toBe('not_ready')
  })

  it('runs later batches on the switched route', async () => {
    const result = await runEvaluation({
      orchestrator: createOrchestrator([true, false]),
      settings: { ...SETTINGS, maxBatches: 3 },
      escalation: escalation({ alternateRoutes: ['route-a'] }),
      logger: createSilentLogger(),
    })

    expect(result.batches[0].decision.recommendation).toBe('escalate_alternate_route')
    expect(result.batches[1].routeId).toBe('route-a')
    expect(result.batches[1].runs[0].routeId).toBe('route-a')
    expect(result.stoppedBy).toBe('not_ready')
  })

  it('aborts when the route switch fails', async () => {
    const result = await runEvaluation({
      orchestrator: createOrchestrator([true, false]),
      settings: SETTINGS,
      escalation: escalation(),
      routes: RoutePool.fromIds(['route-a']),
      routeSwitcher: {
        switchRoute: () => {
          throw new Error('proxy down')
        },
      },
      logger: createSilentLogger(),
    })

    expect(result.stoppedBy).toBe('aborted')
    expect(result.error).toBeInstanceOf(Error)
    expect(result.batches).toHaveLength(1)
  })

  it('aborts on a fatal run error', async () => {
    const result = await runEvaluation({
      orchestrator: createOrchestrator([true], () => Promise.reject(new StoreUnavailableError('store offline'))),
      settings: SETTINGS,
      escalation: escalation(),
      logger: createSilentLogger(),
    })

    expect(result.stoppedBy).toBe('aborted')
    expect(result.error).toBeInstanceOf(StoreUnavailableError)
    expect(result.runs).toHaveLength(1)
    expect(result.runs[0].status).toBe('aborted')
  })

  it('stops when cancelled', async () => {
    const controller = new AbortController()
    controller.abort()

    const result = await runEvaluation({
      orchestrator: createOrchestrator([true]),
      settings: SETTINGS,
      escalation: escalation(),
      signal: controller.signal,
      logger: createSilentLogger(),
    })

    expect(result.stoppedBy).toBe('cancelled')
    expect(result.runs).toEqual([])
  })

  it('waits between runs', async () => {
    const clock = new FakeClock()

    await runEvaluation({
      orchestrator: createOrchestrator([true]),
      settings: { ...SETTINGS, maxBatches: 1, runDelayMs: 500 },
      escalation: escalation({ batchSize: 3 }),
      sleep: clock.sleep,
      logger: createSilentLogger(),
    })

    expect(clock.sleeps).toEqual([500, 500])
  })
})
