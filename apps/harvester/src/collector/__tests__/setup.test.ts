import { describe, expect, it, vi } from 'vitest'
import { loadHarvesterConfig } from '../../config/settings.js'
import { ExtractorRegistry, createFieldMapExtractor } from '../registry.js'
import { createRunOrchestrator } from '../setup.js'
import type { ChallengeSolver, DetailFetcher } from '../types.js'
import { FakeClock, FakeRedisClient, createSilentLogger } from './helpers.js'

function dependencies(redisClient: FakeRedisClient, solver: ChallengeSolver) {
  const clock = new FakeClock()
  const fetcher: DetailFetcher<string> = {
    fetchDetail: async () => ({ ok: false, error: { kind: 'challenge_detected', message: 'interstitial' } }),
  }
  return {
    collectors: [{ source: 'board-a', collect: () => [{ id: '1', title: 'Engineer' }] }],
    extractors: new ExtractorRegistry().register(
      createFieldMapExtractor({ id: 'board-a', fields: { naturalKey: 'id', title: 'title' } })
    ),
    fetcher,
    challengeSolver: solver,
    redisClient,
    now: clock.now,
    sleep: clock.sleep,
    logger: createSilentLogger(),
  }
}

describe('createRunOrchestrator', () => {
  it('opens the configured redis backend with the shared client', async () => {
    const client = new FakeRedisClient()
    const solver: ChallengeSolver = { solve: vi.fn().mockResolvedValue({ ok: true }) }
    const config = loadHarvesterConfig({
      FINGERPRINT_BACKEND: 'redis',
      FINGERPRINT_REDIS_NAMESPACE: 'test',
      ENRICH_MAX_ATTEMPTS: '1',
      RUN_METRICS_PATH_TEMPLATE: '',
    })

    const orchestrator = createRunOrchestrator(config, dependencies(client, solver))
    const result = await orchestrator.run({ mode: 'challenge_solving' })
    await orchestrator.close()

    expect(result.metrics.itemsSeen).toBe(1)
    expect(result.metricsPath).toBeUndefined()
    expect(Array.from(client.sets.get('test:keys') ?? [])).toEqual(['id:board-a:1'])
    expect(client.quitCalls).toBe(0)
    expect(solver.solve).not.toHaveBeenCalled()
  })

  it('passes the solver through when challenge solving is enabled', async () => {
    const client = new FakeRedisClient()
    const solver: ChallengeSolver = { solve: vi.fn().mockResolvedValue({ ok: false, reason: 'unsolved' }) }
    const config = loadHarvesterConfig({
      FINGERPRINT_BACKEND: 'redis',
      CHALLENGE_SOLVING_ENABLED: 'true',
      ENRICH_MAX_ATTEMPTS: '1',
      RUN_METRICS_PATH_TEMPLATE: '',
    })

    const result = await createRunOrchestrator(config, dependencies(client, solver)).run({ mode: 'challenge_solving' })

    expect(solver.solve).toHaveBeenCalledTimes(1)
    expect(result.metrics.solverFailedCount).toBe(1)
  })
})
