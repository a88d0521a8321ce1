/**
 * Shared test doubles for collector tests
 */

import { vi } from 'vitest'
import type { ILogger } from '@boardwatch/logger'
import { createItem } from '../keys.js'
import { emptyCounters } from '../metrics/aggregator.js'
import type { FingerprintRedisClient } from '../store/redis-store.js'
import type {
  FingerprintLoadStats,
  FingerprintStore,
  Item,
  RecordOutcome,
  RunCounters,
  RunMetrics,
} from '../types.js'

export function createSilentLogger(): ILogger {
  const log: ILogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => log,
  }
  return log
}

/**
 * Manual clock. `sleep` advances time instead of waiting.
 */
export class FakeClock {
  current: number
  readonly sleeps: number[] = []

  constructor(start = Date.UTC(2026, 0, 15, 9, 30, 0)) {
    this.current = start
  }

  now = (): number => this.current

  sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms)
    this.current += Math.max(ms, 1)
  }

  advance(ms: number): void {
    this.current += ms
  }
}

export function makeItem(id: string, source = 'board-a'): Item {
  return createItem(source, {
    naturalKey: id,
    title: `Engineer ${id}`,
    organization: 'Acme',
    location: 'Remote',
    link: `https://jobs.example.com/view/${id}`,
    payload: { id },
  })
}

export function makeRun(overrides: Partial<RunCounters> & Partial<Pick<RunMetrics, 'mode' | 'status' | 'durationMs'>> = {}): RunMetrics {
  return {
    ...emptyCounters(),
    runId: 'run-test',
    source: 'board-a',
    mode: 'direct',
    status: 'completed',
    partial: false,
    startedAt: '2026-01-15T09:30:00.000Z',
    endedAt: '2026-01-15T09:31:00.000Z',
    durationMs: 60_000,
    events: [],
    ...overrides,
  }
}

/** Passing run: 5 seen, 2 deduped, 3 enriched of 3 attempted */
export function passingRun(overrides: Partial<RunCounters> & Partial<Pick<RunMetrics, 'mode' | 'status' | 'durationMs'>> = {}): RunMetrics {
  return makeRun({ itemsSeen: 5, itemsDeduped: 2, itemsEnqueued: 3, itemsEnriched: 3, ...overrides })
}

/** Failing run: saw nothing */
export function failingRun(overrides: Partial<RunCounters> & Partial<Pick<RunMetrics, 'mode' | 'status' | 'durationMs'>> = {}): RunMetrics {
  return makeRun({ ...overrides })
}

export class InMemoryFingerprintStore implements FingerprintStore {
  readonly loadStats: FingerprintLoadStats = { loaded: 0, skipped: 0 }
  readonly keys = new Set<string>()
  closed = false
  failOnRecord: Error | null = null

  constructor(initial: string[] = []) {
    for (const key of initial) this.keys.add(key)
  }

  seen(key: string): boolean {
    return this.keys.has(key)
  }

  async record(key: string): Promise<RecordOutcome> {
    if (this.failOnRecord) throw this.failOnRecord
    if (this.keys.has(key)) return 'duplicate'
    this.keys.add(key)
    return 'recorded'
  }

  count(): number {
    return this.keys.size
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

/**
 * In-process stand-in for the ioredis commands the fingerprint store uses.
 */
export class FakeRedisClient implements FingerprintRedisClient {
  readonly sets = new Map<string, Set<string>>()
  readonly hashes = new Map<string, Map<string, string>>()
  failing: Partial<Record<'smembers' | 'sadd' | 'hset', Error>> = {}
  quitCalls = 0

  async smembers(key: string): Promise<string[]> {
    if (this.failing.smembers) throw this.failing.smembers
    return Array.from(this.sets.get(key) ?? [])
  }

  async sadd(key: string, member: string): Promise<number> {
    if (this.failing.sadd) throw this.failing.sadd
    const set = this.sets.get(key) ?? new Set<string>()
    this.sets.set(key, set)
    if (set.has(member)) return 0
    set.add(member)
    return 1
  }

  async hset(key: string, field: string, value: string): Promise<number> {
    if (this.failing.hset) throw this.failing.hset
    const hash = this.hashes.get(key) ?? new Map<string, string>()
    this.hashes.set(key, hash)
    const added = hash.has(field) ? 0 : 1
    hash.set(field, value)
    return added
  }

  async quit(): Promise<'OK'> {
    this.quitCalls++
    return 'OK'
  }
}
