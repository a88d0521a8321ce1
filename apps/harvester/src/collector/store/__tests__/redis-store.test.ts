import { describe, expect, it } from 'vitest'
import { FingerprintPersistError, StoreUnavailableError } from '../../errors.js'
import { RedisFingerprintStore } from '../redis-store.js'
import { openFingerprintStore } from '../index.js'
import { FakeRedisClient, createSilentLogger } from '../../__tests__/helpers.js'

const logger = createSilentLogger()

describe('RedisFingerprintStore', () => {
  it('loads existing keys from the namespace set', async () => {
    const client = new FakeRedisClient()
    client.sets.set('test:keys', new Set(['k1', 'k2', '']))

    const store = await RedisFingerprintStore.open({ client, namespace: 'test', logger })

    expect(store.count()).toBe(2)
    expect(store.seen('k1')).toBe(true)
    expect(store.loadStats).toEqual({ loaded: 2, skipped: 1 })
  })

  it('records membership and first-sight metadata', async () => {
    const client = new FakeRedisClient()
    const store = await RedisFingerprintStore.open({ client, namespace: 'test', logger })

    const outcome = await store.record('k1', 'board-a', new Date('2026-01-15T09:30:00.000Z'))

    expect(outcome).toBe('recorded')
    expect(store.seen('k1')).toBe(true)
    expect(client.sets.get('test:keys')?.has('k1')).toBe(true)
    expect(JSON.parse(client.hashes.get('test:records')?.get('k1') ?? '{}')).toEqual({
      key: 'k1',
      source: 'board-a',
      firstSeen: '2026-01-15T09:30:00.000Z',
    })
  })

  it('reports duplicate when another process added the key first', async () => {
    const client = new FakeRedisClient()
    const store = await RedisFingerprintStore.open({ client, namespace: 'test', logger })
    client.sets.set('test:keys', new Set(['k1']))

    expect(store.seen('k1')).toBe(false)
    expect(await store.record('k1', 'board-a')).toBe('duplicate')
    expect(store.seen('k1')).toBe(true)
    expect(store.count()).toBe(1)
  })

  it('raises StoreUnavailableError when the set cannot be read', async () => {
    const client = new FakeRedisClient()
    client.failing.smembers = new Error('connect ECONNREFUSED')

    await expect(RedisFingerprintStore.open({ client, logger })).rejects.toBeInstanceOf(StoreUnavailableError)
  })

  it('raises FingerprintPersistError when SADD fails and does not mark the key seen', async () => {
    const client = new FakeRedisClient()
    const store = await RedisFingerprintStore.open({ client, logger })
    client.failing.sadd = new Error('READONLY')

    await expect(store.record('k1', 'board-a')).rejects.toBeInstanceOf(FingerprintPersistError)
    expect(store.seen('k1')).toBe(false)
  })

  it('still records when only the metadata write fails', async () => {
    const client = new FakeRedisClient()
    const store = await RedisFingerprintStore.open({ client, logger })
    client.failing.hset = new Error('OOM')

    expect(await store.record('k1', 'board-a')).toBe('recorded')
    expect(store.seen('k1')).toBe(true)
  })

  it('quits the client on close only when it owns it', async () => {
    const shared = new FakeRedisClient()
    await (await RedisFingerprintStore.open({ client: shared, logger })).close()
    expect(shared.quitCalls).toBe(0)

    const owned = new FakeRedisClient()
    await (await RedisFingerprintStore.open({ client: owned, ownsClient: true, logger })).close()
    expect(owned.quitCalls).toBe(1)
  })
})

describe('openFingerprintStore', () => {
  it('opens the redis backend with a supplied client without owning it', async () => {
    const client = new FakeRedisClient()
    client.sets.set('ns:keys', new Set(['k1']))

    const store = await openFingerprintStore(
      { backend: 'redis', path: 'unused.jsonl', redisNamespace: 'ns' },
      { redisClient: client, logger }
    )

    expect(store).toBeInstanceOf(RedisFingerprintStore)
    expect(store.seen('k1')).toBe(true)
    await store.close()
    expect(client.quitCalls).toBe(0)
  })
})
