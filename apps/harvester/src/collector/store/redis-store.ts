/**
 * Redis-backed Fingerprint Store
 *
 * Shares "seen" state between collector processes. Membership lives in a
 * set ({namespace}:keys); first-sight metadata in a hash ({namespace}:records).
 * The set is loaded into memory on open so seen() stays synchronous.
 */

import type { ILogger } from '@boardwatch/logger'
import { loggers } from '../../config/logger.js'
import { FingerprintPersistError, StoreUnavailableError, errorMessage } from '../errors.js'
import type { FingerprintLoadStats, FingerprintRecord, FingerprintStore, RecordOutcome } from '../types.js'

export const DEFAULT_FINGERPRINT_NAMESPACE = 'boardwatch:fingerprints'

/**
 * The subset of ioredis the store uses. An ioredis client satisfies it;
 * tests pass an in-process fake.
 */
export interface FingerprintRedisClient {
  smembers(key: string): Promise<string[]>
  sadd(key: string, member: string): Promise<number>
  hset(key: string, field: string, value: string): Promise<number>
  quit(): Promise<unknown>
}

export interface RedisFingerprintStoreOptions {
  client: FingerprintRedisClient
  namespace?: string
  /** Quit the client on close (default: false) */
  ownsClient?: boolean
  logger?: ILogger
}

export class RedisFingerprintStore implements FingerprintStore {
  readonly loadStats: FingerprintLoadStats

  private readonly client: FingerprintRedisClient
  private readonly setKey: string
  private readonly recordsKey: string
  private readonly ownsClient: boolean
  private readonly log: ILogger
  private readonly keys: Set<string>
  private readonly pending = new Map<string, Promise<RecordOutcome>>()

  private constructor(options: RedisFingerprintStoreOptions, keys: Set<string>, stats: FingerprintLoadStats) {
    const namespace = options.namespace ?? DEFAULT_FINGERPRINT_NAMESPACE
    this.client = options.client
    this.setKey = `${namespace}:keys`
    this.recordsKey = `${namespace}:records`
    this.ownsClient = options.ownsClient ?? false
    this.log = options.logger ?? loggers.store
    this.keys = keys
    this.loadStats = stats
  }

  /**
   * @throws StoreUnavailableError if the key set cannot be read
   */
  static async open(options: RedisFingerprintStoreOptions): Promise<RedisFingerprintStore> {
    const namespace = options.namespace ?? DEFAULT_FINGERPRINT_NAMESPACE
    const log = options.logger ?? loggers.store

    let members: string[]
    try {
      members = await options.client.smembers(`${namespace}:keys`)
    } catch (error) {
      throw new StoreUnavailableError(
        `Fingerprint store in Redis is unavailable: ${errorMessage(error)}`,
        { namespace },
        { cause: error }
      )
    }

    const keys = new Set<string>()
    let skipped = 0
    for (const member of members) {
      if (member.trim()) keys.add(member)
      else skipped++
    }

    log.info('Fingerprint store loaded', { namespace, loaded: keys.size, skipped })
    return new RedisFingerprintStore(options, keys, { loaded: keys.size, skipped })
  }

  seen(key: string): boolean {
    return this.keys.has(key)
  }

  count(): number {
    return this.keys.size
  }

  async record(key: string, source: string, timestamp: Date = new Date()): Promise<RecordOutcome> {
    if (this.keys.has(key)) return 'duplicate'

    const inflight = this.pending.get(key)
    if (inflight) {
      await inflight
      return 'duplicate'
    }

    const write = this.persist({ key, source, firstSeen: timestamp.toISOString() })
    this.pending.set(key, write)
    try {
      return await write
    } finally {
      this.pending.delete(key)
    }
  }

  async close(): Promise<void> {
    if (this.ownsClient) {
      await this.client.quit()
    }
  }

  private async persist(record: FingerprintRecord): Promise<RecordOutcome> {
    let added: number
    try {
      added = await this.client.sadd(this.setKey, record.key)
    } catch (error) {
      throw new FingerprintPersistError(
        `Failed to persist fingerprint: ${errorMessage(error)}`,
        { key: record.key },
        { cause: error }
      )
    }

    this.keys.add(record.key)

    // SADD returns 0 when another process recorded the key first
    if (added === 0) {
      return 'duplicate'
    }

    try {
      await this.client.hset(this.recordsKey, record.key, JSON.stringify(record))
    } catch (error) {
      // Membership is durable; only the first-sight metadata is missing
      this.log.warn('Fingerprint metadata write failed', { key: record.key, error: errorMessage(error) })
    }

    return 'recorded'
  }
}
