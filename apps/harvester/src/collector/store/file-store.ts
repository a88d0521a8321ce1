/**
 * File-backed Fingerprint Store
 *
 * Append-only JSON lines, one {key, source, firstSeen} record per line.
 * The whole file is loaded into memory on open; every record() is appended
 * and synced before it resolves.
 *
 * Loading is tolerant: malformed lines and a truncated final line are
 * skipped and counted. Unknown fields are ignored. Lines written by the
 * legacy dedupe log ({hash, collected_at}) are accepted.
 */

import { mkdir, open, readFile, type FileHandle } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import type { ILogger } from '@boardwatch/logger'
import { loggers } from '../../config/logger.js'
import { FingerprintPersistError, StoreUnavailableError, errorMessage } from '../errors.js'
import type { FingerprintLoadStats, FingerprintRecord, FingerprintStore, RecordOutcome } from '../types.js'

const storedLineSchema = z.object({
  key: z.string().min(1).optional(),
  hash: z.string().min(1).optional(),
  source: z.string().optional(),
  firstSeen: z.string().optional(),
  collected_at: z.string().optional(),
})

export interface FileFingerprintStoreOptions {
  path: string
  /** fsync after every append (default: true) */
  sync?: boolean
  logger?: ILogger
}

export interface ParsedFingerprintLog {
  records: Map<string, FingerprintRecord>
  stats: FingerprintLoadStats
}

/**
 * Parse the contents of a fingerprint log. The first occurrence of a key
 * wins, so firstSeen is never rewritten by later lines.
 */
export function parseFingerprintLog(contents: string): ParsedFingerprintLog {
  const records = new Map<string, FingerprintRecord>()
  let skipped = 0

  for (const rawLine of contents.split('\n')) {
    const line = rawLine.trim()
    if (!line) continue

    const record = parseLine(line)
    if (!record) {
      skipped++
      continue
    }
    if (!records.has(record.key)) {
      records.set(record.key, record)
    }
  }

  return { records, stats: { loaded: records.size, skipped } }
}

function parseLine(line: string): FingerprintRecord | null {
  let json: unknown
  try {
    json = JSON.parse(line)
  } catch {
    return null
  }

  const parsed = storedLineSchema.safeParse(json)
  if (!parsed.success) return null

  const key = parsed.data.key ?? parsed.data.hash
  const firstSeen = parsed.data.firstSeen ?? parsed.data.collected_at
  if (!key || !firstSeen) return null

  return { key, source: parsed.data.source ?? 'unknown', firstSeen }
}

export class FileFingerprintStore implements FingerprintStore {
  readonly path: string
  readonly loadStats: FingerprintLoadStats

  private readonly records: Map<string, FingerprintRecord>
  private readonly pending = new Map<string, Promise<void>>()
  private readonly sync: boolean
  private readonly log: ILogger
  private handle: FileHandle | null
  private writeChain: Promise<void> = Promise.resolve()
  private needsLeadingNewline: boolean

  private constructor(
    path: string,
    handle: FileHandle,
    parsed: ParsedFingerprintLog,
    needsLeadingNewline: boolean,
    options: FileFingerprintStoreOptions
  ) {
    this.path = path
    this.handle = handle
    this.records = parsed.records
    this.loadStats = parsed.stats
    this.needsLeadingNewline = needsLeadingNewline
    this.sync = options.sync ?? true
    this.log = options.logger ?? loggers.store
  }

  /**
   * Load the log and open it for appending.
   * @throws StoreUnavailableError if the file cannot be read or opened
   */
  static async open(options: FileFingerprintStoreOptions): Promise<FileFingerprintStore> {
    const { path } = options
    const log = options.logger ?? loggers.store

    let contents = ''
    try {
      await mkdir(dirname(path), { recursive: true })
      contents = await readFile(path, 'utf8')
    } catch (error) {
      if (!isNotFound(error)) {
        throw new StoreUnavailableError(
          `Fingerprint store at ${path} is unavailable: ${errorMessage(error)}`,
          { path },
          { cause: error }
        )
      }
    }

    let handle: FileHandle
    try {
      handle = await open(path, 'a')
    } catch (error) {
      throw new StoreUnavailableError(
        `Fingerprint store at ${path} cannot be opened for append: ${errorMessage(error)}`,
        { path },
        { cause: error }
      )
    }

    const parsed = parseFingerprintLog(contents)
    const needsLeadingNewline = contents.length > 0 && !contents.endsWith('\n')

    if (parsed.stats.skipped > 0) {
      log.warn('Skipped invalid fingerprint lines', { path, skipped: parsed.stats.skipped })
    }
    log.info('Fingerprint store loaded', { path, loaded: parsed.stats.loaded })

    return new FileFingerprintStore(path, handle, parsed, needsLeadingNewline, options)
  }

  seen(key: string): boolean {
    return this.records.has(key)
  }

  get(key: string): FingerprintRecord | undefined {
    return this.records.get(key)
  }

  count(): number {
    return this.records.size
  }

  async record(key: string, source: string, timestamp: Date = new Date()): Promise<RecordOutcome> {
    if (this.records.has(key)) return 'duplicate'

    const inflight = this.pending.get(key)
    if (inflight) {
      await inflight
      return 'duplicate'
    }

    const record: FingerprintRecord = { key, source, firstSeen: timestamp.toISOString() }
    const write = this.persist(record)
    this.pending.set(key, write)

    try {
      await write
    } finally {
      this.pending.delete(key)
    }

    this.records.set(key, record)
    return 'recorded'
  }

  async close(): Promise<void> {
    const handle = this.handle
    if (!handle) return
    this.handle = null
    await this.writeChain
    await handle.close()
  }

  private persist(record: FingerprintRecord): Promise<void> {
    const line = JSON.stringify(record)
    const write = this.writeChain.then(() => this.appendLine(line))
    // Keep the chain usable after a failed append; the failure reaches the caller through `write`
    this.writeChain = write.then(
      () => undefined,
      () => undefined
    )
    return write
  }

  private async appendLine(line: string): Promise<void> {
    const handle = this.handle
    if (!handle) {
      throw new FingerprintPersistError('Fingerprint store is closed', { path: this.path })
    }

    const data = `${this.needsLeadingNewline ? '\n' : ''}${line}\n`
    try {
      await handle.appendFile(data, 'utf8')
      if (this.sync) {
        await handle.datasync()
      }
    } catch (error) {
      this.log.error('Fingerprint append failed', { path: this.path }, error)
      throw new FingerprintPersistError(
        `Failed to persist fingerprint: ${errorMessage(error)}`,
        { path: this.path },
        { cause: error }
      )
    }
    this.needsLeadingNewline = false
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
