/**
 * HTTP Detail Fetcher
 *
 * Default DetailFetcher over native fetch. Classifies every response into
 * a FetchFailure kind; it never retries (the queue owns retries).
 *
 *   400                          -> terminal (invalid_target)
 *   404, 410                     -> terminal (not_found)
 *   401, 403                     -> blocked, or challenge_detected with markers
 *   429                          -> transient (rate_limited)
 *   503                          -> challenge_detected with markers, else transient
 *   other 5xx                    -> transient (server_error)
 *   200 interstitial page        -> challenge_detected
 */

import { createHash } from 'node:crypto'
import type { ILogger } from '@boardwatch/logger'
import { loggers } from '../../config/logger.js'
import { sanitizeUrl } from '../../config/structured-log.js'
import { classifyThrown } from '../errors.js'
import type { DetailFetcher, FetchContext, FetchDetailResult, FetchFailure, Item } from '../types.js'
import { detectChallenge } from './challenge-detector.js'

export interface HttpDetail {
  url: string
  statusCode: number
  html: string
  contentHash: string
  durationMs: number
}

export interface HttpDetailFetcherOptions {
  headers?: Record<string, string>
  /** Per-request timeout; the queue's hard timeout still applies on top */
  timeoutMs?: number
  maxSizeBytes?: number
  /** Where to fetch an item's detail from. Default: item.link */
  resolveUrl?: (item: Item) => string | undefined
  now?: () => number
  logger?: ILogger
}

export const DEFAULT_DETAIL_HEADERS: Record<string, string> = {
  'User-Agent': 'BoardwatchHarvester/1.0',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
}

const DEFAULT_TIMEOUT_MS = 30_000
const DEFAULT_MAX_SIZE_BYTES = 5 * 1024 * 1024

type Failure = { ok: false; error: FetchFailure }

export class HttpDetailFetcher implements DetailFetcher<HttpDetail> {
  private readonly headers: Record<string, string>
  private readonly timeoutMs: number
  private readonly maxSizeBytes: number
  private readonly resolveUrl: (item: Item) => string | undefined
  private readonly now: () => number
  private readonly log: ILogger

  constructor(options: HttpDetailFetcherOptions = {}) {
    this.headers = { ...DEFAULT_DETAIL_HEADERS, ...(options.headers ?? {}) }
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES
    this.resolveUrl = options.resolveUrl ?? ((item) => item.link)
    this.now = options.now ?? Date.now
    this.log = options.logger ?? loggers.fetch
  }

  async fetchDetail(item: Item, ctx: FetchContext): Promise<FetchDetailResult<HttpDetail>> {
    const url = this.resolveUrl(item)
    if (!url) {
      return fail('terminal', 'invalid_target', 'Item has no detail link')
    }
    if (!URL.canParse(url)) {
      return fail('terminal', 'invalid_target', 'Invalid detail URL')
    }

    const startTime = this.now()
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)
    const onAbort = () => controller.abort()
    ctx.signal.addEventListener('abort', onAbort, { once: true })

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: this.headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      const result = await this.classify(url, response, startTime)
      this.log.debug('Detail fetched', {
        ...sanitizeUrl(url),
        attempt: ctx.attempt,
        statusCode: response.status,
        outcome: result.ok ? 'ok' : result.error.kind,
        durationMs: this.now() - startTime,
      })
      return result
    } catch (error) {
      const failure = classifyThrown(error)
      this.log.debug('Detail fetch threw', { ...sanitizeUrl(url), attempt: ctx.attempt, cause: failure.cause })
      return { ok: false, error: failure }
    } finally {
      clearTimeout(timeoutId)
      ctx.signal.removeEventListener('abort', onAbort)
    }
  }

  private async classify(url: string, response: Response, startTime: number): Promise<FetchDetailResult<HttpDetail>> {
    const status = response.status

    if (status === 404 || status === 410) {
      return fail('terminal', 'not_found', `HTTP ${status}`, status)
    }
    if (status === 400) {
      return fail('terminal', 'invalid_target', `HTTP ${status}`, status)
    }
    if (status === 429) {
      const retryAfter = response.headers.get('retry-after')
      return fail('transient', 'rate_limited', `HTTP 429${retryAfter ? ` (retry-after ${retryAfter})` : ''}`, status)
    }

    if (status === 401 || status === 403 || status === 503) {
      const html = (await this.readBodyWithLimit(response)) ?? ''
      const signal = detectChallenge(html)
      if (signal.detected) {
        return fail('challenge_detected', 'challenge', `Challenge page (${signal.markers.join(', ')})`, status)
      }
      if (status === 503) {
        return fail('transient', 'server_error', 'HTTP 503', status)
      }
      return fail('blocked', 'forbidden', `HTTP ${status}`, status)
    }

    if (status >= 500) {
      return fail('transient', 'server_error', `HTTP ${status}`, status)
    }
    if (!response.ok) {
      return fail('terminal', 'unknown', `HTTP ${status}`, status)
    }

    const contentLength = response.headers.get('content-length')
    if (contentLength && Number.parseInt(contentLength, 10) > this.maxSizeBytes) {
      return fail('terminal', 'unknown', `Response too large: ${contentLength} bytes`, status)
    }

    const html = await this.readBodyWithLimit(response)
    if (html === null) {
      return fail('terminal', 'unknown', 'Response exceeded size limit', status)
    }

    const signal = detectChallenge(html)
    if (signal.detected) {
      return fail('challenge_detected', 'challenge', `Interstitial page (${signal.markers.join(', ')})`, status)
    }

    return {
      ok: true,
      detail: {
        url,
        statusCode: status,
        html,
        contentHash: createHash('sha256').update(html).digest('hex').slice(0, 32),
        durationMs: this.now() - startTime,
      },
    }
  }

  /**
   * Read the body up to maxSizeBytes. null when the limit is exceeded.
   */
  private async readBodyWithLimit(response: Response): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) return ''

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      for (;;) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > this.maxSizeBytes) {
          await reader.cancel()
          return null
        }
        chunks.push(value)
      }
      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }
}

function fail(kind: FetchFailure['kind'], cause: FetchFailure['cause'], message: string, statusCode?: number): Failure {
  return { ok: false, error: { kind, cause, message, statusCode } }
}
