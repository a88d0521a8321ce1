/**
 * Structured logging helpers for harvester workflows.
 *
 * Stamps common envelope fields onto every event and redacts values that
 * must never reach logs: credentials, cookies, and query strings on links.
 */

import { createHash } from 'node:crypto'
import type { ILogger, LogContext as BaseLogContext } from '@boardwatch/logger'

export type WorkflowContext = {
  workflow: string
  stage: string
  runId?: string
  source?: string
  mode?: string
  routeId?: string
  itemKey?: string
  attempt?: number
  [key: string]: unknown
}

type LogMeta = Record<string, unknown>

export interface WorkflowLogger {
  debug(event: string, meta?: LogMeta, err?: unknown): void
  info(event: string, meta?: LogMeta, err?: unknown): void
  warn(event: string, meta?: LogMeta, err?: unknown): void
  error(event: string, meta?: LogMeta, err?: unknown): void
  child(extra: Partial<WorkflowContext>): WorkflowLogger
}

const REDACTED = '[REDACTED]'

const SENSITIVE_KEY_PATTERNS = [
  /authorization/i,
  /password/i,
  /secret/i,
  /token/i,
  /cookie/i,
  /api[-_]?key/i,
  /credential/i,
]

export function createWorkflowLogger(base: ILogger, context: WorkflowContext): WorkflowLogger {
  const baseContext = compact(context)

  const payloadFor = (event: string, meta?: LogMeta): BaseLogContext =>
    redactMeta({
      event_name: event,
      ...baseContext,
      ...(meta ? compact(meta) : {}),
    })

  return {
    debug: (event, meta) => base.debug(event, payloadFor(event, meta)),
    info: (event, meta) => base.info(event, payloadFor(event, meta)),
    warn: (event, meta, err) => base.warn(event, payloadFor(event, meta), err),
    error: (event, meta, err) => base.error(event, payloadFor(event, meta), err),
    child: (extra) => {
      const merged: WorkflowContext = { ...context }
      for (const [key, value] of Object.entries(extra)) {
        if (value !== undefined && value !== null) merged[key] = value
      }
      return createWorkflowLogger(base, merged)
    },
  }
}

/**
 * Reduce a link to host, path and a short hash. Query strings carry
 * tracking ids and session tokens, so they are never logged.
 */
export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

export function redactMeta(meta: LogMeta): LogMeta {
  const next: LogMeta = {}
  for (const [key, value] of Object.entries(meta)) {
    next[key] = SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key)) ? REDACTED : value
  }
  return next
}

function compact(value: LogMeta): LogMeta {
  const next: LogMeta = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}
