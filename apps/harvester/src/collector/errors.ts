/**
 * Collector Error Classification
 *
 * Store- and egress-level failures are exceptions and abort a run.
 * Per-item fetch failures are FetchFailure values and never abort a run.
 */

import { ZodError } from 'zod'
import type { FetchFailure } from './types.js'

export const COLLECTOR_ERROR_CODES = {
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  FINGERPRINT_PERSIST_FAILED: 'FINGERPRINT_PERSIST_FAILED',
  EGRESS_EXHAUSTED: 'EGRESS_EXHAUSTED',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  SOLVE_FAILED: 'SOLVE_FAILED',
} as const

export type CollectorErrorCode = (typeof COLLECTOR_ERROR_CODES)[keyof typeof COLLECTOR_ERROR_CODES]

export abstract class CollectorError extends Error {
  abstract readonly code: CollectorErrorCode
  /** Fatal errors move the orchestrator to Aborted */
  abstract readonly isFatal: boolean
  readonly details?: Record<string, unknown>

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.details = details
  }
}

/** Fingerprint storage cannot be opened or read at startup */
export class StoreUnavailableError extends CollectorError {
  readonly code = COLLECTOR_ERROR_CODES.STORE_UNAVAILABLE
  readonly isFatal = true
}

/** A fingerprint was accepted in memory but did not reach durable storage */
export class FingerprintPersistError extends CollectorError {
  readonly code = COLLECTOR_ERROR_CODES.FINGERPRINT_PERSIST_FAILED
  readonly isFatal = true
}

/** Every egress route has been used up */
export class EgressExhaustedError extends CollectorError {
  readonly code = COLLECTOR_ERROR_CODES.EGRESS_EXHAUSTED
  readonly isFatal = true
}

export class ConfigurationError extends CollectorError {
  readonly code = COLLECTOR_ERROR_CODES.CONFIGURATION_ERROR
  readonly isFatal = true

  static fromZod(error: ZodError, prefix = 'Invalid configuration'): ConfigurationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }))
    const summary = issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ')
    return new ConfigurationError(`${prefix}: ${summary}`, { issues }, { cause: error })
  }
}

/** Raised by solver collaborators; recorded, never fatal */
export class SolveFailedError extends CollectorError {
  readonly code = COLLECTOR_ERROR_CODES.SOLVE_FAILED
  readonly isFatal = false
}

export function isCollectorError(error: unknown): error is CollectorError {
  return error instanceof CollectorError
}

export function isFatalError(error: unknown): boolean {
  return isCollectorError(error) && error.isFatal
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

/**
 * Turn an exception thrown by a fetch collaborator into a per-item failure.
 * Fatal collector errors are rethrown so the run aborts.
 */
export function classifyThrown(error: unknown): FetchFailure {
  if (isFatalError(error)) {
    throw error
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return { kind: 'transient', cause: 'timeout', message: error.message }
    }

    const code = readErrorCode(error)
    if (code && NETWORK_ERROR_CODES.has(code)) {
      return { kind: 'transient', cause: 'network', message: `${code}: ${error.message}` }
    }

    if (error instanceof TypeError && /invalid url/i.test(error.message)) {
      return { kind: 'terminal', cause: 'invalid_target', message: error.message }
    }
  }

  return { kind: 'transient', cause: 'unknown', message: errorMessage(error) }
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
])

function readErrorCode(error: Error): string | undefined {
  const direct = 'code' in error ? error.code : undefined
  if (typeof direct === 'string') return direct
  const cause = error.cause
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code
  }
  return undefined
}
