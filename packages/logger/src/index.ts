/**
 * @boardwatch/logger
 *
 * Structured logging for Boardwatch workspaces.
 *
 * - JSON lines in production, colored single lines in development
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers by component name
 * - Run-scoped context via AsyncLocalStorage (`withLogContext`)
 * - Replaceable sink so tests can capture output
 *
 * Environment variables:
 * - LOG_LEVEL: debug | info | warn | error | fatal (default: info)
 * - LOG_FORMAT: json | pretty (default: json in production, pretty otherwise)
 */

import { AsyncLocalStorage } from 'node:async_hooks'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

export type LogSink = (entry: LogEntry, formatted: string) => void

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

const contextStorage = new AsyncLocalStorage<LogContext>()

let activeSink: LogSink | null = null

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS
}

function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  if (level && isLogLevel(level)) {
    return level
  }
  return 'info'
}

function getLogFormat(): 'json' | 'pretty' {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

export function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)

  const { timestamp, level: _level, service, component, message, error, ...meta } = entry
  const componentPath = component ? `${service}:${component}` : service

  const metaStr =
    Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

function output(entry: LogEntry): void {
  const formatted = getLogFormat() === 'json' ? JSON.stringify(entry) : formatPretty(entry)

  if (activeSink) {
    activeSink(entry, formatted)
    return
  }

  switch (entry.level) {
    case 'debug':
      console.debug(formatted)
      break
    case 'info':
      console.info(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    case 'error':
    case 'fatal':
      console.error(formatted)
      break
  }
}

/**
 * Route log output somewhere other than the console. Pass null to restore
 * console output.
 */
export function setLogSink(sink: LogSink | null): void {
  activeSink = sink
}

/**
 * Run `fn` with extra fields merged into every entry logged inside it,
 * including entries from awaited callbacks.
 */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  const parent = contextStorage.getStore() ?? {}
  return contextStorage.run({ ...parent, ...context }, fn)
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /** Child names nest: `queue` then `worker` logs as `queue:worker` */
  child(component: string): ILogger
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component?: string
  ) {}

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      ...contextStorage.getStore(),
      ...meta,
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
    }

    if (this.component) {
      entry.component = this.component
    }

    const errorData = formatError(error)
    if (errorData) {
      entry.error = errorData
    }

    output(entry)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(component: string): ILogger {
    return new Logger(this.service, this.component ? `${this.component}:${component}` : component)
  }
}

/**
 * Create a logger for a service
 *
 * @example
 * ```ts
 * const logger = createLogger('harvester')
 * const queueLog = logger.child('queue')
 * queueLog.info('Item enriched', { itemKey: 'id:board-a:123' })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
