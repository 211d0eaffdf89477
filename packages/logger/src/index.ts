/**
 * @anistat/logger
 *
 * Structured logging for anistat applications.
 *
 * Features:
 * - JSON-formatted output for production (machine-parseable)
 * - Colored output for development (human-readable)
 * - ISO 8601 timestamps
 * - Log levels: debug, info, warn, error, fatal
 * - Child loggers with inherited component path and context
 * - Pluggable sink, so callers (and tests) can capture entries instead of printing them
 *
 * Environment variables (used when no explicit option is passed):
 * - LOG_LEVEL: Minimum log level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: Output format (json, pretty). Default: json in production, pretty otherwise
 * - NODE_ENV: Used to determine defaults
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export type LogFormat = 'json' | 'pretty'

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

/**
 * Receives every entry that passes the level filter.
 */
export type LogSink = (entry: LogEntry) => void

export interface LoggerOptions {
  /** Minimum level; falls back to LOG_LEVEL */
  level?: LogLevel

  /** Console format; falls back to LOG_FORMAT / NODE_ENV. Ignored when a sink is given. */
  format?: LogFormat

  /** Replaces console output */
  sink?: LogSink
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  fatal: '\x1b[35m', // Magenta
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

function getEnvLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function getEnvLogFormat(): LogFormat {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  // Default: pretty in development, json in production
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

export function formatError(error: unknown): LogEntry['error'] | undefined {
  if (error === undefined || error === null) return undefined

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

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry, colors = true): string {
  const paint = (code: string, text: string): string => (colors ? `${code}${text}${RESET}` : text)
  const levelStr = entry.level.toUpperCase().padEnd(5)

  const componentPath = entry.component ? `${entry.service}:${entry.component}` : entry.service

  const { timestamp, level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr = Object.keys(meta).length > 0 ? ` ${paint(DIM, JSON.stringify(meta))}` : ''
  const errorStr = error ? `\n  ${paint(DIM, error.stack ?? error.message)}` : ''

  return `${paint(DIM, timestamp)} ${paint(LOG_COLORS[level] + BRIGHT, levelStr)} ${paint(DIM, `[${componentPath}]`)} ${message}${metaStr}${errorStr}`
}

/**
 * Sink writing to the console in the given format.
 */
export function consoleSink(format: LogFormat = getEnvLogFormat()): LogSink {
  return entry => {
    const formatted = format === 'json' ? formatJson(entry) : formatPretty(entry)

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
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger
   * @param componentOrContext - Component name (appended to the path) or extra context
   * @param defaultContext - Extra context (only used when first arg is a string)
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

interface ResolvedOptions {
  level: LogLevel | undefined
  sink: LogSink
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext
  private readonly options: ResolvedOptions

  constructor(
    service: string,
    component?: string,
    defaultContext: LogContext = {},
    options: LoggerOptions = {}
  ) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
    this.options = {
      level: options.level,
      sink: options.sink ?? consoleSink(options.format ?? getEnvLogFormat()),
    }
  }

  private shouldLog(level: LogLevel): boolean {
    // LOG_LEVEL is re-read per entry so it can be changed at runtime
    const minimum = this.options.level ?? getEnvLogLevel()
    return LOG_LEVELS[level] >= LOG_LEVELS[minimum]
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!this.shouldLog(level)) return

    const entry: LogEntry = {
      ...this.defaultContext,
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

    this.options.sink(entry)
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

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    const inherited: LoggerOptions = { level: this.options.level, sink: this.options.sink }

    if (typeof componentOrContext === 'object') {
      return new Logger(
        this.service,
        this.component,
        { ...this.defaultContext, ...componentOrContext },
        inherited
      )
    }

    const newComponent = this.component
      ? `${this.component}:${componentOrContext}`
      : componentOrContext
    return new Logger(
      this.service,
      newComponent,
      { ...this.defaultContext, ...defaultContext },
      inherited
    )
  }
}

/**
 * Create a logger for a service
 *
 * @param service - The service name (e.g., 'collector')
 *
 * @example
 * ```ts
 * import { createLogger } from '@anistat/logger'
 *
 * const logger = createLogger('collector')
 * logger.info('Run started', { listingLimit: 55 })
 *
 * const fetchLogger = logger.child('fetch')
 * fetchLogger.warn('Request failed', { url, statusCode: 503 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, undefined, {}, options)
}

/**
 * Logger that keeps every entry in memory. Used by tests and by callers
 * that want to inspect what a run reported.
 */
export function createMemoryLogger(
  service: string,
  options: Omit<LoggerOptions, 'sink' | 'format'> = {}
): { logger: ILogger; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const logger = createLogger(service, {
    level: options.level ?? 'debug',
    sink: entry => {
      entries.push(entry)
    },
  })
  return { logger, entries }
}
