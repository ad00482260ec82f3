/**
 * @fileoverview Structured logging for git-fad.
 *
 * Entries are JSON objects, one per line, always on the error stream:
 * stdout belongs to the command's results (the best match, the staged
 * path) and must stay parseable. Library entry points take an optional
 * {@link Logger} and fall back to {@link noopLogger}.
 *
 * @module utils/logger
 *
 * @example
 * ```typescript
 * import { createLogger, LogLevel } from './utils/logger'
 *
 * const logger = createLogger({ component: 'matcher', minLevel: LogLevel.DEBUG })
 * logger.debug('Token matched', { token: 'src', matches: 3 })
 *
 * const runLogger = logger.child({ repoRoot: '/work/project' })
 * runLogger.error('Index write failed', new Error('EACCES'), { path: '.git/index' })
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

/**
 * One serialized log line.
 */
export interface LogEntry {
  /** ISO-8601 timestamp */
  timestamp: string
  level: LogLevel
  message: string
  /** Component or module name */
  component?: string
  /** Error details; `code` is present for errors that carry one */
  error?: {
    name: string
    message: string
    code?: string
    stack?: string
  }
  /** Context merged with per-call data */
  data?: Record<string, unknown>
}

export type LogHandler = (entry: LogEntry) => void

/**
 * Logger interface supporting structured logging.
 */
export interface Logger {
  /** Diagnostic detail: per-token matches, cumulative survivors, ranking */
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  /** Recoverable problems, such as an unreadable directory during the scan */
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, error?: Error, data?: Record<string, unknown>): void

  /**
   * Whether entries at `level` would be emitted. Lets callers skip
   * building data that would only be discarded.
   */
  isEnabled(level: LogLevel): boolean

  /**
   * Create a child logger whose entries also carry `context`.
   */
  child(context: Record<string, unknown>): Logger
}

export interface LoggerOptions {
  /** Component or module name */
  component?: string
  /** Minimum level to emit (default: INFO) */
  minLevel?: LogLevel
  /** Context included in every entry */
  context?: Record<string, unknown>
  /** Where entries go (default: JSON lines on process.stderr) */
  handler?: LogHandler
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * Creates a handler that writes each entry as one JSON line through `write`.
 *
 * @example
 * ```typescript
 * const lines: string[] = []
 * const logger = createLogger({ handler: createLineHandler((line) => lines.push(line)) })
 * ```
 */
export function createLineHandler(write: (line: string) => void): LogHandler {
  return (entry) => write(JSON.stringify(entry))
}

const stderrHandler: LogHandler = createLineHandler((line) => {
  process.stderr.write(line + '\n')
})

/**
 * Parses a log level name, case-insensitively.
 *
 * @returns The level, or `undefined` for an unknown or empty name
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined
  const normalized = value.trim().toLowerCase()
  for (const level of Object.values(LogLevel)) {
    if (level === normalized) return level
  }
  return undefined
}

function describeError(error: Error): NonNullable<LogEntry['error']> {
  const described: NonNullable<LogEntry['error']> = { name: error.name, message: error.message }
  if ('code' in error && typeof error.code === 'string') {
    described.code = error.code
  }
  if (error.stack !== undefined) {
    described.stack = error.stack
  }
  return described
}

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Create a structured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   component: 'stager',
 *   minLevel: LogLevel.DEBUG,
 *   context: { repoRoot: '/work/project' }
 * })
 *
 * logger.debug('Staged', { path: 'src/main.ts', mode: '100644' })
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    component,
    minLevel = LogLevel.INFO,
    context = {},
    handler = stderrHandler,
  } = options

  function isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel]
  }

  function log(level: LogLevel, message: string, error?: Error, data?: Record<string, unknown>): void {
    if (!isEnabled(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    }
    if (component) entry.component = component
    if (error) entry.error = describeError(error)

    const merged = { ...context, ...data }
    if (Object.keys(merged).length > 0) entry.data = merged

    handler(entry)
  }

  return {
    debug: (message, data) => log(LogLevel.DEBUG, message, undefined, data),
    info: (message, data) => log(LogLevel.INFO, message, undefined, data),
    warn: (message, data) => log(LogLevel.WARN, message, undefined, data),
    error: (message, error, data) => log(LogLevel.ERROR, message, error, data),
    isEnabled,
    child: (childContext) =>
      createLogger({
        ...(component !== undefined && { component }),
        minLevel,
        context: { ...context, ...childContext },
        handler,
      }),
  }
}

// ============================================================================
// Pre-configured Loggers
// ============================================================================

/**
 * Discards everything. Default for library callers and tests.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  isEnabled: () => false,
  child: () => noopLogger,
}
