/**
 * @fileoverview Run configuration
 *
 * Turns parsed command-line arguments and the environment into the settings
 * a single run uses. Query tokens come from three places, in order:
 * positional arguments, `-q/--query` values (split on whitespace), then
 * arguments after `--`. Blank tokens are dropped.
 *
 * @module cli/config
 */

import { LOG_LEVEL_ENV } from '../constants'
import { createLineHandler, createLogger, LogLevel, parseLogLevel, type Logger } from '../utils/logger'
import type { CommandContext } from './index'

// ============================================================================
// Types
// ============================================================================

/**
 * Settings for one run.
 */
export interface FadConfig {
  /** Repository root (already resolved from `-C/--cwd`) */
  cwd: string
  /** Query tokens, in the order given */
  tokens: string[]
  /** Report the winner without staging it */
  dryRun: boolean
  /** List candidates instead of matching */
  list: boolean
  verbose: boolean
  logLevel: LogLevel
}

// ============================================================================
// Token Assembly
// ============================================================================

/**
 * Splits a `--query` value on whitespace.
 *
 * @example
 * splitQuery('  src  main ts ') // ['src', 'main', 'ts']
 */
export function splitQuery(query: string): string[] {
  return query.split(/\s+/).filter(token => token.length > 0)
}

function toStrings(value: unknown): string[] {
  if (value === undefined || value === null || typeof value === 'boolean') return []
  if (Array.isArray(value)) return value.flatMap(toStrings)
  return [String(value)]
}

/**
 * Collects query tokens from positional arguments, `--query` values and
 * arguments after `--`.
 *
 * @example
 * assembleTokens(['src'], ['main ts'], ['*.md'])
 * // ['src', 'main', 'ts', '*.md']
 */
export function assembleTokens(
  args: readonly unknown[],
  queries: readonly unknown[] = [],
  rawArgs: readonly unknown[] = []
): string[] {
  return [
    ...args.flatMap(toStrings),
    ...queries.flatMap(toStrings).flatMap(splitQuery),
    ...rawArgs.flatMap(toStrings),
  ].filter(token => token.trim().length > 0)
}

// ============================================================================
// Resolution
// ============================================================================

function flag(options: Record<string, unknown>, ...keys: string[]): boolean {
  return keys.some(key => options[key] === true)
}

/**
 * Resolves the run configuration from a command context.
 *
 * The log level comes from `GIT_FAD_LOG_LEVEL` when set to a known level,
 * otherwise `debug` with `--verbose` and `warn` without.
 */
export function resolveConfig(ctx: CommandContext): FadConfig {
  const { options } = ctx
  const verbose = flag(options, 'verbose')
  const envLevel = parseLogLevel(ctx.env[LOG_LEVEL_ENV])

  return {
    cwd: ctx.cwd,
    tokens: assembleTokens(ctx.args, toStrings(options.query ?? options.q), ctx.rawArgs),
    dryRun: flag(options, 'dryRun', 'n'),
    list: flag(options, 'list', 'l'),
    verbose,
    logLevel: envLevel ?? (verbose ? LogLevel.DEBUG : LogLevel.WARN),
  }
}

/**
 * Creates the run's logger: JSON lines on the error stream.
 */
export function createCliLogger(config: FadConfig, stderr: (msg: string) => void): Logger {
  return createLogger({
    component: 'git-fad',
    minLevel: config.logLevel,
    context: { repoRoot: config.cwd },
    handler: createLineHandler(stderr),
  })
}
