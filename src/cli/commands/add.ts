/**
 * @fileoverview git-fad add command
 *
 * Stages the single unstaged or untracked file whose path best matches
 * every query token. A run goes through these steps:
 * 1. List candidates from the working tree
 * 2. Score candidates per token (fuzzy, or glob when the token has `*`, `?` or `[`)
 * 3. Intersect the per-token results, summing scores
 * 4. Pick the winner (score, then shorter path, then lexical order)
 * 5. Stage it, unless this is a dry run
 *
 * Any token that matches nothing ends the run without touching the index.
 *
 * @module cli/commands/add
 *
 * @example
 * // Stage the best match for "src main"
 * const outcome = await fuzzyAdd('/path/to/repo', ['src', 'main'])
 * if (outcome.kind === 'selected') {
 *   console.log(`staged ${outcome.path}`)
 * }
 *
 * @example
 * // Stage one known path
 * await stagePath('/path/to/repo', 'src/main.ts')
 */

import type { BigIntStats } from 'fs'
import * as fs from 'fs/promises'
import * as path from 'path'
import { IndexWriteError, isFadError, PathOutsideRepositoryError, RepositoryAccessError } from '../../errors'
import {
  aggregate,
  rankCandidates,
  select,
  toCandidates,
  type NoMatchReason,
  type Selection,
} from '../../match'
import { NAME } from '../../constants'
import { LogLevel, noopLogger, type Logger } from '../../utils/logger'
import { createCliLogger, resolveConfig } from '../config'
import {
  createFSAdapter,
  entryFromStat,
  FSAdapterError,
  isErrnoException,
  modeFromStat,
  readWorkingFile,
  type FSAdapter,
} from '../fs-adapter'
import type { CommandContext } from '../index'
import { formatStatusShort, getWorkingTreeStatus, listWorkingTreeCandidates } from './status'

// ============================================================================
// Types
// ============================================================================

/**
 * Supplies candidate paths: unstaged or untracked files, relative to the root.
 */
export interface CandidateSource {
  listCandidates(repoRoot: string): Promise<string[]>
}

/**
 * Records a path's current working-tree state in the index.
 */
export interface Stager {
  stage(repoRoot: string, filePath: string): Promise<StageResult>
}

/**
 * What staging did to the index.
 */
export interface StageResult {
  /** Path relative to the repository root, `/`-separated */
  path: string
  /** `added` for a new or updated entry, `removed` for a deleted file */
  action: 'added' | 'removed'
  /** Blob SHA of the staged content; null when removed */
  sha: string | null
}

/**
 * Options for {@link fuzzyAdd}.
 */
export interface FuzzyAddOptions {
  /** Candidate source (default: working-tree status) */
  source?: CandidateSource
  /** Stager (default: on-disk index) */
  stager?: Stager
  /** Select but do not stage */
  dryRun?: boolean
  logger?: Logger
  /** Called with the winner before it is staged */
  onSelected?: (selection: Selection, tokens: readonly string[]) => void
}

/**
 * Result of a fuzzy add run.
 */
export type FuzzyAddOutcome =
  | { kind: 'no-query' }
  | { kind: 'no-candidates'; repoRoot: string }
  | { kind: 'no-match'; reason: NoMatchReason; token: string; tokens: string[] }
  | {
      kind: 'selected'
      path: string
      score: number
      tokens: string[]
      /** False for a dry run */
      staged: boolean
      /** Every surviving candidate, best first */
      ranked: Selection[]
    }

export interface StageOptions {
  logger?: Logger
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Candidate source backed by the repository's working-tree status.
 */
export function workingTreeSource(logger: Logger = noopLogger): CandidateSource {
  return {
    listCandidates: (repoRoot) => listWorkingTreeCandidates(repoRoot, { logger }),
  }
}

/**
 * Stager that writes blobs and the index on disk.
 */
export function indexStager(logger: Logger = noopLogger): Stager {
  return {
    stage: (repoRoot, filePath) => stagePath(repoRoot, filePath, { logger }),
  }
}

// ============================================================================
// Staging
// ============================================================================

/**
 * Resolves `filePath` (absolute, or relative to `workTree`) to a
 * root-relative, `/`-separated path.
 *
 * @throws {PathOutsideRepositoryError} If the path escapes `workTree`
 */
export function resolveRepositoryPath(workTree: string, filePath: string): string {
  const absolute = path.resolve(workTree, filePath)
  const relative = path.relative(workTree, absolute)
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new PathOutsideRepositoryError(filePath, workTree)
  }
  return relative.split(path.sep).join('/')
}

async function lstatOptional(absolutePath: string): Promise<BigIntStats | null> {
  try {
    return await fs.lstat(absolutePath, { bigint: true })
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null
    }
    throw error
  }
}

async function openRepository(repoRoot: string): Promise<FSAdapter> {
  try {
    return await createFSAdapter(repoRoot)
  } catch (error) {
    if (error instanceof FSAdapterError && (error.code === 'NOT_A_GIT_REPO' || error.code === 'BARE_REPOSITORY')) {
      throw RepositoryAccessError.notARepository(repoRoot, error)
    }
    const message = error instanceof Error ? error.message : String(error)
    throw new RepositoryAccessError(`cannot open repository: ${message}`, {
      cause: error,
      path: repoRoot,
      operation: 'open-repository',
    })
  }
}

/**
 * Stages one path, like `git add <path>`: a present file is written as a
 * blob and recorded in the index; a missing file is removed from it.
 *
 * @throws {PathOutsideRepositoryError} If the path is outside the repository
 * @throws {RepositoryAccessError} If the repository cannot be opened
 * @throws {IndexWriteError} If the blob or index cannot be written, or the
 *   index is locked by another process
 */
export async function stagePath(
  repoRoot: string,
  filePath: string,
  options: StageOptions = {}
): Promise<StageResult> {
  const logger = options.logger ?? noopLogger
  const adapter = await openRepository(repoRoot)
  const relative = resolveRepositoryPath(adapter.workTree, filePath)

  if (relative === '' || relative === '.git' || relative.startsWith('.git/')) {
    throw new IndexWriteError(`invalid path '${filePath}'`, { path: filePath, operation: 'stage-path' })
  }

  try {
    const index = adapter.getIndex()
    const absolutePath = path.join(adapter.workTree, relative)
    const stats = await lstatOptional(absolutePath)

    if (stats === null || stats.isDirectory()) {
      const removed = await index.remove(relative)
      if (!removed) {
        throw new IndexWriteError(`pathspec '${relative}' did not match any files`, {
          path: relative,
          operation: 'stage-path',
        })
      }
      await index.write()
      logger.debug('Removed from index', { path: relative })
      return { path: relative, action: 'removed', sha: null }
    }

    const previous = await index.getEntry(relative)
    const fileMode = await adapter.getConfig().getBoolean('core', 'filemode', true)
    const mode = modeFromStat(stats, fileMode, previous?.mode)

    const sha = await adapter.writeBlob(await readWorkingFile(absolutePath, stats))
    await index.add(entryFromStat(relative, sha, stats, mode))
    await index.write()

    logger.debug('Staged', { path: relative, sha, mode: mode.toString(8) })
    return { path: relative, action: 'added', sha }
  } catch (error) {
    if (isFadError(error)) throw error
    const message = error instanceof Error ? error.message : String(error)
    throw new IndexWriteError(`cannot stage '${relative}': ${message}`, {
      cause: error,
      path: error instanceof FSAdapterError ? error.path ?? relative : relative,
      operation: 'stage-path',
    })
  }
}

// ============================================================================
// Orchestration
// ============================================================================

/**
 * Runs one fuzzy add: match `tokens` against the candidates and stage the winner.
 *
 * Ranking is synchronous; only the candidate source and the stager await.
 * An empty token list returns `no-query` before the source is consulted.
 *
 * @throws Whatever the candidate source or stager throws
 */
export async function fuzzyAdd(
  repoRoot: string,
  tokens: readonly string[],
  options: FuzzyAddOptions = {}
): Promise<FuzzyAddOutcome> {
  const logger = options.logger ?? noopLogger
  const query = [...tokens]

  if (query.length === 0) {
    return { kind: 'no-query' }
  }

  const source = options.source ?? workingTreeSource(logger)
  const paths = await source.listCandidates(repoRoot)
  if (paths.length === 0) {
    return { kind: 'no-candidates', repoRoot }
  }

  const candidates = toCandidates(paths)
  const result = aggregate(query, candidates, { logger })
  if (!result.matched) {
    return { kind: 'no-match', reason: result.reason, token: result.token, tokens: query }
  }

  const winner = select(result.scores, candidates)
  if (winner === null) {
    return { kind: 'no-match', reason: 'intersection', token: query[query.length - 1], tokens: query }
  }

  const ranked = rankCandidates(result.scores, candidates)
  logger.debug('Selected', { path: winner.candidate.path, score: winner.score, survivors: ranked.length })
  options.onSelected?.(winner, query)

  if (options.dryRun) {
    return { kind: 'selected', path: winner.candidate.path, score: winner.score, tokens: query, staged: false, ranked }
  }

  const stager = options.stager ?? indexStager(logger)
  await stager.stage(repoRoot, winner.candidate.path)
  return { kind: 'selected', path: winner.candidate.path, score: winner.score, tokens: query, staged: true, ranked }
}

// ============================================================================
// Command Handler
// ============================================================================

/**
 * Usage text printed when no query tokens are given.
 */
export function usage(name: string = NAME): string {
  return `Usage: ${name} <query tokens...>
Examples:
  ${name} package json
  ${name} src main ts
  ${name} '*.md'`
}

/**
 * Formats the winner line.
 *
 * @example
 * formatBestMatch({ candidate: { path: 'src/main.ts', index: 0 }, score: 120 }, ['src', 'main'])
 * // 'Best match: src/main.ts (aggregate_score=120, tokens=src+main)'
 */
export function formatBestMatch(selection: Selection, tokens: readonly string[]): string {
  return `Best match: ${selection.candidate.path} (aggregate_score=${selection.score}, tokens=${tokens.join('+')})`
}

/**
 * Formats the message for a run that ended without a winner.
 */
export function formatNoMatch(reason: NoMatchReason, token: string, tokens: readonly string[]): string {
  return reason === 'token'
    ? `No matches (token '${token}' matched nothing)`
    : `No matches after applying tokens: ${tokens.join(' ')}`
}

/**
 * Command handler for git-fad.
 *
 * @param ctx - Command context
 * @throws {RepositoryAccessError} If the repository cannot be read
 * @throws {IndexWriteError} If staging fails
 */
export async function addCommand(ctx: CommandContext): Promise<void> {
  const { stdout, stderr } = ctx
  const config = resolveConfig(ctx)
  const logger = createCliLogger(config, stderr)

  if (config.list) {
    const entries = await getWorkingTreeStatus(config.cwd, { logger })
    stdout(entries.length === 0 ? noCandidatesMessage(config.cwd) : formatStatusShort(entries))
    return
  }

  const outcome = await fuzzyAdd(config.cwd, config.tokens, {
    dryRun: config.dryRun,
    logger,
    onSelected: (selection, tokens) => stdout(formatBestMatch(selection, tokens)),
  })

  switch (outcome.kind) {
    case 'no-query':
      stderr(usage())
      return
    case 'no-candidates':
      stdout(noCandidatesMessage(outcome.repoRoot))
      return
    case 'no-match':
      stdout(formatNoMatch(outcome.reason, outcome.token, outcome.tokens))
      return
    case 'selected':
      if (logger.isEnabled(LogLevel.DEBUG)) {
        for (const { candidate, score } of outcome.ranked) {
          logger.debug('Ranked', { path: candidate.path, score })
        }
      }
      stdout(outcome.staged ? `Staged ${outcome.path}` : `Would stage ${outcome.path}`)
      return
  }
}

function noCandidatesMessage(repoRoot: string): string {
  return `No unstaged or untracked files found in repository ${repoRoot}`
}
