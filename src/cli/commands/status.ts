/**
 * @fileoverview Working-tree status: the candidate source for fuzzy add.
 *
 * Lists the paths that `git add <path>` would change: untracked files and
 * tracked files that are modified, deleted or changed type in the working
 * tree. Ignored files, unmodified files, submodules and nested repositories
 * are never listed. Conflicted paths are left out as well.
 *
 * @module cli/commands/status
 *
 * @example
 * const entries = await getWorkingTreeStatus('/path/to/repo')
 * console.log(formatStatusShort(entries))
 * // ?? notes/todo.md
 * //  M src/main.ts
 * //  D old.txt
 */

import type { BigIntStats, Dirent } from 'fs'
import * as fs from 'fs/promises'
import * as path from 'path'
import { RepositoryAccessError } from '../../errors'
import { noopLogger, type Logger } from '../../utils/logger'
import {
  createFSAdapter,
  entryFromStat,
  FILE_MODE,
  FSAdapterError,
  hashBlob,
  isErrnoException,
  modeFromStat,
  readWorkingFile,
  timestampFromNs,
  type FSAdapter,
  type IndexEntry,
  type IndexTimestamp,
} from '../fs-adapter'
import { IgnoreRules, loadRepositoryIgnoreRules } from '../gitignore'

// ============================================================================
// Types
// ============================================================================

/**
 * Working-tree state of a candidate path.
 *
 * `renamed` is part of the vocabulary but not produced: rename pairing
 * between the index and the working tree is not detected.
 */
export type WorkingTreeStatus = 'new' | 'modified' | 'deleted' | 'typechange' | 'renamed'

/**
 * A single unstaged or untracked path.
 */
export interface WorkingTreeEntry {
  /** Path relative to the repository root, `/`-separated */
  path: string
  status: WorkingTreeStatus
}

export interface StatusOptions {
  logger?: Logger
}

const SHORT_CODES: Record<WorkingTreeStatus, string> = {
  new: '??',
  modified: ' M',
  deleted: ' D',
  typechange: ' T',
  renamed: ' R',
}

interface ScanContext {
  adapter: FSAdapter
  /** Every path in the index, any stage */
  tracked: Set<string>
  /** Submodule paths (gitlink entries) */
  gitlinks: Set<string>
  /** Paths with an entry at stage 1-3 */
  conflicted: Set<string>
  logger: Logger
}

/**
 * How a tracked entry is compared with the file on disk.
 */
interface CompareContext {
  fileMode: boolean
  /** Modification time of the index file itself, null when there is none */
  indexMtime: IndexTimestamp | null
}

// ============================================================================
// Candidate Source
// ============================================================================

/**
 * Lists unstaged and untracked entries of the repository rooted at `repoRoot`,
 * sorted by path.
 *
 * @throws {RepositoryAccessError} If `repoRoot` is not a repository root or its
 *   metadata (index, directories) cannot be read
 */
export async function getWorkingTreeStatus(
  repoRoot: string,
  options: StatusOptions = {}
): Promise<WorkingTreeEntry[]> {
  const logger = options.logger ?? noopLogger

  try {
    const adapter = await createFSAdapter(repoRoot)
    const index = adapter.getIndex()
    const indexEntries = await index.getEntries()
    const compare: CompareContext = {
      fileMode: await adapter.getConfig().getBoolean('core', 'filemode', true),
      indexMtime: await readMtime(index.indexPath),
    }

    const ctx: ScanContext = {
      adapter,
      tracked: new Set(indexEntries.map(e => e.path)),
      gitlinks: new Set(indexEntries.filter(e => e.mode === FILE_MODE.GITLINK).map(e => e.path)),
      conflicted: new Set(indexEntries.filter(e => e.stage > 0).map(e => e.path)),
      logger,
    }

    const entries: WorkingTreeEntry[] = []
    for (const entry of indexEntries) {
      if (entry.stage !== 0 || entry.mode === FILE_MODE.GITLINK || entry.flags.skipWorktree) continue
      if (ctx.conflicted.has(entry.path)) continue

      const status = await compareTracked(adapter, entry, compare)
      if (status !== null) {
        entries.push({ path: entry.path, status })
      }
    }

    await scanWorkingTree(ctx, '', await loadRepositoryIgnoreRules(adapter), entries)

    entries.sort((a, b) => Buffer.compare(Buffer.from(a.path), Buffer.from(b.path)))
    logger.debug('Working tree scanned', { root: adapter.workTree, candidates: entries.length })
    return entries
  } catch (error) {
    throw toRepositoryAccessError(error, repoRoot)
  }
}

/**
 * Candidate paths for fuzzy add, sorted by path.
 *
 * @throws {RepositoryAccessError} See {@link getWorkingTreeStatus}
 */
export async function listWorkingTreeCandidates(repoRoot: string, options: StatusOptions = {}): Promise<string[]> {
  const entries = await getWorkingTreeStatus(repoRoot, options)
  return entries.map(e => e.path)
}

/**
 * Format entries with `git status --short` working-tree codes.
 *
 * @example
 * formatStatusShort([{ path: 'a.txt', status: 'new' }, { path: 'b.txt', status: 'modified' }])
 * // '?? a.txt\n M b.txt'
 */
export function formatStatusShort(entries: readonly WorkingTreeEntry[]): string {
  return entries.map(e => `${SHORT_CODES[e.status]} ${e.path}`).join('\n')
}

// ============================================================================
// Helper Functions
// ============================================================================

async function readMtime(filePath: string): Promise<IndexTimestamp | null> {
  try {
    const stats = await fs.stat(filePath, { bigint: true })
    return timestampFromNs(stats.mtimeNs)
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return null
    throw error
  }
}

/**
 * An entry is racily clean when its file was last modified no earlier than
 * the index was written: a later edit within the same timestamp tick would
 * leave its stat data unchanged, so only the content can tell.
 */
function isRacilyClean(entry: IndexEntry, indexMtime: IndexTimestamp | null): boolean {
  if (indexMtime === null) return false
  if (entry.mtime.seconds !== indexMtime.seconds) {
    return entry.mtime.seconds > indexMtime.seconds
  }
  return entry.mtime.nanoseconds >= indexMtime.nanoseconds
}

function toRepositoryAccessError(error: unknown, repoRoot: string): RepositoryAccessError {
  if (error instanceof RepositoryAccessError) return error
  if (error instanceof FSAdapterError) {
    if (error.code === 'NOT_A_GIT_REPO' || error.code === 'BARE_REPOSITORY') {
      return RepositoryAccessError.notARepository(repoRoot, error)
    }
    return new RepositoryAccessError(error.message, {
      cause: error,
      path: error.path ?? repoRoot,
      operation: 'read-status',
    })
  }
  const message = error instanceof Error ? error.message : String(error)
  return new RepositoryAccessError(`cannot read working tree: ${message}`, {
    cause: error,
    path: repoRoot,
    operation: 'read-status',
  })
}

/**
 * Compares a stage-0 index entry with the file on disk.
 *
 * @returns The entry's working-tree status, or null if unmodified
 */
async function compareTracked(
  adapter: FSAdapter,
  entry: IndexEntry,
  { fileMode, indexMtime }: CompareContext
): Promise<WorkingTreeStatus | null> {
  const absolutePath = path.join(adapter.workTree, entry.path)

  let stats: BigIntStats
  try {
    stats = await fs.lstat(absolutePath, { bigint: true })
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return 'deleted'
    }
    throw error
  }

  if (stats.isDirectory()) return 'deleted'

  const wasSymlink = entry.mode === FILE_MODE.SYMLINK
  if (stats.isSymbolicLink() !== wasSymlink || (!stats.isSymbolicLink() && !stats.isFile())) {
    return 'typechange'
  }

  const current = entryFromStat(entry.path, entry.sha, stats, modeFromStat(stats, fileMode, entry.mode))
  if (current.size !== entry.size || current.mode !== entry.mode) {
    return 'modified'
  }
  const sameMtime = current.mtime.seconds === entry.mtime.seconds && current.mtime.nanoseconds === entry.mtime.nanoseconds
  if (sameMtime && !isRacilyClean(entry, indexMtime)) {
    return null
  }

  const content = await readWorkingFile(absolutePath, stats)
  return hashBlob(content) === entry.sha ? null : 'modified'
}

/**
 * Walks the working tree collecting untracked, non-ignored files.
 * Untracked directories are expanded into their files.
 */
async function scanWorkingTree(
  ctx: ScanContext,
  relativeDir: string,
  parentRules: IgnoreRules,
  out: WorkingTreeEntry[]
): Promise<void> {
  const { workTree } = ctx.adapter
  const rules = await parentRules.withDirectory(workTree, relativeDir)
  const currentPath = relativeDir ? path.join(workTree, relativeDir) : workTree

  let dirents: Dirent[]
  try {
    dirents = await fs.readdir(currentPath, { withFileTypes: true })
  } catch (error) {
    if (relativeDir === '') throw error
    ctx.logger.warn('Skipping unreadable directory', { path: relativeDir })
    return
  }

  for (const dirent of dirents) {
    // Skip .git directory
    if (dirent.name === '.git') continue

    const entryPath = relativeDir ? `${relativeDir}/${dirent.name}` : dirent.name

    if (dirent.isDirectory()) {
      if (ctx.gitlinks.has(entryPath)) continue
      if (await isNestedRepository(path.join(workTree, entryPath))) continue
      if (rules.isIgnored(entryPath, true)) continue
      await scanWorkingTree(ctx, entryPath, rules, out)
    } else if (dirent.isFile() || dirent.isSymbolicLink()) {
      if (ctx.tracked.has(entryPath)) continue
      if (rules.isIgnored(entryPath, false)) continue
      out.push({ path: entryPath, status: 'new' })
    }
  }
}

async function isNestedRepository(dirPath: string): Promise<boolean> {
  try {
    await fs.lstat(path.join(dirPath, '.git'))
    return true
  } catch {
    return false
  }
}
