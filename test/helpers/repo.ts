/**
 * Temporary git repositories for tests.
 *
 * Repositories are built by hand: a `.git` directory with HEAD, objects,
 * refs and config, and an index written with the project's own serializer.
 */

import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import {
  entryFromStat,
  hashBlob,
  modeFromStat,
  parseIndex,
  readWorkingFile,
  serializeIndex,
  type IndexEntry,
} from '../../src/cli/fs-adapter'

/**
 * Create a temporary directory for testing
 */
export async function createTempDir(prefix = 'git-fad-test-'): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix))
}

/**
 * Clean up temporary directory
 */
export async function removeTempDir(dirPath: string): Promise<void> {
  await fs.rm(dirPath, { recursive: true, force: true })
}

/**
 * Create a git repository skeleton at `basePath`
 */
export async function createGitRepo(basePath: string, options: {
  /** Extra lines appended to `.git/config` */
  config?: string
} = {}): Promise<string> {
  const gitDir = path.join(basePath, '.git')

  await fs.mkdir(path.join(gitDir, 'objects'), { recursive: true })
  await fs.mkdir(path.join(gitDir, 'refs', 'heads'), { recursive: true })
  await fs.mkdir(path.join(gitDir, 'info'), { recursive: true })
  await fs.writeFile(path.join(gitDir, 'HEAD'), 'ref: refs/heads/main\n')

  let config = `[core]
\trepositoryformatversion = 0
\tfilemode = true
\tbare = false
`
  if (options.config) {
    config += options.config
  }
  await fs.writeFile(path.join(gitDir, 'config'), config)

  return basePath
}

/**
 * Write files relative to `root`, creating parent directories
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const absolutePath = path.join(root, relativePath)
    await fs.mkdir(path.dirname(absolutePath), { recursive: true })
    await fs.writeFile(absolutePath, content)
  }
}

/**
 * Build an index entry for each path from its current state on disk, as
 * `git add` would, and write the index. Blob objects are not written.
 */
export async function trackFiles(root: string, paths: string[]): Promise<IndexEntry[]> {
  const entries: IndexEntry[] = []
  for (const relativePath of paths) {
    const absolutePath = path.join(root, relativePath)
    const stats = await fs.lstat(absolutePath, { bigint: true })
    const sha = hashBlob(await readWorkingFile(absolutePath, stats))
    entries.push(entryFromStat(relativePath, sha, stats, modeFromStat(stats, true)))
  }
  await writeIndex(root, entries)
  return entries
}

/**
 * Write `entries` as the repository's index
 */
export async function writeIndex(root: string, entries: IndexEntry[]): Promise<void> {
  await fs.writeFile(path.join(root, '.git', 'index'), serializeIndex(entries))
}

/**
 * Read and parse the repository's index
 */
export async function readIndexEntries(root: string): Promise<IndexEntry[]> {
  const data = await fs.readFile(path.join(root, '.git', 'index'))
  return parseIndex(new Uint8Array(data)).entries
}

/**
 * Build an index entry with zeroed stat data
 */
export function makeEntry(entryPath: string, overrides: Partial<IndexEntry> = {}): IndexEntry {
  return {
    path: entryPath,
    sha: hashBlob(new TextEncoder().encode(entryPath)),
    mode: 0o100644,
    size: entryPath.length,
    ctime: { seconds: 0, nanoseconds: 0 },
    mtime: { seconds: 0, nanoseconds: 0 },
    dev: 0,
    ino: 0,
    uid: 0,
    gid: 0,
    stage: 0,
    flags: { assumeValid: false, extended: false, skipWorktree: false, intentToAdd: false },
    ...overrides,
  }
}

/**
 * Move a file's mtime one day back so it no longer matches its index entry
 */
export async function touchPast(root: string, relativePath: string): Promise<void> {
  const past = new Date(Date.now() - 24 * 60 * 60 * 1000)
  await fs.utimes(path.join(root, relativePath), past, past)
}

/**
 * Capture CLI output
 */
export function createOutputCapture() {
  const output: { stdout: string[]; stderr: string[] } = {
    stdout: [],
    stderr: []
  }

  return {
    output,
    stdout: (msg: string) => output.stdout.push(msg),
    stderr: (msg: string) => output.stderr.push(msg)
  }
}
