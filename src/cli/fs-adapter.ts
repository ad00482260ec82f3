/**
 * @fileoverview Local Filesystem Git Repository Adapter
 *
 * Reads and writes the parts of a local git repository that staging
 * touches:
 * - Repository detection (`.git` directory or `gitdir:` file, linked worktrees)
 * - Index/staging area (binary `DIRC` format, versions 2-4 read, 2-3 written)
 * - Git configuration (`config` INI file)
 * - Loose blob objects (zlib-deflated)
 *
 * Discovery never walks above the given root, and bare repositories are
 * rejected since they have no working tree to stage from.
 *
 * @module cli/fs-adapter
 *
 * @example
 * import { createFSAdapter } from './fs-adapter'
 *
 * const adapter = await createFSAdapter('/path/to/repo')
 * const entries = await adapter.getIndex().getEntries()
 * const filemode = await adapter.getConfig().getBoolean('core', 'filemode', true)
 */

import { createHash } from 'crypto'
import type { BigIntStats } from 'fs'
import * as fs from 'fs/promises'
import * as path from 'path'
import pako from 'pako'

// ============================================================================
// Errors
// ============================================================================

/**
 * Error codes for filesystem operations.
 *
 * - NOT_A_GIT_REPO: Path is not a valid git repository
 * - BARE_REPOSITORY: Repository has no working tree
 * - CORRUPT_INDEX: Index file is malformed or its checksum does not match
 * - UNSUPPORTED_VERSION: Index version is not 2, 3 or 4
 * - UNSUPPORTED_EXTENSION: Index carries a required extension we cannot interpret
 * - INDEX_LOCKED: `index.lock` already exists
 * - READ_ERROR: General filesystem read error
 * - WRITE_ERROR: General filesystem write error
 */
export type FSAdapterErrorCode =
  | 'NOT_A_GIT_REPO'
  | 'BARE_REPOSITORY'
  | 'CORRUPT_INDEX'
  | 'UNSUPPORTED_VERSION'
  | 'UNSUPPORTED_EXTENSION'
  | 'INDEX_LOCKED'
  | 'READ_ERROR'
  | 'WRITE_ERROR'

/**
 * Error thrown by filesystem operations.
 *
 * @example
 * try {
 *   await adapter.getIndex().getEntries()
 * } catch (error) {
 *   if (error instanceof FSAdapterError && error.code === 'CORRUPT_INDEX') {
 *     console.log('Index is corrupted:', error.path)
 *   }
 * }
 */
export class FSAdapterError extends Error {
  constructor(
    message: string,
    /** Error code for programmatic handling */
    public readonly code: FSAdapterErrorCode,
    /** Optional path related to the error */
    public readonly path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'FSAdapterError'
  }
}

// ============================================================================
// Index Types
// ============================================================================

/**
 * File modes git records in the index.
 */
export const FILE_MODE = {
  REGULAR: 0o100644,
  EXECUTABLE: 0o100755,
  SYMLINK: 0o120000,
  GITLINK: 0o160000,
} as const

/**
 * A timestamp as stored in the index: 32-bit seconds plus nanoseconds.
 */
export interface IndexTimestamp {
  seconds: number
  nanoseconds: number
}

/**
 * A single entry in the git index (staging area).
 *
 * Stat fields are kept exactly as read so that rewriting the index does not
 * disturb entries we did not touch.
 */
export interface IndexEntry {
  /** Path relative to the working tree root, `/`-separated */
  path: string
  /** Blob (or gitlink commit) SHA-1, lowercase hex */
  sha: string
  /** File mode (see {@link FILE_MODE}) */
  mode: number
  /** File size, truncated to 32 bits */
  size: number
  ctime: IndexTimestamp
  mtime: IndexTimestamp
  dev: number
  ino: number
  uid: number
  gid: number
  /** Merge stage: 0 normal, 1-3 conflict */
  stage: number
  flags: {
    assumeValid: boolean
    extended: boolean
    skipWorktree: boolean
    intentToAdd: boolean
  }
}

/**
 * Decoded contents of an index file.
 */
export interface ParsedIndex {
  version: number
  entries: IndexEntry[]
  /** Signatures of the optional extensions present (e.g. `TREE`) */
  extensions: string[]
}

// ============================================================================
// Helper Functions
// ============================================================================

const decoder = new TextDecoder()
const encoder = new TextEncoder()

const INDEX_SIGNATURE = 'DIRC'
const HASH_LENGTH = 20
const ENTRY_FIXED_LENGTH = 62

function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('')
}

function hexToBytes(hex: string): Uint8Array {
  const bytes = new Uint8Array(hex.length / 2)
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.substring(i * 2, i * 2 + 2), 16)
  }
  return bytes
}

function sha1(...parts: Uint8Array[]): Uint8Array {
  const hash = createHash('sha1')
  for (const part of parts) {
    hash.update(part)
  }
  return new Uint8Array(hash.digest())
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i]
  }
  return a.length - b.length
}

function toUint32(value: bigint): number {
  return Number(BigInt.asUintN(32, value))
}

/**
 * Narrows an unknown error to a Node.js system error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath)
    return stat.isDirectory()
  } catch {
    return false
  }
}

// ============================================================================
// Index Codec
// ============================================================================

/**
 * Orders entries the way git stores them: by path bytes, then stage.
 */
export function compareIndexEntries(a: IndexEntry, b: IndexEntry): number {
  const byPath = compareBytes(encoder.encode(a.path), encoder.encode(b.path))
  return byPath !== 0 ? byPath : a.stage - b.stage
}

/**
 * Reads a v4 prefix-length varint (the OFS_DELTA offset encoding).
 */
function readOffsetVarint(data: Uint8Array, start: number): { value: number; next: number } {
  let offset = start
  let byte = data[offset++]
  let value = byte & 0x7f
  while (byte & 0x80) {
    if (offset >= data.length) {
      throw new FSAdapterError('Index truncated', 'CORRUPT_INDEX')
    }
    value += 1
    byte = data[offset++]
    value = (value << 7) + (byte & 0x7f)
  }
  return { value, next: offset }
}

function findNul(data: Uint8Array, start: number, end: number): number {
  for (let i = start; i < end; i++) {
    if (data[i] === 0) return i
  }
  throw new FSAdapterError('Index entry path is not terminated', 'CORRUPT_INDEX')
}

/**
 * Parses a binary index file.
 *
 * Index format:
 * - 4 bytes: signature "DIRC"
 * - 4 bytes: version (2, 3, or 4)
 * - 4 bytes: number of entries
 * - entries (v2/v3 NUL-padded to 8 bytes, v4 prefix-compressed paths)
 * - extensions (4-byte signature, 4-byte size, payload)
 * - 20 bytes: SHA-1 of everything above (all zero when `index.skipHash` is set)
 *
 * @throws {FSAdapterError} CORRUPT_INDEX, UNSUPPORTED_VERSION or UNSUPPORTED_EXTENSION
 */
export function parseIndex(data: Uint8Array): ParsedIndex {
  if (data.length < 12 + HASH_LENGTH) {
    throw new FSAdapterError('Index file too short', 'CORRUPT_INDEX')
  }

  const signature = String.fromCharCode(data[0], data[1], data[2], data[3])
  if (signature !== INDEX_SIGNATURE) {
    throw new FSAdapterError('Invalid index signature', 'CORRUPT_INDEX')
  }

  const contentEnd = data.length - HASH_LENGTH
  const trailer = data.subarray(contentEnd)
  if (trailer.some(b => b !== 0) && !bytesEqual(sha1(data.subarray(0, contentEnd)), trailer)) {
    throw new FSAdapterError('Index checksum mismatch', 'CORRUPT_INDEX')
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  const version = view.getUint32(4, false)
  if (version < 2 || version > 4) {
    throw new FSAdapterError(`Unsupported index version: ${version}`, 'UNSUPPORTED_VERSION')
  }

  const numEntries = view.getUint32(8, false)
  const entries: IndexEntry[] = []

  let offset = 12
  let prevPath: Uint8Array = new Uint8Array(0)

  for (let i = 0; i < numEntries; i++) {
    const entryStart = offset
    if (offset + ENTRY_FIXED_LENGTH > contentEnd) {
      throw new FSAdapterError('Index truncated', 'CORRUPT_INDEX')
    }

    const ctime = { seconds: view.getUint32(offset, false), nanoseconds: view.getUint32(offset + 4, false) }
    const mtime = { seconds: view.getUint32(offset + 8, false), nanoseconds: view.getUint32(offset + 12, false) }
    const dev = view.getUint32(offset + 16, false)
    const ino = view.getUint32(offset + 20, false)
    const mode = view.getUint32(offset + 24, false)
    const uid = view.getUint32(offset + 28, false)
    const gid = view.getUint32(offset + 32, false)
    const size = view.getUint32(offset + 36, false)
    const sha = bytesToHex(data.subarray(offset + 40, offset + 60))
    const flags = view.getUint16(offset + 60, false)
    offset += ENTRY_FIXED_LENGTH

    const assumeValid = (flags & 0x8000) !== 0
    const extended = (flags & 0x4000) !== 0
    const stage = (flags >> 12) & 0x3

    let skipWorktree = false
    let intentToAdd = false
    if (extended) {
      if (version < 3) {
        throw new FSAdapterError('Extended entry flags in a version 2 index', 'CORRUPT_INDEX')
      }
      const extFlags = view.getUint16(offset, false)
      skipWorktree = (extFlags & 0x4000) !== 0
      intentToAdd = (extFlags & 0x2000) !== 0
      offset += 2
    }

    let pathBytes: Uint8Array
    if (version === 4) {
      const { value: strip, next } = readOffsetVarint(data, offset)
      if (strip > prevPath.length) {
        throw new FSAdapterError('Invalid path prefix length', 'CORRUPT_INDEX')
      }
      const pathEnd = findNul(data, next, contentEnd)
      const suffix = data.subarray(next, pathEnd)
      const prefix = prevPath.subarray(0, prevPath.length - strip)
      pathBytes = new Uint8Array(prefix.length + suffix.length)
      pathBytes.set(prefix, 0)
      pathBytes.set(suffix, prefix.length)
      offset = pathEnd + 1
    } else {
      const pathEnd = findNul(data, offset, contentEnd)
      pathBytes = data.slice(offset, pathEnd)
      // Entry is NUL-padded to a multiple of 8 bytes from its start
      offset = entryStart + ((pathEnd - entryStart + 8) & ~7)
    }
    prevPath = pathBytes

    entries.push({
      path: decoder.decode(pathBytes),
      sha,
      mode,
      size,
      ctime,
      mtime,
      dev,
      ino,
      uid,
      gid,
      stage,
      flags: { assumeValid, extended, skipWorktree, intentToAdd },
    })
  }

  const extensions: string[] = []
  while (offset + 8 <= contentEnd) {
    const name = String.fromCharCode(data[offset], data[offset + 1], data[offset + 2], data[offset + 3])
    const extSize = view.getUint32(offset + 4, false)
    if (offset + 8 + extSize > contentEnd) {
      throw new FSAdapterError(`Index extension ${name} truncated`, 'CORRUPT_INDEX')
    }
    // Extensions whose signature starts outside A-Z must be understood
    if (name[0] < 'A' || name[0] > 'Z') {
      throw new FSAdapterError(`Unsupported index extension: ${name}`, 'UNSUPPORTED_EXTENSION')
    }
    extensions.push(name)
    offset += 8 + extSize
  }

  if (offset !== contentEnd) {
    throw new FSAdapterError('Trailing data after index entries', 'CORRUPT_INDEX')
  }

  return { version, entries, extensions }
}

/**
 * Serializes entries into a version 2 index, or version 3 when any entry
 * needs extended flags. No extensions are written.
 */
export function serializeIndex(entries: readonly IndexEntry[]): Uint8Array {
  const sorted = [...entries].sort(compareIndexEntries)
  const needsExtended = sorted.some(e => e.flags.skipWorktree || e.flags.intentToAdd)
  const version = needsExtended ? 3 : 2

  const encoded = sorted.map(entry => {
    const pathBytes = encoder.encode(entry.path)
    const extended = entry.flags.skipWorktree || entry.flags.intentToAdd
    const fixed = ENTRY_FIXED_LENGTH + (extended ? 2 : 0)
    return { entry, pathBytes, extended, length: (fixed + pathBytes.length + 8) & ~7 }
  })

  const bodyLength = 12 + encoded.reduce((total, e) => total + e.length, 0)
  const out = new Uint8Array(bodyLength + HASH_LENGTH)
  const view = new DataView(out.buffer)

  out.set(encoder.encode(INDEX_SIGNATURE), 0)
  view.setUint32(4, version, false)
  view.setUint32(8, sorted.length, false)

  let offset = 12
  for (const { entry, pathBytes, extended, length } of encoded) {
    view.setUint32(offset, entry.ctime.seconds, false)
    view.setUint32(offset + 4, entry.ctime.nanoseconds, false)
    view.setUint32(offset + 8, entry.mtime.seconds, false)
    view.setUint32(offset + 12, entry.mtime.nanoseconds, false)
    view.setUint32(offset + 16, entry.dev, false)
    view.setUint32(offset + 20, entry.ino, false)
    view.setUint32(offset + 24, entry.mode, false)
    view.setUint32(offset + 28, entry.uid, false)
    view.setUint32(offset + 32, entry.gid, false)
    view.setUint32(offset + 36, entry.size, false)
    out.set(hexToBytes(entry.sha), offset + 40)

    const flags =
      (entry.flags.assumeValid ? 0x8000 : 0) |
      (extended ? 0x4000 : 0) |
      ((entry.stage & 0x3) << 12) |
      Math.min(pathBytes.length, 0xfff)
    view.setUint16(offset + 60, flags, false)

    let pathOffset = offset + ENTRY_FIXED_LENGTH
    if (extended) {
      const extFlags = (entry.flags.skipWorktree ? 0x4000 : 0) | (entry.flags.intentToAdd ? 0x2000 : 0)
      view.setUint16(pathOffset, extFlags, false)
      pathOffset += 2
    }
    out.set(pathBytes, pathOffset)
    offset += length
  }

  out.set(sha1(out.subarray(0, bodyLength)), bodyLength)
  return out
}

/**
 * Derives the index mode for a file from its stat data.
 *
 * With `core.filemode` off, the executable bit on disk is ignored and the
 * previously recorded mode (if any) is kept.
 */
export function modeFromStat(stats: BigIntStats, fileMode: boolean, previousMode?: number): number {
  if (stats.isSymbolicLink()) return FILE_MODE.SYMLINK
  if (!fileMode) {
    return previousMode === FILE_MODE.EXECUTABLE ? FILE_MODE.EXECUTABLE : FILE_MODE.REGULAR
  }
  return (stats.mode & 0o111n) !== 0n ? FILE_MODE.EXECUTABLE : FILE_MODE.REGULAR
}

/**
 * Converts a nanosecond stat time to the index's 32-bit seconds form.
 */
export function timestampFromNs(ns: bigint): IndexTimestamp {
  const billion = 1_000_000_000n
  return { seconds: toUint32(ns / billion), nanoseconds: Number(ns % billion) }
}

/**
 * Builds a stage-0 index entry from `lstat(..., { bigint: true })` output.
 * Stat fields are truncated to 32 bits as git does.
 */
export function entryFromStat(filePath: string, sha: string, stats: BigIntStats, mode: number): IndexEntry {
  return {
    path: filePath,
    sha,
    mode,
    size: toUint32(stats.size),
    ctime: timestampFromNs(stats.ctimeNs),
    mtime: timestampFromNs(stats.mtimeNs),
    dev: toUint32(stats.dev),
    ino: toUint32(stats.ino),
    uid: toUint32(stats.uid),
    gid: toUint32(stats.gid),
    stage: 0,
    flags: { assumeValid: false, extended: false, skipWorktree: false, intentToAdd: false },
  }
}

// ============================================================================
// Object Helpers
// ============================================================================

function blobHeader(content: Uint8Array): Uint8Array {
  return encoder.encode(`blob ${content.length}\0`)
}

/**
 * Reads what git stores for a working-tree file: its bytes, or for a
 * symlink the link target.
 */
export async function readWorkingFile(absolutePath: string, stats: BigIntStats): Promise<Uint8Array> {
  if (stats.isSymbolicLink()) {
    return encoder.encode(await fs.readlink(absolutePath))
  }
  return new Uint8Array(await fs.readFile(absolutePath))
}

/**
 * Computes the blob object id of `content`.
 */
export function hashBlob(content: Uint8Array): string {
  return bytesToHex(sha1(blobHeader(content), content))
}

// ============================================================================
// Interfaces
// ============================================================================

/**
 * Read/write access to the git index.
 *
 * @example
 * const index = adapter.getIndex()
 * const entry = await index.getEntry('src/main.ts')
 * await index.add(updated)
 * await index.write()
 */
export interface FSIndex {
  /** Absolute path of the index file */
  readonly indexPath: string
  /** All entries, every stage, in index order */
  getEntries(): Promise<IndexEntry[]>
  /** The stage-0 entry for a path, if any */
  getEntry(filePath: string): Promise<IndexEntry | null>
  /** Index format version as read (2 when the index does not exist yet) */
  getVersion(): Promise<number>
  /** Replaces every entry (all stages) for `entry.path` with `entry` */
  add(entry: IndexEntry): Promise<void>
  /** Removes every entry for a path; resolves true if any was removed */
  remove(filePath: string): Promise<boolean>
  /** Writes the index through `index.lock` */
  write(): Promise<void>
}

/**
 * Git configuration reader.
 */
export interface FSConfig {
  /** Last value for `section.key`, or null */
  get(section: string, key: string): Promise<string | null>
  /** Boolean value using git's spelling rules, or `fallback` if unset or unparseable */
  getBoolean(section: string, key: string, fallback: boolean): Promise<boolean>
}

/**
 * Access to one non-bare repository rooted at `workTree`.
 */
export interface FSAdapter {
  /** Working tree root */
  readonly workTree: string
  /** Per-worktree git directory (holds HEAD and index) */
  readonly gitDir: string
  /** Shared git directory (holds objects, refs, config, info) */
  readonly commonDir: string
  getIndex(): FSIndex
  getConfig(): FSConfig
  /** Stores `content` as a loose blob; resolves to its object id */
  writeBlob(content: Uint8Array): Promise<string>
}

// ============================================================================
// Git Repository Detection
// ============================================================================

async function isValidGitDir(gitDir: string, commonDir: string): Promise<boolean> {
  // Must have HEAD, objects dir, and refs dir
  const headExists = await fileExists(path.join(gitDir, 'HEAD'))
  const objectsExists = await isDirectory(path.join(commonDir, 'objects'))
  const refsExists = await isDirectory(path.join(commonDir, 'refs'))

  return headExists && objectsExists && refsExists
}

async function resolveCommonDir(gitDir: string): Promise<string> {
  try {
    const content = await fs.readFile(path.join(gitDir, 'commondir'), 'utf8')
    return path.resolve(gitDir, content.trim())
  } catch {
    return gitDir
  }
}

/**
 * Locates the git directory for a working tree root.
 *
 * Only `<root>/.git` is considered: a directory, or a file holding
 * `gitdir: <path>` (linked worktrees and submodules).
 *
 * @returns The git directory, or null if `root/.git` is absent or unusable
 */
export async function findGitDir(root: string): Promise<string | null> {
  const gitPath = path.join(root, '.git')

  try {
    const stat = await fs.stat(gitPath)
    if (stat.isDirectory()) {
      return gitPath
    }
    if (stat.isFile()) {
      const content = await fs.readFile(gitPath, 'utf8')
      const match = content.match(/^gitdir:\s*(.+)$/m)
      if (match) {
        return path.resolve(root, match[1].trim())
      }
    }
  } catch {
    // No .git entry
  }

  return null
}

/**
 * Check if a directory is the root of a git working tree.
 *
 * @example
 * if (await isGitRepository('/path/to/repo')) {
 *   console.log('Valid git repository')
 * }
 */
export async function isGitRepository(root: string): Promise<boolean> {
  const gitDir = await findGitDir(root)
  if (gitDir === null) return false
  return isValidGitDir(gitDir, await resolveCommonDir(gitDir))
}

// ============================================================================
// Implementation Classes
// ============================================================================

class FSIndexImpl implements FSIndex {
  private entries: IndexEntry[] | null = null
  private version = 2

  readonly indexPath: string

  constructor(gitDir: string) {
    this.indexPath = path.join(gitDir, 'index')
  }

  private async load(): Promise<IndexEntry[]> {
    if (this.entries !== null) return this.entries

    let data: Buffer
    try {
      data = await fs.readFile(this.indexPath)
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.entries = []
        return this.entries
      }
      throw new FSAdapterError(
        `Failed to read index: ${errorMessage(error)}`,
        'READ_ERROR',
        this.indexPath,
        { cause: error }
      )
    }

    const parsed = parseIndex(new Uint8Array(data.buffer, data.byteOffset, data.byteLength))
    this.version = parsed.version
    this.entries = parsed.entries
    return this.entries
  }

  async getEntries(): Promise<IndexEntry[]> {
    return [...(await this.load())]
  }

  async getEntry(filePath: string): Promise<IndexEntry | null> {
    const entries = await this.load()
    return entries.find(e => e.path === filePath && e.stage === 0) ?? null
  }

  async getVersion(): Promise<number> {
    await this.load()
    return this.version
  }

  async add(entry: IndexEntry): Promise<void> {
    const entries = await this.load()
    this.entries = [...entries.filter(e => e.path !== entry.path), entry]
  }

  async remove(filePath: string): Promise<boolean> {
    const entries = await this.load()
    const kept = entries.filter(e => e.path !== filePath)
    this.entries = kept
    return kept.length !== entries.length
  }

  async write(): Promise<void> {
    const data = serializeIndex(await this.load())
    const lockPath = `${this.indexPath}.lock`

    let handle: fs.FileHandle
    try {
      handle = await fs.open(lockPath, 'wx')
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new FSAdapterError(
          `Unable to create '${lockPath}': File exists. Another git process seems to be running in this repository`,
          'INDEX_LOCKED',
          lockPath,
          { cause: error }
        )
      }
      throw new FSAdapterError(`Unable to create '${lockPath}': ${errorMessage(error)}`, 'WRITE_ERROR', lockPath, {
        cause: error,
      })
    }

    try {
      try {
        await handle.writeFile(data)
      } finally {
        await handle.close()
      }
      await fs.rename(lockPath, this.indexPath)
    } catch (error) {
      await fs.rm(lockPath, { force: true })
      throw new FSAdapterError(`Failed to write index: ${errorMessage(error)}`, 'WRITE_ERROR', this.indexPath, {
        cause: error,
      })
    }
  }
}

class FSConfigImpl implements FSConfig {
  private config: Map<string, string[]> | null = null

  constructor(private readonly commonDir: string) {}

  private async load(): Promise<Map<string, string[]>> {
    if (this.config !== null) return this.config

    let content = ''
    try {
      content = await fs.readFile(path.join(this.commonDir, 'config'), 'utf8')
    } catch {
      // Config might not exist
    }
    this.config = parseConfig(content)
    return this.config
  }

  async get(section: string, key: string): Promise<string | null> {
    const config = await this.load()
    const values = config.get(`${section.toLowerCase()}.${key.toLowerCase()}`)
    return values && values.length > 0 ? values[values.length - 1] : null
  }

  async getBoolean(section: string, key: string, fallback: boolean): Promise<boolean> {
    const value = await this.get(section, key)
    if (value === null) return fallback
    switch (value.toLowerCase()) {
      case '':
      case 'true':
      case 'yes':
      case 'on':
      case '1':
        return true
      case 'false':
      case 'no':
      case 'off':
      case '0':
        return false
      default:
        return fallback
    }
  }
}

/**
 * Parses git's INI-style config into `section[.subsection].key` → values.
 * A key without `=` is recorded with an empty value (boolean true).
 */
export function parseConfig(content: string): Map<string, string[]> {
  const config = new Map<string, string[]>()
  let currentSection = ''
  let currentSubsection = ''

  for (const line of content.split('\n')) {
    const trimmed = line.trim()

    if (trimmed.startsWith('#') || trimmed.startsWith(';') || !trimmed) {
      continue
    }

    // Section header: [section] or [section "subsection"]
    const sectionMatch = trimmed.match(/^\[([^\s\]"]+)(?:\s+"([^"]+)")?\]$/)
    if (sectionMatch) {
      currentSection = sectionMatch[1].toLowerCase()
      currentSubsection = sectionMatch[2] || ''
      continue
    }

    const kvMatch = trimmed.match(/^([A-Za-z][\w-]*)\s*(?:=\s*(.*))?$/)
    if (kvMatch && currentSection) {
      const key = kvMatch[1].toLowerCase()
      let value = (kvMatch[2] ?? '').trim()

      if (value.startsWith('"') && value.endsWith('"') && value.length >= 2) {
        value = value.slice(1, -1)
      }

      const fullKey = currentSubsection
        ? `${currentSection}.${currentSubsection}.${key}`
        : `${currentSection}.${key}`

      const existing = config.get(fullKey) ?? []
      existing.push(value)
      config.set(fullKey, existing)
    }
  }

  return config
}

class FSAdapterImpl implements FSAdapter {
  private readonly indexImpl: FSIndexImpl
  private readonly configImpl: FSConfigImpl

  constructor(
    readonly workTree: string,
    readonly gitDir: string,
    readonly commonDir: string
  ) {
    this.indexImpl = new FSIndexImpl(gitDir)
    this.configImpl = new FSConfigImpl(commonDir)
  }

  getIndex(): FSIndex {
    return this.indexImpl
  }

  getConfig(): FSConfig {
    return this.configImpl
  }

  async writeBlob(content: Uint8Array): Promise<string> {
    const sha = hashBlob(content)
    const prefixDir = path.join(this.commonDir, 'objects', sha.substring(0, 2))
    const objectPath = path.join(prefixDir, sha.substring(2))

    if (await fileExists(objectPath)) {
      return sha
    }

    try {
      await fs.mkdir(prefixDir, { recursive: true })

      const header = blobHeader(content)
      const combined = new Uint8Array(header.length + content.length)
      combined.set(header, 0)
      combined.set(content, header.length)

      await fs.writeFile(objectPath, pako.deflate(combined), { mode: 0o444 })
    } catch (error) {
      throw new FSAdapterError(`Failed to write object ${sha}: ${errorMessage(error)}`, 'WRITE_ERROR', objectPath, {
        cause: error,
      })
    }
    return sha
  }
}

/**
 * Opens the repository whose working tree root is `root`.
 *
 * @throws {FSAdapterError} NOT_A_GIT_REPO if `root/.git` is missing or invalid,
 *   BARE_REPOSITORY if the repository has `core.bare = true`
 *
 * @example
 * try {
 *   const adapter = await createFSAdapter('/not/a/repo')
 * } catch (error) {
 *   if (error instanceof FSAdapterError && error.code === 'NOT_A_GIT_REPO') {
 *     console.log('Not a git repository')
 *   }
 * }
 */
export async function createFSAdapter(root: string): Promise<FSAdapter> {
  const workTree = path.resolve(root)

  const gitDir = await findGitDir(workTree)
  if (gitDir === null) {
    throw new FSAdapterError(`Not a git repository: ${workTree}`, 'NOT_A_GIT_REPO', workTree)
  }

  const commonDir = await resolveCommonDir(gitDir)
  if (!await isValidGitDir(gitDir, commonDir)) {
    throw new FSAdapterError(`Not a valid git directory: ${gitDir}`, 'NOT_A_GIT_REPO', workTree)
  }

  const adapter = new FSAdapterImpl(workTree, gitDir, commonDir)
  if (await adapter.getConfig().getBoolean('core', 'bare', false)) {
    throw new FSAdapterError(`Repository has no working tree: ${workTree}`, 'BARE_REPOSITORY', workTree)
  }

  return adapter
}
