/**
 * @fileoverview Error Hierarchy for git-fad
 *
 * All errors raised by git-fad extend {@link FadError}, which provides:
 * - Error codes for programmatic handling
 * - Cause chaining for error context
 * - Consistent serialization
 *
 * Collaborator failures (repository and index I/O) are fatal and surface
 * with the path and operation involved. A malformed glob is recovered
 * inside the token matcher and never reaches the CLI.
 *
 * @module errors
 *
 * @example
 * ```typescript
 * import { isRepositoryAccessError } from './errors'
 *
 * try {
 *   await listWorkingTreeCandidates(root)
 * } catch (error) {
 *   if (isRepositoryAccessError(error)) {
 *     console.log(`cannot open ${error.path}: ${error.message}`)
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Error codes for FadError subclasses.
 */
export type FadErrorCode =
  | 'UNKNOWN'
  | 'REPOSITORY_ACCESS'
  | 'PATH_OUTSIDE_REPOSITORY'
  | 'INDEX_WRITE'
  | 'MALFORMED_PATTERN'

/**
 * Base error class for all git-fad errors.
 *
 * @example
 * ```typescript
 * try {
 *   await stagePath(root, 'src/main.ts')
 * } catch (cause) {
 *   throw new FadError('Staging failed', 'UNKNOWN', { cause })
 * }
 * ```
 */
export class FadError extends Error {
  /**
   * Error code for programmatic handling.
   */
  readonly code: FadErrorCode

  /**
   * The underlying cause of this error, if any.
   */
  override readonly cause?: unknown

  /**
   * The filesystem path involved, if any.
   */
  readonly path?: string

  /**
   * The operation that failed (e.g. `read-index`, `write-blob`).
   */
  readonly operation?: string

  constructor(
    message: string,
    code: FadErrorCode = 'UNKNOWN',
    options?: { cause?: unknown; path?: string; operation?: string }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'FadError'
    this.code = code
    this.cause = options?.cause
    this.path = options?.path
    this.operation = options?.operation

    // Maintains proper stack trace for where the error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serializes the error to a plain object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      path: this.path,
      operation: this.operation,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    }
  }
}

// =============================================================================
// Collaborator Errors
// =============================================================================

/**
 * The repository cannot be opened, or its metadata cannot be read.
 */
export class RepositoryAccessError extends FadError {
  constructor(message: string, options?: { cause?: unknown; path?: string; operation?: string }) {
    super(message, 'REPOSITORY_ACCESS', options)
    this.name = 'RepositoryAccessError'
  }

  /**
   * Creates the error raised when `root` holds no usable `.git`.
   */
  static notARepository(root: string, cause?: unknown): RepositoryAccessError {
    return new RepositoryAccessError(`not a git repository: ${root}`, {
      path: root,
      operation: 'open-repository',
      cause,
    })
  }
}

/**
 * A path handed to the stager resolves outside the repository root.
 */
export class PathOutsideRepositoryError extends FadError {
  /**
   * The repository root the path was checked against.
   */
  readonly root: string

  constructor(filePath: string, root: string) {
    super(`path ${filePath} is not inside repository ${root}`, 'PATH_OUTSIDE_REPOSITORY', {
      path: filePath,
      operation: 'resolve-path',
    })
    this.name = 'PathOutsideRepositoryError'
    this.root = root
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), root: this.root }
  }
}

/**
 * The persistent index could not be read, locked or written.
 */
export class IndexWriteError extends FadError {
  constructor(message: string, options?: { cause?: unknown; path?: string; operation?: string }) {
    super(message, 'INDEX_WRITE', options)
    this.name = 'IndexWriteError'
  }
}

/**
 * A glob token could not be compiled.
 *
 * Raised and caught inside the token matcher: the token then matches
 * nothing, and the run reports an ordinary "no match".
 */
export class MalformedPatternError extends FadError {
  /**
   * The pattern as typed by the user.
   */
  readonly pattern: string

  constructor(pattern: string, cause?: unknown) {
    super(`malformed glob pattern: ${pattern}`, 'MALFORMED_PATTERN', {
      cause,
      operation: 'compile-glob',
    })
    this.name = 'MalformedPatternError'
    this.pattern = pattern
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isFadError(error: unknown): error is FadError {
  return error instanceof FadError
}

export function isRepositoryAccessError(error: unknown): error is RepositoryAccessError {
  return error instanceof RepositoryAccessError
}

export function isPathOutsideRepositoryError(error: unknown): error is PathOutsideRepositoryError {
  return error instanceof PathOutsideRepositoryError
}

export function isIndexWriteError(error: unknown): error is IndexWriteError {
  return error instanceof IndexWriteError
}

export function isMalformedPatternError(error: unknown): error is MalformedPatternError {
  return error instanceof MalformedPatternError
}

/**
 * Checks whether an error carries a specific code.
 */
export function hasErrorCode<T extends FadErrorCode>(error: unknown, code: T): error is FadError & { code: T } {
  return isFadError(error) && error.code === code
}
