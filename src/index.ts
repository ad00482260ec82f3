/**
 * @fileoverview git-fad - Fuzzy add for git
 *
 * Picks the single unstaged or untracked file whose path best matches a set
 * of query tokens and stages it.
 *
 * **Architecture Overview**:
 * - **Matching**: fuzzy and glob token scoring, aggregation, selection (`./match`)
 * - **Candidate Source**: working-tree status from the on-disk index (`./cli/commands/status`)
 * - **Stager**: blob and index writes (`./cli/commands/add`)
 * - **CLI**: argument parsing and output (`./cli`)
 *
 * @module git-fad
 *
 * @example
 * ```typescript
 * import { fuzzyAdd } from 'git-fad'
 *
 * const outcome = await fuzzyAdd(process.cwd(), ['readme'], { dryRun: true })
 * if (outcome.kind === 'selected') {
 *   console.log(outcome.path, outcome.score)
 * }
 * ```
 */

// =============================================================================
// Matching
// =============================================================================

export * from './match'

// =============================================================================
// Candidate Source and Stager
// =============================================================================

export {
  getWorkingTreeStatus,
  listWorkingTreeCandidates,
  formatStatusShort,
  type WorkingTreeEntry,
  type WorkingTreeStatus,
  type StatusOptions,
} from './cli/commands/status'

export {
  fuzzyAdd,
  stagePath,
  resolveRepositoryPath,
  workingTreeSource,
  indexStager,
  type CandidateSource,
  type Stager,
  type StageResult,
  type StageOptions,
  type FuzzyAddOptions,
  type FuzzyAddOutcome,
} from './cli/commands/add'

// =============================================================================
// CLI
// =============================================================================

export { CLI, createCLI, parseArgs, runCLI, type CLIOptions, type CLIResult } from './cli'

// =============================================================================
// Errors and Logging
// =============================================================================

export * from './errors'

export {
  createLogger,
  LogLevel,
  noopLogger,
  type Logger,
  type LogEntry,
  type LogHandler,
  type LoggerOptions,
} from './utils/logger'
