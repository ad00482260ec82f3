/**
 * @fileoverview CLI Entry Point for git-fad
 *
 * Parses arguments, handles help, version and unknown flags, and runs the
 * fuzzy add command. Output goes through injectable `stdout`/`stderr`
 * functions so the whole CLI can run in-process under test.
 *
 * @module cli/index
 *
 * @example
 * // Run programmatically
 * import { runCLI } from './cli'
 *
 * const result = await runCLI(['src', 'main'], { cwd: '/path/to/repo' })
 * console.log(result.exitCode) // 0
 *
 * @example
 * // Parse arguments without running
 * import { parseArgs } from './cli'
 *
 * const parsed = parseArgs(['-n', 'src', 'main'])
 * console.log(parsed.args)    // ['src', 'main']
 * console.log(parsed.options) // { n: true, dryRun: true }
 */

import cac from 'cac'
import { existsSync } from 'fs'
import { resolve } from 'path'
import { NAME, VERSION } from '../constants'
import { addCommand } from './commands/add'

// ============================================================================
// Types
// ============================================================================

/**
 * Options for configuring CLI behavior.
 *
 * @example
 * const options: CLIOptions = {
 *   cwd: '/path/to/repo',
 *   stdout: (msg) => output.push(msg),
 *   stderr: (msg) => errors.push(msg),
 *   env: { GIT_FAD_LOG_LEVEL: 'debug' }
 * }
 */
export interface CLIOptions {
  /** Working directory (default: process.cwd()); `-C/--cwd` resolves against it */
  cwd?: string
  /** Custom function for standard output */
  stdout?: (msg: string) => void
  /** Custom function for error output */
  stderr?: (msg: string) => void
  /** Environment variables (default: process.env) */
  env?: Record<string, string | undefined>
}

/**
 * Result returned from CLI execution.
 *
 * @example
 * const result = await cli.run(['readme'])
 * if (result.exitCode !== 0) {
 *   console.error('Failed:', result.error?.message)
 * }
 */
export interface CLIResult {
  /** Exit code (0 for success, non-zero for failure) */
  exitCode: number
  /** Error object if the run failed */
  error?: Error
}

/**
 * Parsed command-line arguments.
 *
 * @example
 * // Parsing 'git-fad -C /repo src -- -weird-name'
 * const parsed: ParsedArgs = {
 *   args: ['src'],
 *   options: { C: '/repo', cwd: '/repo' },
 *   rawArgs: ['-weird-name'],
 *   cwd: '/repo'
 * }
 */
export interface ParsedArgs {
  /** Positional arguments (query tokens) */
  args: string[]
  /** Key-value pairs of parsed options/flags */
  options: Record<string, unknown>
  /** Arguments after '--' separator (passed through unchanged) */
  rawArgs: string[]
  /** Working directory for the run */
  cwd: string
}

/**
 * Context object passed to the command handler.
 */
export interface CommandContext {
  /** Repository root for the run */
  cwd: string
  /** Positional arguments */
  args: string[]
  /** Parsed options/flags */
  options: Record<string, unknown>
  /** Raw arguments after '--' separator */
  rawArgs: string[]
  /** Function to write to standard output */
  stdout: (msg: string) => void
  /** Function to write to standard error */
  stderr: (msg: string) => void
  /** Environment variables */
  env: Record<string, string | undefined>
}

/**
 * Function type for the command handler. Errors are thrown to signal failure.
 */
export type CommandHandler = (ctx: CommandContext) => void | Promise<void>

// ============================================================================
// Constants
// ============================================================================

/** Option keys cac may produce for the declared flags */
const KNOWN_FLAGS = [
  'query', 'q',
  'dryRun', 'n',
  'list', 'l',
  'cwd', 'C',
  'verbose',
  'help', 'h',
  'version', 'v',
]

// ============================================================================
// CLI Class
// ============================================================================

/**
 * The git-fad command-line interface.
 *
 * @example
 * // With custom output streams for testing
 * const output: string[] = []
 * const cli = new CLI({
 *   stdout: (msg) => output.push(msg),
 *   stderr: (msg) => output.push(`ERROR: ${msg}`)
 * })
 * await cli.run(['--version'])
 */
export class CLI {
  /** The name of the CLI tool */
  public name: string

  /** The version of the CLI tool */
  public version: string

  private handler: CommandHandler

  private stdout: (msg: string) => void

  private stderr: (msg: string) => void

  constructor(options: {
    name?: string
    version?: string
    handler?: CommandHandler
    stdout?: (msg: string) => void
    stderr?: (msg: string) => void
  } = {}) {
    this.name = options.name ?? NAME
    this.version = options.version ?? VERSION
    this.handler = options.handler ?? addCommand
    this.stdout = options.stdout ?? console.log
    this.stderr = options.stderr ?? console.error
  }

  /**
   * Runs the CLI with the provided arguments.
   *
   * @param args - Command-line arguments (excluding 'node' and script name)
   * @param options - Run options
   * @param options.cwd - Base directory for `-C/--cwd` (default: process.cwd())
   * @param options.env - Environment variables (default: process.env)
   * @returns Exit code and any error; never throws
   *
   * @example
   * const result = await cli.run(['--dry-run', 'readme'])
   */
  async run(
    args: string[],
    options: { cwd?: string; env?: Record<string, string | undefined> } = {}
  ): Promise<CLIResult> {
    const parsed = parseArgs(args, options.cwd)

    if (parsed.options.help === true) {
      this.stdout(this.getHelp())
      return { exitCode: 0 }
    }

    if (parsed.options.version === true) {
      this.stdout(`${this.name} ${this.version}`)
      return { exitCode: 0 }
    }

    for (const key of Object.keys(parsed.options)) {
      if (!KNOWN_FLAGS.includes(key)) {
        this.stderr(`Unknown option: --${key}\nRun '${this.name} --help' for usage.`)
        return { exitCode: 1, error: new Error(`Unknown option: --${key}`) }
      }
    }

    if (!existsSync(parsed.cwd)) {
      this.stderr(`Error: directory does not exist: ${parsed.cwd}`)
      return { exitCode: 1, error: new Error(`directory does not exist: ${parsed.cwd}`) }
    }

    try {
      await this.handler({
        cwd: parsed.cwd,
        args: parsed.args,
        options: parsed.options,
        rawArgs: parsed.rawArgs,
        stdout: this.stdout,
        stderr: this.stderr,
        env: options.env ?? process.env,
      })
      return { exitCode: 0 }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))
      this.stderr(`Error: ${error.message}`)
      return { exitCode: 1, error }
    }
  }

  private getHelp(): string {
    return `${this.name} v${this.version}

Stage the one unstaged or untracked file whose path best matches every query token.

Usage: ${this.name} [options] <tokens...>

Tokens containing *, ? or [ are glob patterns matched against the full path;
all other tokens are matched fuzzily.

Options:
  -q, --query <text>  Query string, split on whitespace (repeatable)
  -n, --dry-run       Show the best match without staging it
  -l, --list          List candidate files and exit
  -C, --cwd <path>    Repository root (default: current directory)
      --verbose       Log matching details to stderr
  -h, --help          Show help
  -v, --version       Show version`
  }
}

// ============================================================================
// Exported Functions
// ============================================================================

/**
 * Creates a new CLI instance.
 *
 * @example
 * const output: string[] = []
 * const cli = createCLI({ stdout: (msg) => output.push(msg) })
 */
export function createCLI(options: {
  name?: string
  version?: string
  handler?: CommandHandler
  stdout?: (msg: string) => void
  stderr?: (msg: string) => void
} = {}): CLI {
  return new CLI(options)
}

/** Options whose values must reach the run as typed */
const VALUE_OPTIONS = new Map<string, 'query' | 'cwd'>([
  ['-q', 'query'],
  ['--query', 'query'],
  ['-C', 'cwd'],
  ['--cwd', 'cwd'],
])

/**
 * Argument vector prepared for cac, plus the original text of everything
 * the parser would coerce.
 */
interface ScannedArgs {
  /** Arguments to hand to cac */
  argv: string[]
  /** Positional arguments before any `--`, as typed */
  positionals: string[]
  /** `-q/--query` and `-C/--cwd` values, as typed, in order */
  values: { query: string[]; cwd: string[] }
}

/**
 * Pre-scans arguments ahead of any `--` separator.
 *
 * mri turns numeric-looking values into numbers (`010` becomes `10`), both
 * for option values and for positionals that follow a boolean flag, so the
 * raw text is kept here and put back after parsing. `--dry-run` is rewritten
 * to `-n`: the parser only knows the short name as boolean, and the long
 * spelling would otherwise take the following token as its value.
 */
function scanArgs(args: readonly string[]): ScannedArgs {
  const separator = args.indexOf('--')
  const flags = separator === -1 ? args : args.slice(0, separator)
  const rest = separator === -1 ? [] : args.slice(separator)

  const scanned: ScannedArgs = { argv: [], positionals: [], values: { query: [], cwd: [] } }

  for (let i = 0; i < flags.length; i++) {
    const arg = flags[i]

    if (arg === '--dry-run') {
      scanned.argv.push('-n')
      continue
    }

    scanned.argv.push(arg)

    const option = VALUE_OPTIONS.get(arg)
    if (option !== undefined) {
      // Same rule as the parser: a value never starts with '-'
      const next = flags[i + 1]
      if (next !== undefined && !next.startsWith('-')) {
        scanned.values[option].push(next)
        scanned.argv.push(next)
        i++
      }
      continue
    }

    const equals = arg.indexOf('=')
    if (arg.startsWith('--') && equals > 2) {
      const inline = VALUE_OPTIONS.get(arg.slice(0, equals))
      if (inline !== undefined) {
        scanned.values[inline].push(arg.slice(equals + 1))
      }
    } else if (!arg.startsWith('-')) {
      scanned.positionals.push(arg)
    }
  }

  scanned.argv.push(...rest)
  return scanned
}

function asOptionValue(values: string[]): string | string[] {
  return values.length === 1 ? values[0] : values
}

/**
 * Parses command-line arguments using cac.
 *
 * @param args - Arguments (excluding 'node' and script name)
 * @param baseDir - Directory `-C/--cwd` is resolved against (default: process.cwd())
 *
 * @example
 * parseArgs(['--cwd', '/repo', '-q', 'src main'])
 * // {
 * //   args: [],
 * //   options: { cwd: '/repo', C: '/repo', q: 'src main', query: 'src main' },
 * //   rawArgs: [],
 * //   cwd: '/repo'
 * // }
 */
export function parseArgs(args: string[], baseDir: string = process.cwd()): ParsedArgs {
  const cli = cac(NAME)

  cli.option('-q, --query <text>', 'Query string, split on whitespace')
  cli.option('-n, --dry-run', 'Show the best match without staging it')
  cli.option('-l, --list', 'List candidate files and exit')
  cli.option('-C, --cwd <path>', 'Repository root')
  cli.option('--verbose', 'Log matching details to stderr')
  cli.option('-h, --help', 'Show help')
  cli.option('-v, --version', 'Show version')

  const scanned = scanArgs(args)
  const parsed = cli.parse(['node', NAME, ...scanned.argv], { run: false })

  const options: Record<string, unknown> = { ...parsed.options }
  const separated: unknown = options['--']
  delete options['--']

  const rawArgs = Array.isArray(separated) ? separated.map(arg => String(arg)) : []

  const { query, cwd: cwdValues } = scanned.values
  if (query.length > 0) {
    options.query = options.q = asOptionValue(query)
  }
  if (cwdValues.length > 0) {
    options.cwd = options.C = asOptionValue(cwdValues)
  }

  let cwd = baseDir
  const cwdOption = cwdValues[cwdValues.length - 1]
  if (cwdOption !== undefined && cwdOption.length > 0) {
    cwd = resolve(baseDir, cwdOption)
  }

  // Grouped short flags (`-nq x`) can shift what the parser counts as
  // positional; its own copy is used then
  const positionals = parsed.args.length === scanned.positionals.length
    ? scanned.positionals
    : parsed.args.map(arg => String(arg))

  return {
    args: positionals,
    options,
    rawArgs,
    cwd,
  }
}

/**
 * Creates a CLI and runs it once.
 *
 * @example
 * const output: string[] = []
 * const result = await runCLI(['--dry-run', 'readme'], {
 *   cwd: '/path/to/repo',
 *   stdout: (msg) => output.push(msg)
 * })
 */
export async function runCLI(args: string[], options: CLIOptions = {}): Promise<CLIResult> {
  const cli = createCLI({
    stdout: options.stdout,
    stderr: options.stderr,
  })
  return cli.run(args, { cwd: options.cwd, env: options.env })
}
