import { describe, it, expect } from 'vitest'
import * as os from 'os'
import * as path from 'path'
import { createCLI, runCLI, parseArgs, type CLIResult, type CommandContext } from '../../src/cli/index'
import { createOutputCapture } from '../helpers/repo'

// ============================================================================
// Test Helpers
// ============================================================================

/**
 * Run CLI with arguments and capture output
 */
async function runCLIWithCapture(args: string[], cwd: string = os.tmpdir()): Promise<{
  result: CLIResult
  stdout: string[]
  stderr: string[]
}> {
  const capture = createOutputCapture()
  const result = await runCLI(args, {
    cwd,
    stdout: capture.stdout,
    stderr: capture.stderr,
    env: {},
  })
  return {
    result,
    stdout: capture.output.stdout,
    stderr: capture.output.stderr
  }
}

// ============================================================================
// Test Suites
// ============================================================================

describe('CLI Entry Point', () => {
  describe('Help Flag', () => {
    it('should show help message when --help flag is provided', async () => {
      const { result, stdout, stderr } = await runCLIWithCapture(['--help'])

      expect(result.exitCode).toBe(0)
      expect(stdout).toHaveLength(1)
      expect(stdout[0].split('\n')[0]).toBe('git-fad v0.1.0')
      expect(stdout[0]).toContain('Usage: git-fad [options] <tokens...>')
      expect(stderr).toEqual([])
    })

    it('should show help message when -h flag is provided', async () => {
      const { result, stdout } = await runCLIWithCapture(['-h', 'ignored'])

      expect(result.exitCode).toBe(0)
      expect(stdout[0]).toContain('-n, --dry-run')
    })
  })

  describe('Version Flag', () => {
    it('should show name and version with --version', async () => {
      const { result, stdout } = await runCLIWithCapture(['--version'])

      expect(result.exitCode).toBe(0)
      expect(stdout).toEqual(['git-fad 0.1.0'])
    })

    it('should show name and version with -v', async () => {
      const { stdout } = await runCLIWithCapture(['-v'])

      expect(stdout).toEqual(['git-fad 0.1.0'])
    })
  })

  describe('Error Handling', () => {
    it('should reject unknown options', async () => {
      const { result, stdout, stderr } = await runCLIWithCapture(['--frobnicate', 'readme'])

      expect(result.exitCode).toBe(1)
      expect(result.error?.message).toBe('Unknown option: --frobnicate')
      expect(stdout).toEqual([])
      expect(stderr).toEqual(["Unknown option: --frobnicate\nRun 'git-fad --help' for usage."])
    })

    it('should fail when the -C directory does not exist', async () => {
      const missing = path.join(os.tmpdir(), `git-fad-missing-${process.pid}-${Date.now()}`)

      const { result, stderr } = await runCLIWithCapture(['-C', missing, 'readme'])

      expect(result.exitCode).toBe(1)
      expect(stderr).toEqual([`Error: directory does not exist: ${missing}`])
    })

    it('should report handler errors and exit 1', async () => {
      const capture = createOutputCapture()
      const cli = createCLI({
        stdout: capture.stdout,
        stderr: capture.stderr,
        handler: async () => {
          throw new Error('boom')
        },
      })

      const result = await cli.run(['x'], { cwd: os.tmpdir(), env: {} })

      expect(result.exitCode).toBe(1)
      expect(result.error?.message).toBe('boom')
      expect(capture.output.stderr).toEqual(['Error: boom'])
    })

    it('should wrap non-Error throws', async () => {
      const capture = createOutputCapture()
      const cli = createCLI({
        stderr: capture.stderr,
        handler: () => {
          throw 'plain failure'
        },
      })

      const result = await cli.run([], { cwd: os.tmpdir(), env: {} })

      expect(result.error).toBeInstanceOf(Error)
      expect(capture.output.stderr).toEqual(['Error: plain failure'])
    })
  })

  describe('Handler Context', () => {
    it('should pass parsed arguments, streams and environment to the handler', async () => {
      const seen: CommandContext[] = []
      const capture = createOutputCapture()
      const cli = createCLI({
        stdout: capture.stdout,
        handler: (ctx) => {
          seen.push(ctx)
          ctx.stdout('done')
        },
      })

      const result = await cli.run(['-n', 'src', 'main', '--', '-odd'], {
        cwd: os.tmpdir(),
        env: { GIT_FAD_LOG_LEVEL: 'info' },
      })

      expect(result).toEqual({ exitCode: 0 })
      expect(seen).toHaveLength(1)
      expect(seen[0].args).toEqual(['src', 'main'])
      expect(seen[0].rawArgs).toEqual(['-odd'])
      expect(seen[0].options.dryRun).toBe(true)
      expect(seen[0].cwd).toBe(os.tmpdir())
      expect(seen[0].env).toEqual({ GIT_FAD_LOG_LEVEL: 'info' })
      expect(capture.output.stdout).toEqual(['done'])
    })
  })
})

describe('parseArgs', () => {
  it('should treat --dry-run as a flag, not a value taker', () => {
    const parsed = parseArgs(['--dry-run', 'readme'], '/work')

    expect(parsed.args).toEqual(['readme'])
    expect(parsed.options.dryRun).toBe(true)
    expect(parsed.options.n).toBe(true)
  })

  it('should keep -n from swallowing the next token', () => {
    const parsed = parseArgs(['-n', 'readme', 'md'], '/work')

    expect(parsed.args).toEqual(['readme', 'md'])
    expect(parsed.options.dryRun).toBe(true)
  })

  it('should collect repeated --query values', () => {
    const parsed = parseArgs(['-q', 'src main', '-q', 'ts'], '/work')

    expect(parsed.options.query).toEqual(['src main', 'ts'])
  })

  it('should pass arguments after -- through unchanged', () => {
    const parsed = parseArgs(['src', '--', '-odd', '--dry-run'], '/work')

    expect(parsed.args).toEqual(['src'])
    expect(parsed.rawArgs).toEqual(['-odd', '--dry-run'])
    expect(parsed.options.dryRun).toBeUndefined()
    expect(parsed.options['--']).toBeUndefined()
  })

  it('should resolve -C against the base directory', () => {
    expect(parseArgs(['-C', 'sub/repo'], '/work').cwd).toBe('/work/sub/repo')
    expect(parseArgs(['--cwd', '/elsewhere'], '/work').cwd).toBe('/elsewhere')
    expect(parseArgs(['readme'], '/work').cwd).toBe('/work')
  })

  it('should default the base directory to the process cwd', () => {
    expect(parseArgs(['readme']).cwd).toBe(process.cwd())
  })

  it('should return positional arguments as strings', () => {
    expect(parseArgs(['404', 'page'], '/work').args).toEqual(['404', 'page'])
  })

  it('should keep numeric-looking option values as typed', () => {
    expect(parseArgs(['-q', '010'], '/work').options.query).toBe('010')
    expect(parseArgs(['-q', '1.0'], '/work').options.query).toBe('1.0')
    expect(parseArgs(['--query', '1e3'], '/work').options.q).toBe('1e3')
    expect(parseArgs(['--query=0x1f'], '/work').options.query).toBe('0x1f')
    expect(parseArgs(['-q', '007', '-q', '2.50'], '/work').options.query).toEqual(['007', '2.50'])
  })

  it('should keep numeric-looking positionals after a flag as typed', () => {
    const parsed = parseArgs(['-n', '010', '1.0'], '/work')

    expect(parsed.args).toEqual(['010', '1.0'])
    expect(parsed.options.dryRun).toBe(true)
  })

  it('should resolve a numeric-looking -C value as typed', () => {
    expect(parseArgs(['-C', '010'], '/work').cwd).toBe('/work/010')
    expect(parseArgs(['--cwd=0.5'], '/work').cwd).toBe('/work/0.5')
  })
})
