/**
 * @fileoverview gitignore rules for the working-tree scan.
 *
 * Rules are kept in precedence order, lowest first: `core.excludesFile`,
 * then `.git/info/exclude`, then each `.gitignore` from the root down. The
 * last rule matching a path decides, so a deeper `.gitignore` overrides a
 * shallower one and `!pattern` can re-include.
 *
 * @module cli/gitignore
 */

import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { Minimatch } from 'minimatch'
import type { FSAdapter } from './fs-adapter'

interface IgnoreRule {
  /** Directory holding the rule's file, relative to the root ('' for root-level sources) */
  base: string
  negate: boolean
  dirOnly: boolean
  /** Pattern has no inner slash: match against the basename at any depth */
  matchBasename: boolean
  matcher: Minimatch
}

/**
 * Parses gitignore-format text into rules rooted at `base`.
 */
function parseIgnorePatterns(content: string, base: string): IgnoreRule[] {
  const rules: IgnoreRule[] = []

  for (const rawLine of content.split('\n')) {
    let line = rawLine.trimEnd()
    if (!line || line.startsWith('#')) continue

    let negate = false
    if (line.startsWith('!')) {
      negate = true
      line = line.slice(1)
    } else if (line.startsWith('\\!') || line.startsWith('\\#')) {
      line = line.slice(1)
    }

    let dirOnly = false
    if (line.endsWith('/')) {
      dirOnly = true
      line = line.slice(0, -1)
    }

    const anchored = line.includes('/')
    if (line.startsWith('/')) {
      line = line.slice(1)
    }
    if (!line) continue

    rules.push({
      base,
      negate,
      dirOnly,
      matchBasename: !anchored,
      matcher: new Minimatch(line, { dot: true, nocomment: true, nonegate: true }),
    })
  }

  return rules
}

/**
 * An immutable, ordered set of ignore rules.
 *
 * @example
 * const rules = IgnoreRules.empty().withPatterns('', '*.log\nbuild/\n')
 * rules.isIgnored('logs/app.log', false) // true
 * rules.isIgnored('build', true)         // true
 */
export class IgnoreRules {
  private constructor(private readonly rules: readonly IgnoreRule[]) {}

  static empty(): IgnoreRules {
    return new IgnoreRules([])
  }

  /**
   * Returns a new rule set with `content`'s patterns appended at `base`.
   */
  withPatterns(base: string, content: string): IgnoreRules {
    const added = parseIgnorePatterns(content, base)
    return added.length === 0 ? this : new IgnoreRules([...this.rules, ...added])
  }

  /**
   * Returns a new rule set extended with `<workTree>/<dir>/.gitignore`, if present.
   */
  async withDirectory(workTree: string, dir: string): Promise<IgnoreRules> {
    const content = await readOptional(path.join(workTree, dir, '.gitignore'))
    return content === null ? this : this.withPatterns(dir, content)
  }

  /**
   * Whether `relPath` (root-relative, `/`-separated) is ignored.
   */
  isIgnored(relPath: string, isDirectory: boolean): boolean {
    for (let i = this.rules.length - 1; i >= 0; i--) {
      const rule = this.rules[i]
      if (rule.dirOnly && !isDirectory) continue

      let subject = relPath
      if (rule.base) {
        if (!relPath.startsWith(rule.base + '/')) continue
        subject = relPath.slice(rule.base.length + 1)
      }
      if (rule.matchBasename) {
        subject = path.posix.basename(subject)
      }

      if (rule.matcher.match(subject)) {
        return !rule.negate
      }
    }
    return false
  }
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8')
  } catch {
    return null
  }
}

function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir()
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2))
  return filePath
}

/**
 * Loads the repository-wide rules: `core.excludesFile`, then `info/exclude`.
 * Per-directory `.gitignore` files are added during the scan.
 */
export async function loadRepositoryIgnoreRules(adapter: FSAdapter): Promise<IgnoreRules> {
  let rules = IgnoreRules.empty()

  const excludesFile = await adapter.getConfig().get('core', 'excludesFile')
  if (excludesFile) {
    const content = await readOptional(path.resolve(adapter.workTree, expandHome(excludesFile)))
    if (content !== null) {
      rules = rules.withPatterns('', content)
    }
  }

  const infoExclude = await readOptional(path.join(adapter.commonDir, 'info', 'exclude'))
  if (infoExclude !== null) {
    rules = rules.withPatterns('', infoExclude)
  }

  return rules
}
