import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as path from 'path'
import { createFSAdapter } from '../../src/cli/fs-adapter'
import { IgnoreRules, loadRepositoryIgnoreRules } from '../../src/cli/gitignore'
import { createGitRepo, createTempDir, removeTempDir, writeFiles } from '../helpers/repo'

describe('IgnoreRules', () => {
  it('should ignore nothing when empty', () => {
    expect(IgnoreRules.empty().isIgnored('anything.txt', false)).toBe(false)
  })

  it('should match slashless patterns against the basename at any depth', () => {
    const rules = IgnoreRules.empty().withPatterns('', '*.log\n')

    expect(rules.isIgnored('app.log', false)).toBe(true)
    expect(rules.isIgnored('logs/deep/app.log', false)).toBe(true)
    expect(rules.isIgnored('app.log.txt', false)).toBe(false)
  })

  it('should anchor patterns with a leading or middle slash', () => {
    const rules = IgnoreRules.empty().withPatterns('', '/build\ndocs/*.html\n')

    expect(rules.isIgnored('build', true)).toBe(true)
    expect(rules.isIgnored('src/build', true)).toBe(false)
    expect(rules.isIgnored('docs/index.html', false)).toBe(true)
    expect(rules.isIgnored('docs/api/index.html', false)).toBe(false)
  })

  it('should apply trailing-slash patterns to directories only', () => {
    const rules = IgnoreRules.empty().withPatterns('', 'cache/\n')

    expect(rules.isIgnored('cache', true)).toBe(true)
    expect(rules.isIgnored('cache', false)).toBe(false)
  })

  it('should let a later negation re-include', () => {
    const rules = IgnoreRules.empty().withPatterns('', '*.log\n!keep.log\n')

    expect(rules.isIgnored('drop.log', false)).toBe(true)
    expect(rules.isIgnored('keep.log', false)).toBe(false)
  })

  it('should skip comments and blank lines and honour escapes', () => {
    const rules = IgnoreRules.empty().withPatterns('', '# comment\n\n\\#hash\n\\!bang\n')

    expect(rules.isIgnored('# comment', false)).toBe(false)
    expect(rules.isIgnored('#hash', false)).toBe(true)
    expect(rules.isIgnored('!bang', false)).toBe(true)
  })

  it('should support ** across directories', () => {
    const rules = IgnoreRules.empty().withPatterns('', 'vendor/**/tmp\n')

    expect(rules.isIgnored('vendor/tmp', true)).toBe(true)
    expect(rules.isIgnored('vendor/a/b/tmp', true)).toBe(true)
    expect(rules.isIgnored('src/vendor/tmp', true)).toBe(false)
  })

  it('should scope rules to the directory holding them', () => {
    const rules = IgnoreRules.empty().withPatterns('pkg', '/dist\n')

    expect(rules.isIgnored('pkg/dist', true)).toBe(true)
    expect(rules.isIgnored('dist', true)).toBe(false)
    expect(rules.isIgnored('other/pkg/dist', true)).toBe(false)
  })

  it('should let a deeper file override a shallower one', () => {
    const rules = IgnoreRules.empty()
      .withPatterns('', '*.gen.ts\n')
      .withPatterns('src', '!*.gen.ts\n')

    expect(rules.isIgnored('lib/a.gen.ts', false)).toBe(true)
    expect(rules.isIgnored('src/a.gen.ts', false)).toBe(false)
  })

  it('should return the same instance when nothing is added', () => {
    const rules = IgnoreRules.empty()

    expect(rules.withPatterns('', '# only a comment\n')).toBe(rules)
  })
})

describe('Repository ignore sources', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await createTempDir('git-fad-ignore-')
  })

  afterEach(async () => {
    await removeTempDir(tempDir)
  })

  it('should load info/exclude and core.excludesFile', async () => {
    const excludesFile = path.join(tempDir, 'global-ignore')
    await createGitRepo(tempDir, { config: `[core]\n\texcludesFile = ${excludesFile}\n` })
    await fs.writeFile(excludesFile, '*.swp\n')
    await fs.writeFile(path.join(tempDir, '.git', 'info', 'exclude'), 'secret.txt\n')

    const rules = await loadRepositoryIgnoreRules(await createFSAdapter(tempDir))

    expect(rules.isIgnored('notes.swp', false)).toBe(true)
    expect(rules.isIgnored('secret.txt', false)).toBe(true)
    expect(rules.isIgnored('readme.txt', false)).toBe(false)
  })

  it('should give info/exclude precedence over core.excludesFile', async () => {
    const excludesFile = path.join(tempDir, 'global-ignore')
    await createGitRepo(tempDir, { config: `[core]\n\texcludesFile = ${excludesFile}\n` })
    await fs.writeFile(excludesFile, '*.env\n')
    await fs.writeFile(path.join(tempDir, '.git', 'info', 'exclude'), '!local.env\n')

    const rules = await loadRepositoryIgnoreRules(await createFSAdapter(tempDir))

    expect(rules.isIgnored('prod.env', false)).toBe(true)
    expect(rules.isIgnored('local.env', false)).toBe(false)
  })

  it('should read a directory .gitignore when present', async () => {
    await writeFiles(tempDir, { 'pkg/.gitignore': 'out/\n' })

    const rules = await IgnoreRules.empty().withDirectory(tempDir, 'pkg')

    expect(rules.isIgnored('pkg/out', true)).toBe(true)
    expect(await rules.withDirectory(tempDir, 'missing')).toBe(rules)
  })
})
