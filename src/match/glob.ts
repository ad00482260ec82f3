/**
 * @fileoverview Glob tokens.
 *
 * A token containing `*`, `?` or `[` is a shell-style pattern matched
 * against the whole path: `*` and `?` stop at `/`, `**` crosses
 * directories, and dotfiles are not special. Globs filter; every match
 * scores exactly {@link GLOB_MATCH_SCORE}.
 *
 * @module match/glob
 */

import { Minimatch, type MinimatchOptions } from 'minimatch'
import { MalformedPatternError } from '../errors'
import type { Candidate, ScoreMap } from './types'

/**
 * Score given to every path a glob accepts.
 */
export const GLOB_MATCH_SCORE = 1

/**
 * Options every glob token is compiled with. `#` and `!` are literal.
 */
export const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  nocomment: true,
  nonegate: true,
}

const GLOB_METACHARACTERS = /[*?[]/

/**
 * Whether a token is a glob (contains a wildcard metacharacter).
 */
export function isGlobToken(token: string): boolean {
  return GLOB_METACHARACTERS.test(token)
}

/**
 * Compiles a glob token into a full-path regular expression.
 *
 * @throws {MalformedPatternError} If minimatch rejects the pattern
 */
export function compileGlob(pattern: string): RegExp {
  let compiled: RegExp | false
  try {
    compiled = new Minimatch(pattern, GLOB_OPTIONS).makeRe()
  } catch (error) {
    throw new MalformedPatternError(pattern, error)
  }
  if (compiled === false) {
    throw new MalformedPatternError(pattern)
  }
  return compiled
}

/**
 * Returns every candidate whose full path matches `pattern`, each with
 * {@link GLOB_MATCH_SCORE}.
 *
 * @throws {MalformedPatternError} If the pattern cannot be compiled
 */
export function matchGlob(pattern: string, candidates: readonly Candidate[]): ScoreMap {
  const regex = compileGlob(pattern)
  const scores: ScoreMap = new Map()
  for (const candidate of candidates) {
    if (regex.test(candidate.path)) {
      scores.set(candidate.index, GLOB_MATCH_SCORE)
    }
  }
  return scores
}
