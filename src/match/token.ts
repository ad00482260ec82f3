/**
 * @fileoverview Per-token matching.
 *
 * Each query token independently picks its strategy: glob tokens filter,
 * fuzzy tokens rank. A malformed glob matches nothing.
 *
 * @module match/token
 */

import { isMalformedPatternError } from '../errors'
import { noopLogger, type Logger } from '../utils/logger'
import { FuzzyIndex } from './fuzzy'
import { isGlobToken, matchGlob } from './glob'
import type { Candidate, ScoreMap, TokenKind } from './types'

/**
 * Classifies a token as `glob` or `fuzzy`.
 */
export function classifyToken(token: string): TokenKind {
  return isGlobToken(token) ? 'glob' : 'fuzzy'
}

/**
 * Matches tokens against one fixed candidate list.
 *
 * The fuzzy index is built on first use and reused for later tokens.
 *
 * @example
 * ```typescript
 * const matcher = new TokenMatcher(toCandidates(paths))
 * const srcScores = matcher.match('src')
 * const tsScores = matcher.match('*.ts')
 * ```
 */
export class TokenMatcher {
  private fuzzy: FuzzyIndex | null = null

  constructor(
    private readonly candidates: readonly Candidate[],
    private readonly logger: Logger = noopLogger
  ) {}

  match(token: string): ScoreMap {
    const kind = classifyToken(token)
    const scores = kind === 'glob' ? this.matchGlobToken(token) : this.fuzzyIndex().score(token)
    this.logger.debug('Token matched', { token, kind, matches: scores.size })
    return scores
  }

  private matchGlobToken(token: string): ScoreMap {
    try {
      return matchGlob(token, this.candidates)
    } catch (error) {
      if (isMalformedPatternError(error)) {
        this.logger.debug('Malformed glob treated as no match', { token, reason: error.message })
        return new Map()
      }
      throw error
    }
  }

  private fuzzyIndex(): FuzzyIndex {
    if (this.fuzzy === null) {
      this.fuzzy = new FuzzyIndex(this.candidates)
    }
    return this.fuzzy
  }
}

/**
 * Scores one token against a candidate list.
 */
export function matchToken(token: string, candidates: readonly Candidate[]): ScoreMap {
  return new TokenMatcher(candidates).match(token)
}
