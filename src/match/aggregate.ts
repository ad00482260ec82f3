/**
 * @fileoverview Multi-token aggregation.
 *
 * Tokens are AND-ed: the cumulative map starts as the first token's scores
 * and each later token intersects it, adding its own score to every
 * surviving candidate. A token that matches nothing, or an intersection
 * that empties the map, ends the fold with no match.
 *
 * ## Invariant
 *
 * After folding token *i*, a key is present only if every token `0..=i`
 * matched that candidate, and its value is the sum of their scores. The
 * surviving keys and their sums do not depend on token order.
 *
 * @module match/aggregate
 */

import { noopLogger, type Logger } from '../utils/logger'
import { TokenMatcher } from './token'
import type { Candidate, ScoreMap } from './types'

// ============================================================================
// Types
// ============================================================================

/**
 * Why a query produced no match.
 *
 * - `token`: the token matched no candidate at all
 * - `intersection`: the token matched, but none of the candidates still in
 *   the running
 */
export type NoMatchReason = 'token' | 'intersection'

/**
 * Outcome of folding all tokens.
 */
export type AggregateResult =
  | { matched: true; scores: ScoreMap }
  | { matched: false; reason: NoMatchReason; token: string }

/**
 * Scores a single token. Defaults to a {@link TokenMatcher} over the
 * candidates being aggregated.
 */
export type TokenScorer = (token: string) => ScoreMap

export interface AggregateOptions {
  scorer?: TokenScorer
  logger?: Logger
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Keeps the keys present in both maps, summing their scores.
 */
export function intersectScores(cumulative: ScoreMap, next: ScoreMap): ScoreMap {
  const result: ScoreMap = new Map()
  for (const [index, score] of cumulative) {
    const nextScore = next.get(index)
    if (nextScore !== undefined) {
      result.set(index, score + nextScore)
    }
  }
  return result
}

/**
 * Folds every token's score map into one cumulative map.
 *
 * @example
 * ```typescript
 * const result = aggregate(['src', 'mod'], toCandidates(['src/main.x', 'src/git/mod.x']))
 * if (result.matched) {
 *   console.log([...result.scores.keys()]) // [1]
 * } else {
 *   console.log(`stopped at ${result.token}`)
 * }
 * ```
 */
export function aggregate(
  tokens: readonly string[],
  candidates: readonly Candidate[],
  options: AggregateOptions = {}
): AggregateResult {
  const logger = options.logger ?? noopLogger
  const scorer = options.scorer ?? createScorer(candidates, logger)

  let cumulative: ScoreMap | null = null

  for (const token of tokens) {
    const tokenScores = scorer(token)
    if (tokenScores.size === 0) {
      return { matched: false, reason: 'token', token }
    }

    cumulative = cumulative === null ? new Map(tokenScores) : intersectScores(cumulative, tokenScores)
    logger.debug('Cumulative candidates', { token, remaining: cumulative.size })

    if (cumulative.size === 0) {
      return { matched: false, reason: 'intersection', token }
    }
  }

  return { matched: true, scores: cumulative ?? new Map() }
}

function createScorer(candidates: readonly Candidate[], logger: Logger): TokenScorer {
  const matcher = new TokenMatcher(candidates, logger)
  return (token) => matcher.match(token)
}
