/**
 * @fileoverview Query Matching Barrel
 *
 * Token matching, multi-token aggregation and winner selection.
 *
 * @module match
 *
 * @example
 * ```typescript
 * import { aggregate, select, toCandidates } from './match'
 *
 * const candidates = toCandidates(paths)
 * const result = aggregate(['src', 'mod'], candidates)
 * const winner = result.matched ? select(result.scores, candidates) : null
 * ```
 */

export { toCandidates, type Candidate, type ScoreMap, type TokenKind } from './types'
export { FuzzyIndex } from './fuzzy'
export { GLOB_MATCH_SCORE, GLOB_OPTIONS, compileGlob, isGlobToken, matchGlob } from './glob'
export { TokenMatcher, classifyToken, matchToken } from './token'
export {
  aggregate,
  intersectScores,
  type AggregateOptions,
  type AggregateResult,
  type NoMatchReason,
  type TokenScorer,
} from './aggregate'
export { compareSelections, rankCandidates, select, type Selection } from './select'
