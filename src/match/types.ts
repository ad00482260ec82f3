/**
 * @fileoverview Shared types for query matching.
 *
 * @module match/types
 */

/**
 * A working-tree path offered for matching.
 *
 * `index` is the candidate's ordinal in the enumeration and is its identity
 * for the whole run; every score map is keyed by it.
 */
export interface Candidate {
  readonly path: string
  readonly index: number
}

/**
 * Candidate ordinal to non-negative integer score.
 */
export type ScoreMap = Map<number, number>

/**
 * How a single query token is matched.
 *
 * - `fuzzy`: ranked, case-insensitive subsequence match
 * - `glob`: shell-style filter anchored on the full path, flat score of 1
 */
export type TokenKind = 'fuzzy' | 'glob'

/**
 * Builds the candidate arena from enumerated paths, preserving order.
 */
export function toCandidates(paths: readonly string[]): Candidate[] {
  return paths.map((path, index) => ({ path, index }))
}
