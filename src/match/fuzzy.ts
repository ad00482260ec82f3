/**
 * @fileoverview Fuzzy subsequence scoring for path-like strings.
 *
 * Wraps the fzf v2 algorithm: case-insensitive, with latin diacritics
 * folded, rewarding contiguous runs and matches right after a path
 * separator or word boundary, and penalizing gaps.
 *
 * @module match/fuzzy
 */

import { Fzf } from 'fzf'
import type { Candidate, ScoreMap } from './types'

/**
 * A reusable fuzzy index over one candidate list.
 *
 * @example
 * ```typescript
 * const index = new FuzzyIndex(toCandidates(['src/main.ts', 'README.md']))
 * index.score('main') // only ordinal 0 is present
 * ```
 */
export class FuzzyIndex {
  private readonly fzf: Fzf<readonly Candidate[]>

  constructor(candidates: readonly Candidate[]) {
    this.fzf = new Fzf(candidates, {
      selector: (candidate: Candidate) => candidate.path,
      casing: 'case-insensitive',
      normalize: true,
      fuzzy: 'v2',
    })
  }

  /**
   * Scores every candidate containing `token` as an ordered subsequence.
   * Candidates without a match are absent from the result.
   */
  score(token: string): ScoreMap {
    const scores: ScoreMap = new Map()
    if (token.length === 0) return scores

    for (const entry of this.fzf.find(token)) {
      scores.set(entry.item.index, Math.max(0, Math.round(entry.score)))
    }
    return scores
  }
}
