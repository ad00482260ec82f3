/**
 * @fileoverview Winner selection.
 *
 * Candidates are ordered by, in priority:
 * 1. higher aggregate score
 * 2. shorter path
 * 3. lexicographically smaller path
 *
 * Paths are unique within a run, so this is a strict total order.
 *
 * @module match/select
 */

import type { Candidate, ScoreMap } from './types'

/**
 * A candidate together with its aggregate score.
 */
export interface Selection {
  candidate: Candidate
  score: number
}

/**
 * Negative when `a` ranks ahead of `b`.
 */
export function compareSelections(a: Selection, b: Selection): number {
  if (a.score !== b.score) {
    return b.score - a.score
  }
  const aPath = a.candidate.path
  const bPath = b.candidate.path
  if (aPath.length !== bPath.length) {
    return aPath.length - bPath.length
  }
  if (aPath < bPath) return -1
  if (aPath > bPath) return 1
  return 0
}

/**
 * Every scored candidate, best first.
 */
export function rankCandidates(scores: ScoreMap, candidates: readonly Candidate[]): Selection[] {
  const ranked: Selection[] = []
  for (const [index, score] of scores) {
    const candidate = candidates[index]
    if (candidate !== undefined) {
      ranked.push({ candidate, score })
    }
  }
  return ranked.sort(compareSelections)
}

/**
 * Picks the single best candidate, or `null` when `scores` is empty.
 */
export function select(scores: ScoreMap, candidates: readonly Candidate[]): Selection | null {
  let best: Selection | null = null
  for (const [index, score] of scores) {
    const candidate = candidates[index]
    if (candidate === undefined) continue
    const current: Selection = { candidate, score }
    if (best === null || compareSelections(current, best) < 0) {
      best = current
    }
  }
  return best
}
