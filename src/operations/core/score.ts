/**
 * Score combination for tolerated misses
 *
 * A fuzzy "or": an older, partial hypothesis still adds to the current
 * confidence, weighted down the further back it originates.
 */

import { ScoreError } from "../../errors";

/**
 * Combine a new score with a weighted older one, capped at 1.0
 *
 * The old score is divided by `2 + distance`: by 2 at distance 0, by 3 at
 * distance 1, and so on, so a loop index can be passed directly.
 *
 * @param newScore - The current full-match score
 * @param oldScore - A partial score from an alternate hypothesis
 * @param distance - Tolerance steps between the two
 * @throws {ScoreError} INVALID_SCORE or INVALID_DISTANCE
 *
 * @example
 * ```typescript
 * combineScores(0.0, 1.0, 0); // 0.5
 * combineScores(0.9, 0.6, 1); // 1.0
 * ```
 */
export function combineScores(newScore: number, oldScore: number, distance: number): number {
  if (!(newScore >= 0.0 && newScore <= 1.0)) {
    throw ScoreError.forScore("newScore", newScore);
  }
  if (!(oldScore >= 0.0 && oldScore <= 1.0)) {
    throw ScoreError.forScore("oldScore", oldScore);
  }
  if (!Number.isInteger(distance) || distance < 0) {
    throw ScoreError.forDistance(distance);
  }

  return Math.min(1.0, newScore + oldScore / (2 + distance));
}
