/**
 * Matcher - fuzzy location of a token pattern inside a reference sequence
 *
 * Each reference token is looked up in the pattern index and the resulting
 * alignment vector advances a fresh tracker; every position gets a score,
 * and the scores are ranked and cut at the threshold.
 *
 * There are two ways to make matching fuzzy:
 * - `allowedDifferences`: the score is 1/1 on a full match and drops to
 *   about 1/2 with one miss, 1/3 with two
 * - `nomatchMultiplier`: every miss multiplies the score by this value
 *
 * Scores are for ranking candidates, not for measuring distance.
 *
 * @version v0.1.0
 * @since v0.1.0
 */

import type { DiagnosticsSink } from "../diagnostics";
import { silentSink } from "../diagnostics";
import type { MatchResult, MatcherConfig, MatcherOptions } from "../types";
import { MatchTracker } from "./core/match-tracker";
import { PatternIndex } from "./core/pattern-index";
import { resolveMatcherConfig } from "./core/validation-utils";

/**
 * Pattern plus configuration, ready to scan any number of references
 *
 * @example
 * ```typescript
 * const matcher = new Matcher(["lorem", "ipsum", "dolor"], {
 *   nomatchMultiplier: 0.5,
 *   threshold: 0.5,
 * });
 * matcher.findIn(["lorem", "ipsum", "dolor", "sit"]);
 * // [{ position: 2, score: 1 }]
 * ```
 */
export class Matcher<T = unknown> {
  readonly pattern: readonly T[];
  readonly config: MatcherConfig;
  readonly index: PatternIndex<T>;
  private readonly diagnostics: DiagnosticsSink;

  /**
   * @throws {ConfigurationError} for an empty pattern or out-of-range options
   * @throws {ValidationError} for options of the wrong type
   */
  constructor(pattern: readonly T[], options: MatcherOptions = {}) {
    this.config = resolveMatcherConfig(pattern.length, options);
    this.pattern = Object.freeze([...pattern]);
    this.diagnostics = options.diagnostics ?? silentSink;
    this.index = new PatternIndex(this.pattern, {
      ...this.config,
      decompose: options.decompose,
      diagnostics: this.diagnostics,
      createMatcher: (elements, nested) => new Matcher(elements, nested),
    });
  }

  get length(): number {
    return this.pattern.length;
  }

  /**
   * Score every reference position in order, without ranking or filtering
   *
   * Stopping iteration early is fine: the tracker belongs to this scan.
   */
  *scan(reference: Iterable<T>): Generator<MatchResult, void, undefined> {
    const tracker = MatchTracker.fromConfig(this.length, this.config, this.diagnostics);

    let position = 0;
    for (const token of reference) {
      const score = tracker.advance(this.index.query(token));
      if (score >= this.config.threshold) {
        this.diagnostics.emit({ type: "match", position, score });
      }
      yield { position, score };
      position++;
    }
  }

  /**
   * Find the pattern in a reference sequence
   *
   * @returns Results at or above the threshold, best first; equal scores
   *   keep reference order
   */
  findIn(reference: Iterable<T>): MatchResult[] {
    const results = Array.from(this.scan(reference));
    results.sort((a, b) => b.score - a.score);
    return results.filter((result) => result.score >= this.config.threshold);
  }
}

/**
 * One-shot search without keeping the matcher around
 */
export function findMatches<T>(
  pattern: readonly T[],
  reference: Iterable<T>,
  options: MatcherOptions = {}
): MatchResult[] {
  return new Matcher(pattern, options).findIn(reference);
}

/**
 * Whether any position reaches the threshold. Stops at the first one.
 */
export function hasMatch<T>(
  pattern: readonly T[],
  reference: Iterable<T>,
  options: MatcherOptions = {}
): boolean {
  const matcher = new Matcher(pattern, options);
  for (const result of matcher.scan(reference)) {
    if (result.score >= matcher.config.threshold) return true;
  }
  return false;
}
