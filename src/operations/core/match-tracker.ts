/**
 * Graded Shift-And automaton
 *
 * The classic Bitap/Shift-And algorithm keeps one bit per pattern position
 * and advances with a shift and an AND against the current character's
 * occurrence mask. Here the bits are confidences in [0, 1]: a hard
 * mismatch decays an entry by `nomatchMultiplier` instead of clearing it,
 * fuzzy partial credit scales it, and `allowedDifferences` lets states
 * that are missing trailing tokens, or that had extra reference tokens
 * interposed, still contribute to the score.
 *
 * @module match-tracker
 */

import { LengthMismatchError } from "../../errors";
import type { AlignmentVector, MatcherConfig, MatcherOptions, TrackerState } from "../../types";
import type { DiagnosticsSink } from "../../diagnostics";
import { silentSink } from "../../diagnostics";
import { HistoryBuffer } from "./history-buffer";
import { combineScores } from "./score";
import { resolveMatcherConfig } from "./validation-utils";

/**
 * A config that was already resolved, e.g. by the matcher that owns the tracker
 */
export interface ResolvedTrackerOptions {
  readonly config: MatcherConfig;
  readonly diagnostics?: DiagnosticsSink;
}

/**
 * Scan-local automaton state. Create one per reference scan.
 *
 * @example
 * ```typescript
 * const tracker = new MatchTracker(3);
 * tracker.advance([1, 0, 0]); // 0
 * tracker.advance([0, 1, 0]); // 0
 * tracker.advance([0, 0, 1]); // 1
 * ```
 */
export class MatchTracker {
  readonly config: MatcherConfig;
  private readonly history: HistoryBuffer<TrackerState>;
  private readonly filler: number;
  private readonly diagnostics: DiagnosticsSink;
  private stepCount = 0;

  /**
   * @param length - Pattern length
   * @param options - Raw options, validated here, or a resolved config taken as is
   * @throws {ConfigurationError} for an invalid length, tolerance, multiplier or threshold
   */
  constructor(
    readonly length: number,
    options: MatcherOptions | ResolvedTrackerOptions = {}
  ) {
    this.config = "config" in options ? options.config : resolveMatcherConfig(length, options);
    this.diagnostics = options.diagnostics ?? silentSink;
    // The diagonal look-back reaches allowedDifferences + 1 states behind the newest
    this.history = new HistoryBuffer<TrackerState>(this.config.allowedDifferences + 2);

    const { nomatchMultiplier, allowedDifferences } = this.config;
    if (nomatchMultiplier > 0.0) {
      this.filler = nomatchMultiplier;
    } else if (allowedDifferences > 0) {
      this.filler = 1.0 / (allowedDifferences + 1);
    } else {
      this.filler = 0.0;
    }
  }

  /**
   * Tracker for a config resolved against `length` already; skips validation
   */
  static fromConfig(
    length: number,
    config: MatcherConfig,
    diagnostics?: DiagnosticsSink
  ): MatchTracker {
    return new MatchTracker(length, { config, diagnostics });
  }

  /** Number of alignment vectors consumed */
  get steps(): number {
    return this.stepCount;
  }

  /** Retained states, oldest first */
  get states(): TrackerState[] {
    return this.history.toArray();
  }

  /**
   * Consume the alignment vector of the next reference token
   *
   * @returns Confidence that the whole pattern ends at this token
   * @throws {LengthMismatchError} when the vector length is not the pattern length
   */
  advance(alignment: AlignmentVector): number {
    if (alignment.length !== this.length) {
      throw new LengthMismatchError(this.length, alignment.length);
    }

    const state = this.applyAlignment(this.shiftLatest(), alignment);
    this.history.push(state);
    this.stepCount++;

    let score = state[0] ?? 0.0;

    for (let j = 0; j < this.config.allowedDifferences; j++) {
      // Everything matched except the last j + 1 pattern tokens
      score = combineScores(score, state[j + 1] ?? 0.0, j);

      // Extra reference tokens interposed: jump from an older state
      const older = this.history.back(j + 1);
      if (older !== undefined) {
        const alternate = this.applyAlignment(this.shift(older, j + 2), alignment);
        score = combineScores(score, alternate[0] ?? 0.0, j);
      }
    }

    this.diagnostics.emit({ type: "step", state, score });
    return score;
  }

  private shiftLatest(): number[] {
    const latest = this.history.back(0);
    if (latest !== undefined) {
      return this.shift(latest, 1);
    }

    const seeded = new Array<number>(this.length - 1).fill(this.filler);
    seeded.push(1.0);
    return seeded;
  }

  /**
   * Drop `by` leading entries and seed `by` fresh hypotheses at the end
   */
  private shift(state: TrackerState, by: number): number[] {
    const shifted = state.slice(by);
    for (let i = 0; i < by; i++) {
      shifted.push(1.0);
    }
    return shifted;
  }

  /**
   * Graded AND of a working vector with an alignment vector, in place.
   * Working index i is the hypothesis that still needs pattern token
   * `length - 1 - i`.
   */
  private applyAlignment(working: number[], alignment: AlignmentVector): number[] {
    for (let i = 0; i < this.length; i++) {
      const quality = alignment[this.length - 1 - i] ?? 0.0;
      const current = working[i] ?? 0.0;

      if (quality === 0.0) {
        working[i] = current * this.config.nomatchMultiplier;
      } else if (quality < 1.0) {
        working[i] = current * quality;
      }
    }
    return working;
  }
}
