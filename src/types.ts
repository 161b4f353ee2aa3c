/**
 * Core type definitions for fuzzy token matching
 *
 * Tokens are opaque: the index keys them in a `Map`, so two tokens are the
 * same token when `SameValueZero` says so.
 */

import { type } from "arktype";
import { ConfigurationError } from "./errors";
import type { DiagnosticsSink } from "./diagnostics";

/**
 * Per-pattern-position match quality for one reference token.
 * 1.0 is an exact match, 0.0 no relation, anything between partial credit.
 */
export type AlignmentVector = readonly number[];

/**
 * One automaton state per consumed reference token. Entry `i` is the
 * confidence that the trailing `length - i` pattern tokens have matched
 * ending at the current reference position.
 */
export type TrackerState = readonly number[];

/**
 * A scored candidate end position in the reference
 */
export interface MatchResult {
  /**
   * Zero-based index of the reference token where the match ends.
   */
  readonly position: number;

  /**
   * Ranking confidence in [0, 1]. Not a distance or a probability.
   */
  readonly score: number;
}

/**
 * Splits a compound token into its constituent elements, or returns
 * `undefined` when the token has no further structure. Elements must be
 * strictly simpler than the token; fewer than two elements counts as simple.
 */
export type TokenDecomposer = (token: unknown) => readonly unknown[] | undefined;

/**
 * Validated, immutable tolerance settings shared by an index and its tracker
 */
export interface MatcherConfig {
  /** Trailing or interposed pattern positions tolerated */
  readonly allowedDifferences: number;
  /** Decay applied on a hard mismatch instead of zeroing */
  readonly nomatchMultiplier: number;
  /** Minimum confidence reported */
  readonly threshold: number;
}

/**
 * Options accepted when building a matcher
 */
export interface MatcherOptions {
  /**
   * Number of pattern tokens that may be missing or different.
   * Scores fall to roughly 1/2 for one miss, 1/3 for two.
   * @default 0
   */
  allowedDifferences?: number;

  /**
   * Multiplier applied for every pattern token that does not match.
   * @default 0
   */
  nomatchMultiplier?: number;

  /**
   * Results scoring below this are dropped. Set below 1.0 to see
   * non-exact matches.
   * @default 1
   */
  threshold?: number;

  /**
   * How compound tokens are split for recursive fuzzy matching.
   * @default splitCompoundString
   */
  decompose?: TokenDecomposer;

  /**
   * Receives trace events. Never affects results.
   * @default silentSink
   */
  diagnostics?: DiagnosticsSink;
}

/**
 * Defaults applied to omitted numeric options
 */
export const DEFAULT_MATCHER_CONFIG: MatcherConfig = Object.freeze({
  allowedDifferences: 0,
  nomatchMultiplier: 0.0,
  threshold: 1.0,
});

/**
 * Tolerance count: a non-negative integer. The upper bound depends on the
 * pattern length and is checked when the config is resolved.
 */
export const AllowedDifferencesSchema = type("number").pipe((value: number) => {
  if (!Number.isInteger(value) || value < 0) {
    throw ConfigurationError.forTolerance(value);
  }
  return value;
});

/**
 * Mismatch decay in [0, 1)
 */
export const NomatchMultiplierSchema = type("number").pipe((value: number) => {
  if (!(value >= 0.0 && value < 1.0)) {
    throw ConfigurationError.forMultiplier(value);
  }
  return value;
});

/**
 * Reporting threshold in [0, 1]
 */
export const ThresholdSchema = type("number").pipe((value: number) => {
  if (!(value >= 0.0 && value <= 1.0)) {
    throw ConfigurationError.forThreshold(value);
  }
  return value;
});

/**
 * Pattern length: a positive integer
 */
export const PatternLengthSchema = type("number").pipe((length: number) => {
  if (!Number.isInteger(length) || length <= 0) {
    throw ConfigurationError.forLength(length);
  }
  return length;
});

/**
 * Numeric matcher options. Function-valued options are not validated here.
 */
export const MatcherOptionsSchema = type({
  "allowedDifferences?": AllowedDifferencesSchema,
  "nomatchMultiplier?": NomatchMultiplierSchema,
  "threshold?": ThresholdSchema,
});
export type ValidatedMatcherOptions = typeof MatcherOptionsSchema.infer;
