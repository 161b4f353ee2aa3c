/**
 * Core primitives for fuzzy matching
 *
 * The occurrence index, the graded automaton and the pieces they share.
 */

export { HistoryBuffer } from "./history-buffer";
export { MatchTracker, type ResolvedTrackerOptions } from "./match-tracker";
export {
  type CompoundEntry,
  type ElementMatcher,
  type ElementMatcherFactory,
  PatternIndex,
  type PatternEntry,
  type PatternIndexOptions,
  type SimpleEntry,
} from "./pattern-index";
export { combineScores } from "./score";
export {
  CommonValidators,
  createOptionsValidator,
  resolveMatcherConfig,
  validatePatternLength,
} from "./validation-utils";
