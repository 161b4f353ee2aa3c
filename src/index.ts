/**
 * misquote - fuzzy subsequence matching for token sequences
 *
 * Finds where a short pattern of tokens (words, characters, any values
 * comparable for equality) ends inside a longer reference, exactly or with
 * tolerated differences, and ranks the candidates by confidence.
 */

// Diagnostics
export {
  type ConsoleSinkOptions,
  createConsoleSink,
  type DiagnosticEvent,
  type DiagnosticLevel,
  type DiagnosticsSink,
  formatDiagnosticEvent,
  scopedSink,
  silentSink,
} from "./diagnostics";
// Error types
export {
  type ConfigurationParameter,
  ConfigurationError,
  ERROR_SUGGESTIONS,
  getErrorSuggestion,
  LengthMismatchError,
  MisquoteError,
  ScoreError,
  ValidationError,
} from "./errors";
// Matching
export * from "./operations";
// Tokenizers
export { splitCharacters, splitCompoundString, splitWords } from "./tokenize";
// Core types and schemas
export {
  AllowedDifferencesSchema,
  DEFAULT_MATCHER_CONFIG,
  MatcherOptionsSchema,
  NomatchMultiplierSchema,
  PatternLengthSchema,
  ThresholdSchema,
} from "./types";
export type {
  AlignmentVector,
  MatchResult,
  MatcherConfig,
  MatcherOptions,
  TokenDecomposer,
  TrackerState,
  ValidatedMatcherOptions,
} from "./types";
