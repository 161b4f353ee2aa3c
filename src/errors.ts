/**
 * Error handling for fuzzy sequence matching
 *
 * Configuration problems are rejected when a matcher is built; the only
 * error a running scan can raise is an internal length mismatch.
 */

/**
 * Base error class for all misquote errors
 */
export class MisquoteError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "MisquoteError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options
 */
export class ValidationError extends MisquoteError {
  constructor(message: string, context?: string, code: string = "VALIDATION_ERROR") {
    super(message, code, context);
    this.name = "ValidationError";
  }
}

/**
 * Matcher parameters that are range-checked at construction
 */
export type ConfigurationParameter =
  | "length"
  | "allowedDifferences"
  | "nomatchMultiplier"
  | "threshold";

/**
 * Out-of-range matcher configuration
 */
export class ConfigurationError extends ValidationError {
  constructor(
    message: string,
    code: string,
    public readonly parameter: ConfigurationParameter,
    public readonly value: number,
    context?: string
  ) {
    super(message, context, code);
    this.name = "ConfigurationError";
  }

  static forLength(length: number): ConfigurationError {
    return new ConfigurationError(
      `Pattern length ${length} must be a positive integer`,
      "INVALID_LENGTH",
      "length",
      length,
      "A pattern needs at least one token"
    );
  }

  static forTolerance(allowedDifferences: number, length?: number): ConfigurationError {
    const bound = length === undefined ? "" : ` and < pattern length ${length}`;
    return new ConfigurationError(
      `allowedDifferences ${allowedDifferences} must be an integer >= 0${bound}`,
      "INVALID_TOLERANCE",
      "allowedDifferences",
      allowedDifferences,
      length === undefined ? undefined : `Pattern length: ${length}`
    );
  }

  static forMultiplier(nomatchMultiplier: number): ConfigurationError {
    return new ConfigurationError(
      `nomatchMultiplier ${nomatchMultiplier} must be >= 0 and < 1`,
      "INVALID_MULTIPLIER",
      "nomatchMultiplier",
      nomatchMultiplier
    );
  }

  static forThreshold(threshold: number): ConfigurationError {
    return new ConfigurationError(
      `threshold ${threshold} must be >= 0 and <= 1`,
      "INVALID_THRESHOLD",
      "threshold",
      threshold
    );
  }
}

/**
 * Contract violations when combining scores
 */
export class ScoreError extends ValidationError {
  constructor(
    message: string,
    code: "INVALID_SCORE" | "INVALID_DISTANCE",
    public readonly value: number
  ) {
    super(message, undefined, code);
    this.name = "ScoreError";
  }

  static forScore(role: "newScore" | "oldScore", score: number): ScoreError {
    return new ScoreError(`${role} ${score} must be >= 0 and <= 1`, "INVALID_SCORE", score);
  }

  static forDistance(distance: number): ScoreError {
    return new ScoreError(
      `distance ${distance} must be an integer >= 0`,
      "INVALID_DISTANCE",
      distance
    );
  }
}

/**
 * An alignment vector whose length differs from the pattern length.
 * Index and tracker built for the same pattern never produce this.
 */
export class LengthMismatchError extends MisquoteError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `Alignment vector has length ${actual}, expected ${expected}`,
      "LENGTH_MISMATCH",
      "The pattern index and tracker were built for different patterns"
    );
    this.name = "LengthMismatchError";
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nExpected length: ${this.expected}`;
    msg += `\nActual length: ${this.actual}`;
    return msg;
  }
}

/**
 * Remediation hints keyed by error code
 */
export const ERROR_SUGGESTIONS = {
  INVALID_LENGTH: "Tokenize the pattern first and pass at least one token",
  INVALID_TOLERANCE: "Use an allowedDifferences smaller than the number of pattern tokens",
  INVALID_MULTIPLIER: "Pick a nomatchMultiplier in [0, 1), e.g. 0.5",
  INVALID_THRESHOLD: "Pick a threshold in [0, 1]; lower it to see partial matches",
  INVALID_SCORE: "Scores are confidences in [0, 1]",
  INVALID_DISTANCE: "Distances count steps back and start at 0",
  LENGTH_MISMATCH: "Build the index and the tracker from the same pattern",
  VALIDATION_ERROR: "Check option names and types",
} as const;

function isSuggestionCode(code: string): code is keyof typeof ERROR_SUGGESTIONS {
  return Object.hasOwn(ERROR_SUGGESTIONS, code);
}

/**
 * Get a helpful suggestion for an error code
 */
export function getErrorSuggestion(error: MisquoteError): string | undefined {
  return isSuggestionCode(error.code) ? ERROR_SUGGESTIONS[error.code] : undefined;
}
