/**
 * Common validation utilities for matcher construction
 *
 * Combines ArkType schema validation with domain validators so every
 * entry point (matcher, tracker, convenience functions) rejects bad
 * configuration the same way, before any matching starts.
 */

import { type } from "arktype";
import type { ArkErrors } from "arktype";
import { ConfigurationError, MisquoteError, ValidationError } from "../../errors";
import {
  DEFAULT_MATCHER_CONFIG,
  MatcherOptionsSchema,
  PatternLengthSchema,
  type MatcherConfig,
  type MatcherOptions,
  type ValidatedMatcherOptions,
} from "../../types";

/**
 * Custom validation function signature
 * Allows for domain-specific validation logic beyond schema validation
 */
type CustomValidator<T> = (options: T) => void;

/**
 * Anything callable like an ArkType schema
 */
type Schema<T> = (input: unknown) => T | ArkErrors;

/**
 * Creates a reusable validation function for options
 *
 * Schema failures become a `ValidationError` carrying the ArkType summary.
 * Errors thrown from schema pipes or custom validators that already belong
 * to this library pass through untouched; anything else is wrapped.
 *
 * @example
 * ```typescript
 * const validate = createOptionsValidator<ValidatedMatcherOptions>(MatcherOptionsSchema, [
 *   CommonValidators.toleranceBelowLength(3),
 * ]);
 * const options = validate({ allowedDifferences: 1 });
 * ```
 */
export function createOptionsValidator<T>(
  schema: Schema<T>,
  customValidators: CustomValidator<T>[] = []
): (options: unknown) => T {
  return (options: unknown): T => {
    const result = schema(options);

    if (result instanceof type.errors) {
      throw new ValidationError(
        `Invalid options: ${result.summary}`,
        "Review the option names and types"
      );
    }

    for (const validator of customValidators) {
      try {
        validator(result);
      } catch (error) {
        if (error instanceof MisquoteError) {
          throw error;
        }
        throw new ValidationError(
          error instanceof Error ? error.message : "Unknown validation error",
          "Custom validation failed"
        );
      }
    }

    return result;
  };
}

/**
 * Reusable domain validators
 */
export const CommonValidators = {
  /**
   * allowedDifferences must leave at least one pattern token to match
   */
  toleranceBelowLength:
    (length: number) =>
    (options: ValidatedMatcherOptions): void => {
      const allowed = options.allowedDifferences;
      if (allowed !== undefined && allowed >= length) {
        throw ConfigurationError.forTolerance(allowed, length);
      }
    },
};

const NUMERIC_OPTION_KEYS = ["allowedDifferences", "nomatchMultiplier", "threshold"] as const;

// Optional keys are exact in ArkType, so explicit `undefined` is dropped here
function numericOptions(options: MatcherOptions): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const key of NUMERIC_OPTION_KEYS) {
    const value = options[key];
    if (value !== undefined) {
      picked[key] = value;
    }
  }
  return picked;
}

/**
 * Validate a pattern length
 *
 * @throws {ConfigurationError} INVALID_LENGTH when not a positive integer
 */
export function validatePatternLength(length: number): number {
  const checked = PatternLengthSchema(length);
  if (checked instanceof type.errors) {
    throw ConfigurationError.forLength(length);
  }
  return checked;
}

/**
 * Validate options against a pattern length and fill in defaults
 *
 * @throws {ConfigurationError} for out-of-range values
 * @throws {ValidationError} for values of the wrong type
 */
export function resolveMatcherConfig(length: number, options: MatcherOptions = {}): MatcherConfig {
  const patternLength = validatePatternLength(length);
  const validate = createOptionsValidator<ValidatedMatcherOptions>(MatcherOptionsSchema, [
    CommonValidators.toleranceBelowLength(patternLength),
  ]);
  const validated = validate(numericOptions(options));

  return Object.freeze({
    allowedDifferences: validated.allowedDifferences ?? DEFAULT_MATCHER_CONFIG.allowedDifferences,
    nomatchMultiplier: validated.nomatchMultiplier ?? DEFAULT_MATCHER_CONFIG.nomatchMultiplier,
    threshold: validated.threshold ?? DEFAULT_MATCHER_CONFIG.threshold,
  });
}
