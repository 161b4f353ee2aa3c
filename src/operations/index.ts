/**
 * Matching operations
 *
 * `Matcher` works on token sequences of any type; `locateQuote` wraps it
 * for plain text.
 *
 * @version v0.1.0
 * @since v0.1.0
 */

export * from "./core";
export { locateQuote, type QuoteMatch } from "./locate";
export { findMatches, hasMatch, Matcher } from "./matcher";
