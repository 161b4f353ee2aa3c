/**
 * Quote location in free text
 *
 * Tokenizes a quote and a text into lower-cased words and finds where the
 * quote ends in the text, tolerating the differences configured in the
 * options. Misspelled words are matched character by character.
 */

import { ConfigurationError } from "../errors";
import type { MatchResult, MatcherOptions } from "../types";
import { splitWords } from "../tokenize";
import { Matcher } from "./matcher";

/**
 * A located quote
 */
export interface QuoteMatch extends MatchResult {
  /** The text word at the end position, lower-cased */
  readonly word: string;
}

/**
 * Find where `quote` ends in `text`
 *
 * @throws {ConfigurationError} INVALID_LENGTH when the quote has no words
 *
 * @example
 * ```typescript
 * locateQuote("ipsum dolor", "Lorem ipsum dolor sit amet.");
 * // [{ position: 2, score: 1, word: "dolor" }]
 * ```
 */
export function locateQuote(
  quote: string,
  text: string,
  options: MatcherOptions = {}
): QuoteMatch[] {
  const quoteWords = splitWords(quote);
  if (quoteWords.length === 0) {
    throw ConfigurationError.forLength(0);
  }

  const textWords = splitWords(text);
  const matcher = new Matcher(quoteWords, options);

  return matcher.findIn(textWords).map((result) => ({
    ...result,
    word: textWords[result.position] ?? "",
  }));
}
