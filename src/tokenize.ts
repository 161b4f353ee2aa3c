/**
 * Tokenizers for turning raw text into matcher input
 *
 * The matcher itself works on any token type; these cover the common
 * cases of quotes (words) and words (characters).
 */

// Letters and digits of any script, combining marks and underscore
const NON_WORD = /[^\p{L}\p{M}\p{N}_]+/u;

/**
 * Lower-case `text` and split it into words on runs of non-word characters
 *
 * @example
 * ```typescript
 * splitWords("Lorem ipsum! Dolor."); // ["lorem", "ipsum", "dolor"]
 * ```
 */
export function splitWords(text: string): string[] {
  return text
    .toLowerCase()
    .split(NON_WORD)
    .filter((word) => word.length > 0);
}

/**
 * Split `text` into code points
 */
export function splitCharacters(text: string): string[] {
  return Array.from(text);
}

/**
 * Default token decomposer: a string of more than one code point is
 * compound and splits into its code points. Everything else is simple.
 */
export function splitCompoundString(token: unknown): readonly string[] | undefined {
  if (typeof token !== "string") return undefined;

  const characters = splitCharacters(token);
  return characters.length > 1 ? characters : undefined;
}
