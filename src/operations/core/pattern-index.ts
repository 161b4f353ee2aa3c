/**
 * Occurrence index over the distinct tokens of a pattern
 *
 * Answers "how well does this reference token line up with each pattern
 * position". Exact hits return a 0/1 occurrence vector. Compound pattern
 * tokens (multi-character words by default) also own a nested matcher over
 * their elements, so a misspelled reference word still earns partial
 * credit at the positions of the word it resembles most.
 *
 * @module pattern-index
 */

import type { DiagnosticsSink } from "../../diagnostics";
import { scopedSink, silentSink } from "../../diagnostics";
import { splitCompoundString } from "../../tokenize";
import type {
  AlignmentVector,
  MatchResult,
  MatcherConfig,
  MatcherOptions,
  TokenDecomposer,
} from "../../types";
import { resolveMatcherConfig } from "./validation-utils";

/**
 * The part of a matcher a compound entry needs
 */
export interface ElementMatcher {
  findIn(reference: Iterable<unknown>): MatchResult[];
}

/**
 * Builds the nested matcher for a compound token's elements
 */
export type ElementMatcherFactory = (
  elements: readonly unknown[],
  options: MatcherOptions
) => ElementMatcher;

/**
 * Leaf token: only its occurrence vector
 */
export interface SimpleEntry<T> {
  readonly kind: "simple";
  readonly token: T;
  readonly occurrences: AlignmentVector;
}

/**
 * Token with structure: occurrence vector plus a matcher over its elements
 */
export interface CompoundEntry<T> {
  readonly kind: "compound";
  readonly token: T;
  readonly occurrences: AlignmentVector;
  readonly elements: readonly unknown[];
  readonly matcher: ElementMatcher;
}

export type PatternEntry<T> = SimpleEntry<T> | CompoundEntry<T>;

export interface PatternIndexOptions extends MatcherOptions {
  /** Builds nested matchers for compound tokens */
  createMatcher: ElementMatcherFactory;
}

/**
 * Read-only after construction; safe to share between concurrent scans.
 */
export class PatternIndex<T> {
  readonly config: MatcherConfig;
  private readonly entryMap = new Map<T, PatternEntry<T>>();
  private readonly compounds: CompoundEntry<T>[] = [];
  private readonly decompose: TokenDecomposer;
  private readonly diagnostics: DiagnosticsSink;
  private readonly empty: AlignmentVector;

  /**
   * @throws {ConfigurationError} for an empty pattern or invalid options
   */
  constructor(pattern: readonly T[], options: PatternIndexOptions) {
    this.config = resolveMatcherConfig(pattern.length, options);
    this.decompose = options.decompose ?? splitCompoundString;
    this.diagnostics = options.diagnostics ?? silentSink;
    this.empty = Object.freeze(new Array<number>(pattern.length).fill(0.0));

    const occurrences = new Map<T, number[]>();
    pattern.forEach((token, position) => {
      let vector = occurrences.get(token);
      if (vector === undefined) {
        vector = new Array<number>(pattern.length).fill(0.0);
        occurrences.set(token, vector);
      }
      vector[position] = 1.0;
    });

    for (const [token, vector] of occurrences) {
      const frozen = Object.freeze(vector);
      const elements = this.decompose(token);

      if (elements === undefined || elements.length < 2) {
        this.entryMap.set(token, { kind: "simple", token, occurrences: frozen });
        continue;
      }

      const entry: CompoundEntry<T> = {
        kind: "compound",
        token,
        occurrences: frozen,
        elements,
        matcher: options.createMatcher(elements, this.nestedOptions(token, elements.length)),
      };
      this.entryMap.set(token, entry);
      this.compounds.push(entry);
    }
  }

  /** Pattern length */
  get length(): number {
    return this.empty.length;
  }

  /** Distinct-token entries in first-occurrence order */
  entries(): PatternEntry<T>[] {
    return Array.from(this.entryMap.values());
  }

  has(token: T): boolean {
    return this.entryMap.has(token);
  }

  /**
   * Alignment vector for one reference token
   *
   * Exact hits return the token's occurrence vector. Otherwise every
   * compound entry's nested matcher searches the reference token's
   * elements and the best-scoring entry (earliest on ties) lends its
   * occurrence vector, scaled by that score. No candidate gives all zeros.
   */
  query(token: T): AlignmentVector {
    const exact = this.entryMap.get(token);
    if (exact !== undefined) {
      this.diagnostics.emit({ type: "lookup", token, kind: "exact", score: 1.0 });
      return exact.occurrences;
    }

    if (this.compounds.length === 0) {
      this.diagnostics.emit({ type: "lookup", token, kind: "none", score: 0.0 });
      return this.empty;
    }

    const elements = this.decompose(token) ?? [token];
    let best: { entry: CompoundEntry<T>; score: number } | undefined;

    for (const entry of this.compounds) {
      const [top] = entry.matcher.findIn(elements);
      if (top !== undefined && (best === undefined || top.score > best.score)) {
        best = { entry, score: top.score };
      }
    }

    if (best === undefined) {
      this.diagnostics.emit({ type: "lookup", token, kind: "none", score: 0.0 });
      return this.empty;
    }

    const { score } = best;
    this.diagnostics.emit({ type: "lookup", token, kind: "fuzzy", score });
    return best.entry.occurrences.map((value) => value * score);
  }

  // Same tolerances, but a short token cannot allow as many differences as the pattern
  private nestedOptions(token: T, elementCount: number): MatcherOptions {
    return {
      allowedDifferences: Math.min(this.config.allowedDifferences, elementCount - 1),
      nomatchMultiplier: this.config.nomatchMultiplier,
      threshold: this.config.threshold,
      decompose: this.decompose,
      diagnostics: scopedSink(this.diagnostics, token),
    };
  }
}
