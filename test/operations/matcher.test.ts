/**
 * Tests for Matcher scanning, ranking and filtering
 */

import { describe, expect, test } from "vitest";
import type { DiagnosticEvent, DiagnosticsSink } from "../../src/diagnostics";
import { ConfigurationError, ValidationError } from "../../src/errors";
import { findMatches, hasMatch, Matcher } from "../../src/operations/matcher";
import type { MatcherOptions } from "../../src/types";
import { thrownBy } from "../utils/error-helpers";

describe("Matcher", () => {
  describe("Exact matching", () => {
    test("finds a pattern that is the whole reference", () => {
      const matcher = new Matcher(["a", "b", "c"]);

      expect(matcher.findIn(["a", "b", "c"])).toEqual([{ position: 2, score: 1 }]);
    });

    test("reports the end position of an occurrence inside a longer reference", () => {
      const matcher = new Matcher(["quick", "brown", "fox"]);

      expect(matcher.findIn(["the", "quick", "brown", "fox", "jumps"])).toEqual([
        { position: 3, score: 1 },
      ]);
    });

    test("finds nothing in a reference that is too short", () => {
      const matcher = new Matcher(["a", "b", "c"]);

      expect(matcher.findIn(["a", "b"])).toEqual([]);
      expect(Array.from(matcher.scan(["a", "b"]))).toEqual([
        { position: 0, score: 0 },
        { position: 1, score: 0 },
      ]);
    });

    test("matches any equality-comparable token type", () => {
      const matcher = new Matcher([1, 2, 3]);

      expect(matcher.findIn([0, 1, 2, 3])).toEqual([{ position: 3, score: 1 }]);
    });

    test("can be reused across scans", () => {
      const matcher = new Matcher(["a", "b"]);

      expect(matcher.findIn(["a", "b", "a", "b"])).toEqual([
        { position: 1, score: 1 },
        { position: 3, score: 1 },
      ]);
      expect(matcher.findIn(["a", "b", "a", "b"])).toEqual([
        { position: 1, score: 1 },
        { position: 3, score: 1 },
      ]);
    });
  });

  describe("Fuzzy matching", () => {
    test("tolerates a missing trailing token with allowedDifferences", () => {
      const matcher = new Matcher(["a", "b", "c"], { allowedDifferences: 1, threshold: 0.5 });

      expect(matcher.findIn(["a", "b"])).toEqual([{ position: 1, score: 0.5 }]);
    });

    test("applies the nomatch multiplier once per substituted token", () => {
      const matcher = new Matcher(["a", "b", "c"], { nomatchMultiplier: 0.5, threshold: 0.5 });

      expect(matcher.findIn(["a", "x", "c"])).toEqual([{ position: 2, score: 0.5 }]);
    });

    test("matches misspelled words through nested character matching", () => {
      const matcher = new Matcher(["lorem", "ipsum"], { allowedDifferences: 1, threshold: 0.5 });

      expect(matcher.findIn(["lorm", "ipsum"])).toEqual([{ position: 1, score: 1 }]);
    });
  });

  describe("Ranking and filtering", () => {
    const pattern = ["a", "b"];
    const reference = ["a", "b", "x", "a", "x"];

    test("sorts by score descending and keeps reference order on ties", () => {
      const matcher = new Matcher(pattern, { nomatchMultiplier: 0.5, threshold: 0.2 });

      expect(matcher.findIn(reference)).toEqual([
        { position: 1, score: 1 },
        { position: 4, score: 0.5 },
        { position: 0, score: 0.25 },
        { position: 2, score: 0.25 },
        { position: 3, score: 0.25 },
      ]);
    });

    test("drops exactly the results below the threshold", () => {
      const matcher = new Matcher(pattern, { nomatchMultiplier: 0.5, threshold: 0.3 });
      const all = Array.from(matcher.scan(reference));
      const kept = matcher.findIn(reference);

      expect(kept).toEqual([
        { position: 1, score: 1 },
        { position: 4, score: 0.5 },
      ]);
      expect(all.filter((result) => result.score >= 0.3)).toHaveLength(kept.length);
    });

    test("keeps every score within [0, 1] and at or above the threshold", () => {
      const matcher = new Matcher(["a", "b", "c", "d"], {
        allowedDifferences: 2,
        nomatchMultiplier: 0.5,
        threshold: 0.1,
      });
      const results = matcher.findIn(["a", "b", "b", "d", "c", "a", "b", "c", "d", "x"]);

      expect(results.length).toBeGreaterThan(0);
      for (const { score } of results) {
        expect(score).toBeGreaterThanOrEqual(0.1);
        expect(score).toBeLessThanOrEqual(1);
      }
      for (let i = 1; i < results.length; i++) {
        expect(results[i - 1]?.score ?? 0).toBeGreaterThanOrEqual(results[i]?.score ?? 0);
      }
    });

    test("never lowers a score when the nomatch multiplier grows", () => {
      const reference = ["a", "x", "c", "b", "a", "c", "c"];
      const scoresFor = (nomatchMultiplier: number): number[] =>
        Array.from(
          new Matcher(["a", "b", "c"], { nomatchMultiplier, threshold: 0 }).scan(reference),
          (result) => result.score
        );

      const multipliers = [0, 0.25, 0.5, 0.75];
      for (let i = 1; i < multipliers.length; i++) {
        const lower = scoresFor(multipliers[i - 1] ?? 0);
        const higher = scoresFor(multipliers[i] ?? 0);
        higher.forEach((score, position) => {
          expect(score).toBeGreaterThanOrEqual(lower[position] ?? 0);
        });
      }
    });
  });

  describe("Scanning", () => {
    test("yields positions lazily", () => {
      const matcher = new Matcher(["a", "b"]);
      const scan = matcher.scan(["a", "b", "c"]);

      expect(scan.next()).toEqual({ done: false, value: { position: 0, score: 0 } });
      expect(scan.next()).toEqual({ done: false, value: { position: 1, score: 1 } });
    });

    test("reports matches at or above the threshold to the diagnostics sink", () => {
      const events: DiagnosticEvent[] = [];
      const sink: DiagnosticsSink = {
        emit: (event) => {
          if (event.type === "match") events.push(event);
        },
      };
      const matcher = new Matcher(["a", "b"], { diagnostics: sink });

      matcher.findIn(["x", "a", "b"]);

      expect(events).toEqual([{ type: "match", position: 2, score: 1 }]);
    });
  });

  describe("Configuration", () => {
    test("applies defaults", () => {
      const matcher = new Matcher(["a", "b"]);

      expect(matcher.length).toBe(2);
      expect(matcher.config).toEqual({ allowedDifferences: 0, nomatchMultiplier: 0, threshold: 1 });
    });

    test("rejects an empty pattern", () => {
      const error = thrownBy(() => new Matcher([]));

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: "INVALID_LENGTH" });
    });

    test("rejects allowedDifferences that are not below the pattern length", () => {
      expect(thrownBy(() => new Matcher(["a", "b"], { allowedDifferences: 2 }))).toMatchObject({
        code: "INVALID_TOLERANCE",
        value: 2,
      });
    });

    test("rejects options of the wrong type", () => {
      const options: MatcherOptions = JSON.parse('{"threshold": "high"}');
      const error = thrownBy(() => new Matcher(["a"], options));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).not.toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: "VALIDATION_ERROR" });
    });
  });
});

describe("findMatches", () => {
  test("runs a one-shot search", () => {
    expect(findMatches(["b", "c"], ["a", "b", "c"])).toEqual([{ position: 2, score: 1 }]);
  });
});

describe("hasMatch", () => {
  test("detects an occurrence", () => {
    expect(hasMatch(["a", "b"], ["x", "a", "b"])).toBe(true);
  });

  test("rejects tokens in the wrong order", () => {
    expect(hasMatch(["a", "b"], ["b", "a"])).toBe(false);
  });
});
