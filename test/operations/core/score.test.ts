import { describe, expect, test } from "vitest";
import { ScoreError } from "../../../src/errors";
import { combineScores } from "../../../src/operations/core/score";

describe("combineScores", () => {
  test("halves the old score at distance 0", () => {
    expect(combineScores(0.0, 1.0, 0)).toBe(0.5);
    expect(combineScores(0.25, 0.5, 0)).toBe(0.5);
  });

  test("weights the old score down as distance grows", () => {
    expect(combineScores(0.0, 0.75, 1)).toBe(0.25);
    expect(combineScores(0.0, 1.0, 2)).toBe(0.25);
  });

  test("caps the result at 1.0", () => {
    expect(combineScores(0.9, 0.6, 1)).toBe(1.0);
    expect(combineScores(1.0, 1.0, 0)).toBe(1.0);
  });

  test("rejects scores outside [0, 1]", () => {
    expect(() => combineScores(1.5, 0.0, 0)).toThrow(ScoreError);
    expect(() => combineScores(0.0, -0.1, 0)).toThrow(/oldScore -0.1 must be >= 0 and <= 1/);
  });

  test("rejects negative or fractional distances", () => {
    expect(() => combineScores(0.0, 0.0, -1)).toThrow(ScoreError);
    expect(() => combineScores(0.0, 0.0, 0.5)).toThrow(/distance 0.5 must be an integer >= 0/);
  });

  test("reports the violated contract in the error code", () => {
    try {
      combineScores(0.0, 0.0, -1);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ScoreError);
      expect(error).toMatchObject({ code: "INVALID_DISTANCE", value: -1 });
    }
  });
});
