import { describe, expect, it } from "vitest";

import {
  clampUnit,
  cosineSimilarity,
  dotProduct,
  isFiniteVector,
  squaredNorm,
  vectorNorm
} from "../vector-math.js";

describe("vector math", () => {
  it("returns exactly 1 for a vector against itself", () => {
    const vector = [0.3, -1.2, 2.5, 7.1];
    expect(cosineSimilarity(vector, vector)).toBe(1);
  });

  it("returns 0 for orthogonal vectors and -1 for opposite ones", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it("treats a zero-norm vector as dissimilar instead of dividing by zero", () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([0, 0], [0, 0])).toBe(0);
  });

  it("rejects vectors of different lengths", () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow(
      "cosineSimilarity requires vectors with equal length (got 2 and 3)"
    );
    expect(() => dotProduct([1], [1, 2])).toThrow("dotProduct requires vectors with equal length");
  });

  it("computes norms", () => {
    expect(squaredNorm([3, 4])).toBe(25);
    expect(vectorNorm([3, 4])).toBe(5);
    expect(dotProduct([1, 2, 3], [4, 5, 6])).toBe(32);
  });

  it("does not overflow on very large components", () => {
    expect(cosineSimilarity([1e200, 1e200], [1e200, 1e200])).toBe(1);
    expect(cosineSimilarity([1e200, 0], [0, 3e200])).toBe(0);
    expect(cosineSimilarity([2e300, 0], [-1e300, 0])).toBe(-1);
    expect(vectorNorm([3e200, 4e200]) / 5e200).toBeCloseTo(1, 12);
  });

  it("detects non-finite components", () => {
    expect(isFiniteVector([1, 2])).toBe(true);
    expect(isFiniteVector([1, Number.NaN])).toBe(false);
    expect(isFiniteVector([1, Number.POSITIVE_INFINITY])).toBe(false);
    expect(isFiniteVector("1,2")).toBe(false);
  });

  it("clamps to the unit interval", () => {
    expect(clampUnit(-0.2)).toBe(0);
    expect(clampUnit(1.5)).toBe(1);
    expect(clampUnit(0.4)).toBe(0.4);
  });
});
