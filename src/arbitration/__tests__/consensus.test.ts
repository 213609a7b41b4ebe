import { describe, expect, it } from "vitest";

import {
  detectConsensus,
  diceBigramSimilarity,
  jaccardWordOverlap,
  lexicalSimilarity
} from "../consensus.js";

describe("lexical similarity", () => {
  it("computes word-set Jaccard overlap", () => {
    expect(jaccardWordOverlap("a b c", "b c d")).toBe(0.5);
    expect(jaccardWordOverlap("", "b c d")).toBe(0);
  });

  it("computes character bigram Dice similarity", () => {
    expect(diceBigramSimilarity("night", "nacht")).toBe(0.25);
    expect(diceBigramSimilarity("a", "a")).toBe(1);
  });

  it("ignores case and whitespace differences", () => {
    expect(lexicalSimilarity("  Hello World ", "hello   world")).toBe(1);
  });

  it("returns 0 when either text is blank", () => {
    expect(lexicalSimilarity("   ", "anything")).toBe(0);
  });

  it("takes the larger of the two measures", () => {
    expect(lexicalSimilarity("a b c", "b c d")).toBe(0.5);
    expect(lexicalSimilarity("night", "nacht")).toBe(0.25);
  });
});

describe("detectConsensus", () => {
  it("treats fewer than two texts as consensus", () => {
    expect(detectConsensus(["only one"])).toEqual({
      hasConsensus: true,
      averageSimilarity: 1,
      pairCount: 0
    });
  });

  it("averages every pair", () => {
    expect(detectConsensus(["same text", "same text", "same text"])).toEqual({
      hasConsensus: true,
      averageSimilarity: 1,
      pairCount: 3
    });
  });

  it("reports disagreement below the threshold", () => {
    expect(detectConsensus(["alpha", "omega"], 0.7)).toEqual({
      hasConsensus: false,
      averageSimilarity: 0,
      pairCount: 1
    });
  });
});
