import { describe, expect, it } from "vitest";

import { countDiscourseConnectives, scoreCoherence } from "../coherence.js";

describe("scoreCoherence", () => {
  it("scores text without connectives as 0", () => {
    expect(scoreCoherence("")).toBe(0);
    expect(scoreCoherence("A cache sits in front of the database.")).toBe(0);
  });

  it("counts connectives case-insensitively", () => {
    expect(countDiscourseConnectives("Because it rains, we stay. THEREFORE we read.")).toBe(2);
    expect(scoreCoherence("Because it rains, we stay. THEREFORE we read.")).toBeCloseTo(2 / 3, 12);
  });

  it("matches whole words only", () => {
    expect(countDiscourseConnectives("Thusly, becausewhatever, nevertheless.")).toBe(0);
  });

  it("matches multi-word connectives across any whitespace", () => {
    expect(countDiscourseConnectives("for  example, and in\nparticular")).toBe(2);
  });

  it("counts repeated occurrences", () => {
    expect(countDiscourseConnectives("because because")).toBe(2);
  });

  it("saturates at three connectives", () => {
    expect(scoreCoherence("because therefore thus")).toBe(1);
    expect(scoreCoherence("because therefore thus however specifically")).toBe(1);
  });

  it("never decreases when a connective is appended", () => {
    let text = "The plan has steps.";
    let previous = scoreCoherence(text);
    for (const connective of ["because", "however", "for example", "consequently"]) {
      text = `${text} ${connective} more.`;
      const next = scoreCoherence(text);
      expect(next).toBeGreaterThanOrEqual(previous);
      previous = next;
    }
  });
});
