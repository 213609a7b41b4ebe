import { describe, expect, it, vi } from "vitest";

import { InvalidInputError } from "../../errors.js";
import type { AgentOutput, SafetyScore } from "../../providers/types.js";
import { ArbitrationEngine, createArbitrationConfig } from "../engine.js";

const output = (
  text: string,
  safetyScore: SafetyScore = "unknown",
  role: AgentOutput["role"] = "strategist"
): AgentOutput => ({ role, text, safetyScore, truncated: false });

const fixedEmbedder = (vectors: Record<string, number[]>) => ({
  embed: vi.fn(async (text: string) => {
    const vector = vectors[text];
    if (!vector) {
      throw new Error(`no vector for ${text}`);
    }
    return vector;
  })
});

describe("ArbitrationEngine.computeDivergence", () => {
  const engine = new ArbitrationEngine(fixedEmbedder({}));

  it("is exactly 0 for identical embeddings", () => {
    const vector = [0.12, -0.7, 3.3, 0.05];
    expect(engine.computeDivergence(vector, [...vector])).toBe(0);
  });

  it("is exactly 1 for orthogonal embeddings", () => {
    expect(engine.computeDivergence([1, 0, 0], [0, 0, 2])).toBe(1);
  });

  it("is 1 when either embedding has zero norm", () => {
    expect(engine.computeDivergence([0, 0], [1, 1])).toBe(1);
  });

  it("clamps opposite embeddings to 1", () => {
    expect(engine.computeDivergence([1, 2], [-1, -2])).toBe(1);
  });

  it("stays in range for very large components", () => {
    expect(engine.computeDivergence([1e200, 1e200], [1e200, 1e200])).toBe(0);
    expect(engine.computeDivergence([1e200, 0], [0, 3e200])).toBe(1);
  });

  it("rejects mismatched dimensionality", () => {
    expect(() => engine.computeDivergence([1, 2], [1, 2, 3])).toThrow(InvalidInputError);
    expect(() => engine.computeDivergence([1, 2], [1, 2, 3])).toThrow("Embedding dimensions differ (2 vs 3)");
  });

  it("rejects non-finite components", () => {
    expect(() => engine.computeDivergence([1, Number.NaN], [1, 2])).toThrow(
      "Embeddings must contain only finite numbers"
    );
  });
});

describe("ArbitrationEngine.computeCompositeScore", () => {
  const engine = new ArbitrationEngine(fixedEmbedder({}));

  it("applies the default 0.4/0.4/0.2 weights", () => {
    expect(engine.computeCompositeScore(1, 1, 1)).toBeCloseTo(1, 12);
    expect(engine.computeCompositeScore(0.5, 1, 0.5)).toBeCloseTo(0.65, 12);
    expect(engine.computeCompositeScore(0, 0, 0)).toBe(0);
  });

  it("uses configured weights", () => {
    const custom = new ArbitrationEngine(fixedEmbedder({}), {
      weights: { semantic: 1, safety: 0, coherence: 0 }
    });
    expect(custom.computeCompositeScore(0.25, 1, 1)).toBe(0.25);
  });
});

describe("ArbitrationEngine.arbitrate", () => {
  it("requests refinement when divergence exceeds the threshold", async () => {
    const engine = new ArbitrationEngine(fixedEmbedder({}), { divergenceThreshold: 0.5 });
    const result = await engine.arbitrate(output("first answer"), output("second answer"), {
      embeddings: [
        [1, 0],
        [0, 1]
      ]
    });
    expect(result.divergence).toBe(1);
    expect(result.decision).toBe("consensus_refinement_needed");
    expect(result.degraded).toBe(false);
  });

  it("requests refinement above the threshold whichever candidate scores higher", async () => {
    const engine = new ArbitrationEngine(fixedEmbedder({}), { divergenceThreshold: 0.5 });
    const embeddings: [number[], number[]] = [
      [1, 0],
      [0, 1]
    ];

    const bWins = await engine.arbitrate(
      output("plain", "unknown"),
      output("because therefore thus", 0.9, "synthesizer"),
      { embeddings }
    );
    expect(bWins.scores.model_a.composite).toBeCloseTo(0.2, 12);
    expect(bWins.scores.model_b.composite).toBeCloseTo(0.56, 12);
    expect(bWins.selectedCandidate).toBe("model_b");
    expect(bWins.decision).toBe("consensus_refinement_needed");

    const aWins = await engine.arbitrate(
      output("because therefore thus", 0.9),
      output("plain", "unknown", "synthesizer"),
      { embeddings }
    );
    expect(aWins.selectedCandidate).toBe("model_a");
    expect(aWins.decision).toBe("consensus_refinement_needed");
  });

  it("keeps scores finite for very large embeddings", async () => {
    const engine = new ArbitrationEngine(fixedEmbedder({}));
    const result = await engine.arbitrate(output("a"), output("b"), {
      embeddings: [
        [1e200, 1e200],
        [1e200, -1e200]
      ]
    });
    expect(result.divergence).toBe(1);
    expect(result.decision).toBe("consensus_refinement_needed");
    expect(result.scores.model_a.composite).toBeCloseTo(0.2, 12);
    expect(result.scores.model_b.composite).toBeCloseTo(0.2, 12);
  });

  it("requests both embeddings before either resolves", async () => {
    const started: string[] = [];
    const release: Array<() => void> = [];
    const engine = new ArbitrationEngine({
      embed: (text) =>
        new Promise<number[]>((resolve) => {
          started.push(text);
          release.push(() => resolve([1, 0]));
        })
    });

    const pending = engine.arbitrate(output("first"), output("second"));
    await Promise.resolve();
    expect(started).toEqual(["first", "second"]);

    release.forEach((resolveEmbedding) => resolveEmbedding());
    const result = await pending;
    expect(result.divergence).toBe(0);
  });

  it("selects the best candidate when embeddings agree", async () => {
    const embedder = fixedEmbedder({ plain: [1, 2, 3], "because therefore thus": [1, 2, 3] });
    const engine = new ArbitrationEngine(embedder);
    const result = await engine.arbitrate(output("plain"), output("because therefore thus", "unknown", "synthesizer"));

    expect(embedder.embed).toHaveBeenCalledTimes(2);
    expect(result.divergence).toBe(0);
    expect(result.semanticOverlap).toBe(1);
    expect(result.decision).toBe("selected_best");
    expect(result.selectedCandidate).toBe("model_b");
    expect(result.selectedOutput.role).toBe("synthesizer");
    expect(result.scores.model_a.coherence).toBe(0);
    expect(result.scores.model_b.coherence).toBe(1);
    expect(result.scores.model_a.composite).toBeCloseTo(0.6, 12);
    expect(result.scores.model_b.composite).toBeCloseTo(0.8, 12);
  });

  it("breaks ties in favour of candidate A", async () => {
    const engine = new ArbitrationEngine(fixedEmbedder({}));
    const result = await engine.arbitrate(
      output("same words", "unknown", "strategist"),
      output("same words", "unknown", "synthesizer"),
      { embeddings: [[1, 1], [1, 1]] }
    );
    expect(result.scores.model_a.composite).toBe(result.scores.model_b.composite);
    expect(result.selectedCandidate).toBe("model_a");
    expect(result.selectedOutput.role).toBe("strategist");
    expect(result.lexicalSimilarity).toBe(1);
  });

  it("scores unknown safety with the configured confidence, not as safe", async () => {
    const engine = new ArbitrationEngine(fixedEmbedder({}), { unknownSafetyConfidence: 0.25 });
    const result = await engine.arbitrate(output("alpha", "unknown"), output("alpha", 0.9), {
      embeddings: [[1], [1]]
    });
    expect(result.scores.model_a.safety).toBe(0.25);
    expect(result.scores.model_a.safetyStatus).toBe("unknown");
    expect(result.scores.model_b.safety).toBe(0.9);
    expect(result.scores.model_b.safetyStatus).toBe("assessed");
    expect(result.selectedCandidate).toBe("model_b");
  });

  it("degrades to maximal divergence when an embedding fails", async () => {
    const engine = new ArbitrationEngine(fixedEmbedder({ available: [1, 0] }));
    const result = await engine.arbitrate(output("available"), output("missing"));
    expect(result.degraded).toBe(true);
    expect(result.divergence).toBe(1);
    expect(result.semanticOverlap).toBe(0);
    expect(result.decision).toBe("consensus_refinement_needed");
    expect(result.degradedReason).toBe("embedding unavailable (model_b: no vector for missing)");
  });

  it("marks zero-norm embeddings as degraded", async () => {
    const engine = new ArbitrationEngine(fixedEmbedder({ empty: [0, 0], full: [1, 0] }));
    const result = await engine.arbitrate(output("empty"), output("full"));
    expect(result.divergence).toBe(1);
    expect(result.degraded).toBe(true);
    expect(result.degradedReason).toBe("zero-norm embedding for model_a");
  });

  it("propagates mismatched embedding dimensions", async () => {
    const engine = new ArbitrationEngine(fixedEmbedder({ a: [1, 0], b: [1, 0, 0] }));
    await expect(engine.arbitrate(output("a"), output("b"))).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("rethrows cancellation instead of degrading", async () => {
    const controller = new AbortController();
    controller.abort(new Error("stop requested"));
    const engine = new ArbitrationEngine({
      embed: async (_text, options) => {
        throw options?.signal?.reason;
      }
    });
    await expect(
      engine.arbitrate(output("a"), output("b"), { signal: controller.signal })
    ).rejects.toThrow("stop requested");
  });

  it("is idempotent and returns frozen results", async () => {
    const engine = new ArbitrationEngine(fixedEmbedder({ one: [0.2, 0.9], two: [0.8, 0.1] }));
    const first = await engine.arbitrate(output("one", 0.7), output("two", 0.6));
    const second = await engine.arbitrate(output("one", 0.7), output("two", 0.6));
    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.scores.model_a)).toBe(true);
  });
});

describe("createArbitrationConfig", () => {
  it("fills defaults and freezes", () => {
    const config = createArbitrationConfig({ weights: { coherence: 0.3 } });
    expect(config).toEqual({
      divergenceThreshold: 0.3,
      weights: { semantic: 0.4, safety: 0.4, coherence: 0.3 },
      unknownSafetyConfidence: 0.5
    });
    expect(Object.isFrozen(config.weights)).toBe(true);
  });

  it("rejects out-of-range values", () => {
    expect(() => createArbitrationConfig({ divergenceThreshold: 1.5 })).toThrow(
      "divergenceThreshold must be a number in [0, 1] (got 1.5)"
    );
    expect(() => createArbitrationConfig({ weights: { safety: -0.1 } })).toThrow(
      "weights.safety must be a non-negative number (got -0.1)"
    );
  });
});
