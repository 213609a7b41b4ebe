import { clampUnit, cosineSimilarity, isFiniteVector, NORM_EPSILON, vectorNorm } from "../core/vector-math.js";
import { InvalidInputError, describeError } from "../errors.js";
import { DEFAULT_ARBITRATION_CONFIG } from "../config/defaults.js";
import type { ArbitrationConfig, ScoreWeights } from "../config/types.js";
import type { AgentOutput, EmbeddingProvider, SafetyScore } from "../providers/types.js";
import { scoreCoherence } from "./coherence.js";
import { lexicalSimilarity } from "./consensus.js";
import type {
  ArbitrateOptions,
  ArbitrationDecision,
  ArbitrationResult,
  Arbitrator,
  CandidateId,
  CandidateScore
} from "./types.js";

export type ArbitrationConfigOverrides = {
  divergenceThreshold?: number;
  weights?: Partial<ScoreWeights>;
  unknownSafetyConfidence?: number;
};

const assertUnitInterval = (value: number, field: string): void => {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidInputError(`${field} must be a number in [0, 1] (got ${value})`, { field });
  }
};

const assertNonNegative = (value: number, field: string): void => {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(`${field} must be a non-negative number (got ${value})`, { field });
  }
};

export const createArbitrationConfig = (
  overrides: ArbitrationConfigOverrides = {},
  base: ArbitrationConfig = DEFAULT_ARBITRATION_CONFIG
): ArbitrationConfig => {
  const weights: ScoreWeights = Object.freeze({
    semantic: overrides.weights?.semantic ?? base.weights.semantic,
    safety: overrides.weights?.safety ?? base.weights.safety,
    coherence: overrides.weights?.coherence ?? base.weights.coherence
  });
  const config: ArbitrationConfig = Object.freeze({
    divergenceThreshold: overrides.divergenceThreshold ?? base.divergenceThreshold,
    weights,
    unknownSafetyConfidence: overrides.unknownSafetyConfidence ?? base.unknownSafetyConfidence
  });

  assertUnitInterval(config.divergenceThreshold, "divergenceThreshold");
  assertUnitInterval(config.unknownSafetyConfidence, "unknownSafetyConfidence");
  assertNonNegative(weights.semantic, "weights.semantic");
  assertNonNegative(weights.safety, "weights.safety");
  assertNonNegative(weights.coherence, "weights.coherence");
  return config;
};

type EmbeddingOutcome =
  | { status: "ok"; vectors: readonly [readonly number[], readonly number[]] }
  | { status: "unavailable"; reason: string };

const CANDIDATES: readonly CandidateId[] = ["model_a", "model_b"];

/**
 * Scores two candidate outputs and picks the authoritative one.
 *
 * Divergence comes from the cosine distance of the two embeddings. When an
 * embedding cannot be obtained the engine does not guess: divergence is forced
 * to 1, which always requests consensus refinement, and the result is marked
 * `degraded` so callers can tell it apart from genuine disagreement.
 */
export class ArbitrationEngine implements Arbitrator {
  readonly config: ArbitrationConfig;
  private readonly embedder: EmbeddingProvider;

  constructor(embedder: EmbeddingProvider, config: ArbitrationConfigOverrides = {}) {
    this.embedder = embedder;
    this.config = createArbitrationConfig(config);
  }

  computeDivergence(embeddingA: readonly number[], embeddingB: readonly number[]): number {
    if (!isFiniteVector(embeddingA) || !isFiniteVector(embeddingB)) {
      throw new InvalidInputError("Embeddings must contain only finite numbers", {
        field: "embedding"
      });
    }
    if (embeddingA.length !== embeddingB.length) {
      throw new InvalidInputError(
        `Embedding dimensions differ (${embeddingA.length} vs ${embeddingB.length})`,
        { field: "embedding" }
      );
    }
    return clampUnit(1 - cosineSimilarity(embeddingA, embeddingB));
  }

  scoreCoherence(text: string): number {
    return scoreCoherence(text);
  }

  computeCompositeScore(semanticOverlap: number, safetyConfidence: number, coherence: number): number {
    const { weights } = this.config;
    return (
      weights.semantic * semanticOverlap +
      weights.safety * safetyConfidence +
      weights.coherence * coherence
    );
  }

  async arbitrate(
    outputA: AgentOutput,
    outputB: AgentOutput,
    options: ArbitrateOptions = {}
  ): Promise<ArbitrationResult> {
    const outcome = await this.resolveEmbeddings(outputA.text, outputB.text, options);

    let divergence = 1;
    let degradedReason: string | null = null;
    if (outcome.status === "unavailable") {
      degradedReason = outcome.reason;
    } else {
      const [vectorA, vectorB] = outcome.vectors;
      divergence = this.computeDivergence(vectorA, vectorB);
      const zeroNorm = CANDIDATES.filter(
        (_, index) => vectorNorm(index === 0 ? vectorA : vectorB) <= NORM_EPSILON
      );
      if (zeroNorm.length > 0) {
        degradedReason = `zero-norm embedding for ${zeroNorm.join(", ")}`;
      }
    }

    const semanticOverlap = 1 - divergence;
    const scoreA = this.scoreCandidate(outputA, semanticOverlap);
    const scoreB = this.scoreCandidate(outputB, semanticOverlap);

    // Ties go to candidate A.
    const selectedCandidate: CandidateId = scoreA.composite >= scoreB.composite ? "model_a" : "model_b";
    const decision: ArbitrationDecision =
      divergence > this.config.divergenceThreshold ? "consensus_refinement_needed" : "selected_best";

    return Object.freeze({
      selectedOutput: selectedCandidate === "model_a" ? outputA : outputB,
      selectedCandidate,
      divergence,
      semanticOverlap,
      lexicalSimilarity: lexicalSimilarity(outputA.text, outputB.text),
      scores: Object.freeze({ model_a: scoreA, model_b: scoreB }),
      decision,
      degraded: degradedReason !== null,
      degradedReason
    });
  }

  private effectiveSafety(safetyScore: SafetyScore): number {
    return safetyScore === "unknown" ? this.config.unknownSafetyConfidence : clampUnit(safetyScore);
  }

  private scoreCandidate(output: AgentOutput, semanticOverlap: number): CandidateScore {
    const coherence = this.scoreCoherence(output.text);
    const safety = this.effectiveSafety(output.safetyScore);
    return Object.freeze({
      composite: this.computeCompositeScore(semanticOverlap, safety, coherence),
      coherence,
      safety,
      safetyStatus: output.safetyScore === "unknown" ? "unknown" : "assessed"
    });
  }

  private async resolveEmbeddings(
    textA: string,
    textB: string,
    options: ArbitrateOptions
  ): Promise<EmbeddingOutcome> {
    if (options.embeddings) {
      return { status: "ok", vectors: options.embeddings };
    }

    const embedOptions = options.signal ? { signal: options.signal } : undefined;
    const [resultA, resultB] = await Promise.allSettled([
      this.embedder.embed(textA, embedOptions),
      this.embedder.embed(textB, embedOptions)
    ]);

    if (resultA.status === "fulfilled" && resultB.status === "fulfilled") {
      return { status: "ok", vectors: [resultA.value, resultB.value] };
    }

    const failures: string[] = [];
    const settled = [resultA, resultB];
    for (let index = 0; index < settled.length; index += 1) {
      const result = settled[index];
      if (result.status !== "rejected") {
        continue;
      }
      if (options.signal?.aborted) {
        throw result.reason;
      }
      failures.push(`${CANDIDATES[index]}: ${describeError(result.reason)}`);
    }

    return { status: "unavailable", reason: `embedding unavailable (${failures.join("; ")})` };
  }
}
