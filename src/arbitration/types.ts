import type { AgentOutput } from "../providers/types.js";

export type CandidateId = "model_a" | "model_b";

export type ArbitrationDecision = "selected_best" | "consensus_refinement_needed";

export type CandidateScore = Readonly<{
  composite: number;
  coherence: number;
  /** Effective safety confidence used in the composite. */
  safety: number;
  safetyStatus: "assessed" | "unknown";
}>;

export type ArbitrationResult = Readonly<{
  selectedOutput: AgentOutput;
  selectedCandidate: CandidateId;
  divergence: number;
  semanticOverlap: number;
  lexicalSimilarity: number;
  scores: Readonly<Record<CandidateId, CandidateScore>>;
  decision: ArbitrationDecision;
  /** True when divergence was forced to 1 because an embedding was unavailable. */
  degraded: boolean;
  degradedReason: string | null;
}>;

export type ArbitrateOptions = {
  /** Precomputed embeddings for (A, B); skips the embedding provider. */
  embeddings?: readonly [readonly number[], readonly number[]];
  signal?: AbortSignal;
};

export interface Arbitrator {
  arbitrate(
    outputA: AgentOutput,
    outputB: AgentOutput,
    options?: ArbitrateOptions
  ): Promise<ArbitrationResult>;
}

export const winningComposite = (result: Pick<ArbitrationResult, "scores">): number =>
  Math.max(result.scores.model_a.composite, result.scores.model_b.composite);
