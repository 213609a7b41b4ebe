import type { ArbitrationDecision, ArbitrationResult, CandidateId } from "../arbitration/types.js";
import { winningComposite } from "../arbitration/types.js";
import { MAX_PREVIEW_CHARS } from "../config/defaults.js";
import type { AgentOutput, AgentRole, SafetyScore } from "../providers/types.js";
import type { GenerationStage } from "./stages.js";

export type StageProvenance = {
  stage: GenerationStage;
  role: AgentRole;
  preview: string;
  chars: number;
  truncated: boolean;
  safety: SafetyScore;
};

export type OrchestrationProvenance = {
  orchestration_id: string;
  stages: StageProvenance[];
  arbitration_decision: ArbitrationDecision;
  divergence: number;
  composite_score: number;
  selected_candidate: CandidateId;
  selected_role: AgentRole;
  lexical_similarity: number;
  arbitration_degraded: boolean;
  degraded_reason: string | null;
  verification_triggered: boolean;
  confidence_threshold: number;
};

export const previewText = (text: string, maxChars: number = MAX_PREVIEW_CHARS): string => {
  const limit = Math.max(1, Math.min(MAX_PREVIEW_CHARS, Math.floor(maxChars)));
  if (text.length <= limit) {
    return text;
  }
  let end = limit - 1;
  // Never split a surrogate pair.
  const last = text.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) {
    end -= 1;
  }
  return `${text.slice(0, end)}…`;
};

export const buildStageProvenance = (
  stage: GenerationStage,
  output: AgentOutput,
  previewChars: number
): StageProvenance => ({
  stage,
  role: output.role,
  preview: previewText(output.text, previewChars),
  chars: output.text.length,
  truncated: output.truncated,
  safety: output.safetyScore
});

export const buildProvenance = (input: {
  orchestrationId: string;
  stages: StageProvenance[];
  arbitration: ArbitrationResult;
  verificationTriggered: boolean;
  confidenceThreshold: number;
}): OrchestrationProvenance => ({
  orchestration_id: input.orchestrationId,
  stages: input.stages,
  arbitration_decision: input.arbitration.decision,
  divergence: input.arbitration.divergence,
  composite_score: winningComposite(input.arbitration),
  selected_candidate: input.arbitration.selectedCandidate,
  selected_role: input.arbitration.selectedOutput.role,
  lexical_similarity: input.arbitration.lexicalSimilarity,
  arbitration_degraded: input.arbitration.degraded,
  degraded_reason: input.arbitration.degradedReason,
  verification_triggered: input.verificationTriggered,
  confidence_threshold: input.confidenceThreshold
});
