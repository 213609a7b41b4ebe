import type { AgentRole } from "../providers/types.js";

export type PipelineStage = "start" | "strategy" | "critique" | "synthesis" | "arbitrate" | "verify" | "done";

export type GenerationStage = "strategy" | "critique" | "synthesis" | "verify";

export const STAGE_ROLES: Readonly<Record<GenerationStage, AgentRole>> = {
  strategy: "strategist",
  critique: "critic",
  synthesis: "synthesizer",
  verify: "verifier"
};

export const ROLE_INSTRUCTIONS: Readonly<Record<AgentRole, string>> = {
  strategist: "You are a strategic planner. Break down the problem and outline an approach.",
  critic: "You are a critical evaluator. Identify flaws, edge cases, and risks.",
  synthesizer: "You are a synthesizer. Merge strategy and critique into a coherent solution.",
  verifier: "You are a verifier. Validate correctness, safety, and consistency."
};

// Closing user turn for stages that see earlier agent output.
export const ROLE_FOLLOW_UPS: Readonly<Record<AgentRole, string>> = {
  strategist: "Please outline your approach.",
  critic: "Please provide your critique.",
  synthesizer: "Please provide your combined solution.",
  verifier: "Please verify the selected answer and give the corrected final answer."
};

export const isGenerationStage = (stage: PipelineStage): stage is GenerationStage =>
  stage === "strategy" || stage === "critique" || stage === "synthesis" || stage === "verify";

/**
 * Transition function of the pipeline. The only branch is after arbitration:
 * verification runs when the winning composite falls below the threshold.
 */
export const nextStage = (
  stage: PipelineStage,
  context: { needsVerification?: boolean } = {}
): PipelineStage => {
  switch (stage) {
    case "start":
      return "strategy";
    case "strategy":
      return "critique";
    case "critique":
      return "synthesis";
    case "synthesis":
      return "arbitrate";
    case "arbitrate":
      return context.needsVerification ? "verify" : "done";
    case "verify":
    case "done":
      return "done";
  }
};
