import type { AgentRole } from "../providers/types.js";
import type { OrchestrationProvenance } from "./provenance.js";

export type OrchestrationResult = Readonly<{
  finalOutput: string;
  finalRole: AgentRole;
  provenance: OrchestrationProvenance;
}>;

export type OrchestrateOptions = {
  /** Winning composite below this triggers the verifier. Defaults to the orchestrator config. */
  confidenceThreshold?: number;
  signal?: AbortSignal;
};

export type OrchestrationConfigOverrides = {
  confidenceThreshold?: number;
  previewChars?: number;
};
