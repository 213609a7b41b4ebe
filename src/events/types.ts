import type { ArbitrationDecision, CandidateId } from "../arbitration/types.js";
import type { AgentRole } from "../providers/types.js";
import type { PipelineStage } from "../orchestrator/stages.js";

export type OrchestrationStartedPayload = {
  orchestration_id: string;
  started_at: string;
  query_chars: number;
  confidence_threshold: number;
};

export type StageStartedPayload = {
  orchestration_id: string;
  stage: PipelineStage;
  role: AgentRole | null;
};

export type StageCompletedPayload = {
  orchestration_id: string;
  stage: PipelineStage;
  role: AgentRole | null;
  elapsed_ms: number;
  output_chars?: number;
};

export type ArbitrationCompletedPayload = {
  orchestration_id: string;
  decision: ArbitrationDecision;
  divergence: number;
  composite_score: number;
  selected_candidate: CandidateId;
  degraded: boolean;
};

export type VerificationTriggeredPayload = {
  orchestration_id: string;
  composite_score: number;
  confidence_threshold: number;
};

export type OrchestrationCompletedPayload = {
  orchestration_id: string;
  completed_at: string;
  final_role: AgentRole;
  stages_run: number;
};

export type OrchestrationFailedPayload = {
  orchestration_id: string;
  completed_at: string;
  stage: PipelineStage;
  error: string;
  error_code?: string;
};

export type WarningRaisedPayload = {
  message: string;
  source?: string;
  recorded_at: string;
};

export type Event =
  | { type: "orchestration.started"; payload: OrchestrationStartedPayload }
  | { type: "stage.started"; payload: StageStartedPayload }
  | { type: "stage.completed"; payload: StageCompletedPayload }
  | { type: "arbitration.completed"; payload: ArbitrationCompletedPayload }
  | { type: "verification.triggered"; payload: VerificationTriggeredPayload }
  | { type: "orchestration.completed"; payload: OrchestrationCompletedPayload }
  | { type: "orchestration.failed"; payload: OrchestrationFailedPayload }
  | { type: "warning.raised"; payload: WarningRaisedPayload };

export type EventType = Event["type"];

export type EventOf<T extends EventType> = Extract<Event, { type: T }>;

export type EventPayload<T extends EventType> = EventOf<T>["payload"];

export type EventPayloadMap = {
  [K in EventType]: EventPayload<K>;
};
