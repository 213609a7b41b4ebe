import type { ArbitrationResult, Arbitrator } from "../arbitration/types.js";
import { winningComposite } from "../arbitration/types.js";
import { DEFAULT_ORCHESTRATION_CONFIG, MAX_PREVIEW_CHARS } from "../config/defaults.js";
import type { OrchestrationConfig } from "../config/types.js";
import {
  ConcordError,
  InvalidInputError,
  OrchestrationCancelledError,
  ProviderUnavailableError,
  describeError,
  type ProviderKind
} from "../errors.js";
import type { EventBus } from "../events/event-bus.js";
import type { Event } from "../events/types.js";
import type {
  AgentOutput,
  AgentRole,
  ChatMessage,
  GenerationProvider,
  GenerationResult,
  SafetyScore
} from "../providers/types.js";
import { generateOrchestrationId } from "../utils/orchestration-id.js";
import { createConsoleWarningSink, createEventWarningSink, type WarningSink } from "../utils/warnings.js";
import { buildAgentMessages } from "./messages.js";
import { buildProvenance, buildStageProvenance, type StageProvenance } from "./provenance.js";
import {
  isGenerationStage,
  nextStage,
  STAGE_ROLES,
  type GenerationStage,
  type PipelineStage
} from "./stages.js";
import type {
  OrchestrateOptions,
  OrchestrationConfigOverrides,
  OrchestrationResult
} from "./types.js";

const WARNING_SOURCE = "orchestrator";

type PipelineState = {
  stage: PipelineStage;
  history: ChatMessage[];
  outputs: Partial<Record<GenerationStage, AgentOutput>>;
  stages: StageProvenance[];
  arbitration: ArbitrationResult | null;
};

const assertThreshold = (value: number): void => {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidInputError(`confidenceThreshold must be a number in [0, 1] (got ${value})`, {
      field: "confidenceThreshold"
    });
  }
};

export const createOrchestrationConfig = (
  overrides: OrchestrationConfigOverrides = {},
  base: OrchestrationConfig = DEFAULT_ORCHESTRATION_CONFIG
): OrchestrationConfig => {
  const config: OrchestrationConfig = Object.freeze({
    confidenceThreshold: overrides.confidenceThreshold ?? base.confidenceThreshold,
    previewChars: overrides.previewChars ?? base.previewChars
  });
  assertThreshold(config.confidenceThreshold);
  if (
    !Number.isInteger(config.previewChars) ||
    config.previewChars < 1 ||
    config.previewChars > MAX_PREVIEW_CHARS
  ) {
    throw new InvalidInputError(
      `previewChars must be an integer in [1, ${MAX_PREVIEW_CHARS}] (got ${config.previewChars})`,
      { field: "previewChars" }
    );
  }
  return config;
};

const isUnitScore = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value) && value >= 0 && value <= 1;

/**
 * Runs Strategist → Critic → Synthesizer, arbitrates Strategist against
 * Synthesizer and, when the winning composite is below the confidence
 * threshold, asks the Verifier for the final answer.
 *
 * Every call keeps its own history; one instance can serve concurrent
 * orchestrations as long as the providers allow it.
 */
export class MultiAgentOrchestrator {
  readonly config: OrchestrationConfig;
  private readonly generator: GenerationProvider;
  private readonly arbitrator: Arbitrator;
  private readonly bus?: EventBus;
  private readonly warnings: WarningSink;
  private readonly createId: () => string;

  constructor(input: {
    generator: GenerationProvider;
    arbitrator: Arbitrator;
    config?: OrchestrationConfigOverrides;
    bus?: EventBus;
    warnings?: WarningSink;
    createId?: () => string;
  }) {
    this.generator = input.generator;
    this.arbitrator = input.arbitrator;
    this.config = createOrchestrationConfig(input.config);
    this.bus = input.bus;
    this.warnings =
      input.warnings ?? (input.bus ? createEventWarningSink(input.bus) : createConsoleWarningSink());
    this.createId = input.createId ?? (() => generateOrchestrationId());
  }

  async orchestrate(query: string, options: OrchestrateOptions = {}): Promise<OrchestrationResult> {
    const confidenceThreshold = options.confidenceThreshold ?? this.config.confidenceThreshold;
    if (typeof query !== "string" || query.trim().length === 0) {
      throw new InvalidInputError("query must be a non-empty string", { field: "query" });
    }
    assertThreshold(confidenceThreshold);

    const { signal } = options;
    const orchestrationId = this.createId();
    const state: PipelineState = {
      stage: "start",
      history: [],
      outputs: {},
      stages: [],
      arbitration: null
    };

    this.emit({
      type: "orchestration.started",
      payload: {
        orchestration_id: orchestrationId,
        started_at: new Date().toISOString(),
        query_chars: query.length,
        confidence_threshold: confidenceThreshold
      }
    });

    try {
      for (;;) {
        const needsVerification =
          state.arbitration !== null && winningComposite(state.arbitration) < confidenceThreshold;
        state.stage = nextStage(state.stage, { needsVerification });
        if (state.stage === "done") {
          break;
        }
        throwIfCancelled(signal, state.stage);
        await this.runStage(state, orchestrationId, query, confidenceThreshold, signal);
      }
      // A provider that ignores the signal must not turn a cancelled call into a result.
      throwIfCancelled(signal, "done");
    } catch (error) {
      this.emit({
        type: "orchestration.failed",
        payload: {
          orchestration_id: orchestrationId,
          completed_at: new Date().toISOString(),
          stage: state.stage,
          error: describeError(error),
          error_code: error instanceof ConcordError ? error.code : undefined
        }
      });
      throw error;
    }

    const arbitration = requireArbitration(state);
    const verified = state.outputs.verify;
    const final = verified ?? arbitration.selectedOutput;

    this.emit({
      type: "orchestration.completed",
      payload: {
        orchestration_id: orchestrationId,
        completed_at: new Date().toISOString(),
        final_role: final.role,
        stages_run: state.stages.length
      }
    });

    return Object.freeze({
      finalOutput: final.text,
      finalRole: final.role,
      provenance: buildProvenance({
        orchestrationId,
        stages: state.stages,
        arbitration,
        verificationTriggered: verified !== undefined,
        confidenceThreshold
      })
    });
  }

  private async runStage(
    state: PipelineState,
    orchestrationId: string,
    query: string,
    confidenceThreshold: number,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const { stage } = state;
    const role = isGenerationStage(stage) ? STAGE_ROLES[stage] : null;
    const startedAt = Date.now();
    this.emit({
      type: "stage.started",
      payload: { orchestration_id: orchestrationId, stage, role }
    });

    let outputChars: number | undefined;
    if (isGenerationStage(stage)) {
      if (stage === "verify") {
        const arbitration = requireArbitration(state);
        state.history.push({ role: "assistant", content: arbitration.selectedOutput.text });
        this.emit({
          type: "verification.triggered",
          payload: {
            orchestration_id: orchestrationId,
            composite_score: winningComposite(arbitration),
            confidence_threshold: confidenceThreshold
          }
        });
      }
      const output = await this.runAgent(stage, query, state.history, signal);
      state.outputs[stage] = output;
      state.stages.push(buildStageProvenance(stage, output, this.config.previewChars));
      if (stage === "strategy" || stage === "critique") {
        state.history.push({ role: "assistant", content: output.text });
      }
      outputChars = output.text.length;
    } else if (stage === "arbitrate") {
      state.arbitration = await this.runArbitration(state, orchestrationId, signal);
    }

    this.emit({
      type: "stage.completed",
      payload: {
        orchestration_id: orchestrationId,
        stage,
        role,
        elapsed_ms: Date.now() - startedAt,
        ...(outputChars !== undefined ? { output_chars: outputChars } : {})
      }
    });
  }

  private async runAgent(
    stage: GenerationStage,
    query: string,
    history: readonly ChatMessage[],
    signal: AbortSignal | undefined
  ): Promise<AgentOutput> {
    const role = STAGE_ROLES[stage];
    const messages = buildAgentMessages({ role, query, history });
    const result = await callProvider("generation", stage, signal, () =>
      this.generator.generate(messages, signal ? { role, signal } : { role })
    );
    return this.toAgentOutput(stage, role, result);
  }

  private toAgentOutput(stage: GenerationStage, role: AgentRole, result: GenerationResult): AgentOutput {
    if (typeof result.text !== "string") {
      throw new ProviderUnavailableError(`Generation provider returned no text for ${role}`, {
        provider: "generation",
        stage
      });
    }

    let safetyScore: SafetyScore = "unknown";
    if (isUnitScore(result.safetyScore)) {
      safetyScore = result.safetyScore;
    } else if (result.safetyScore !== undefined) {
      this.warnings.warn(
        `Ignoring out-of-range safety score for ${role}: ${String(result.safetyScore)}`,
        WARNING_SOURCE
      );
    }

    const truncated = result.truncated === true;
    if (truncated) {
      this.warnings.warn(`Output for ${role} was truncated by the provider`, WARNING_SOURCE);
    }

    return Object.freeze({ role, text: result.text, safetyScore, truncated });
  }

  private async runArbitration(
    state: PipelineState,
    orchestrationId: string,
    signal: AbortSignal | undefined
  ): Promise<ArbitrationResult> {
    const { strategy, synthesis } = state.outputs;
    if (!strategy || !synthesis) {
      throw new Error("Arbitration requires strategy and synthesis outputs");
    }
    const result = await callProvider("embedding", "arbitrate", signal, () =>
      this.arbitrator.arbitrate(strategy, synthesis, signal ? { signal } : {})
    );
    if (result.degraded) {
      this.warnings.warn(
        `Arbitration degraded: ${result.degradedReason ?? "embedding unavailable"}`,
        WARNING_SOURCE
      );
    }
    this.emit({
      type: "arbitration.completed",
      payload: {
        orchestration_id: orchestrationId,
        decision: result.decision,
        divergence: result.divergence,
        composite_score: winningComposite(result),
        selected_candidate: result.selectedCandidate,
        degraded: result.degraded
      }
    });
    return result;
  }

  private emit(event: Event): void {
    this.bus?.emit(event);
  }
}

const throwIfCancelled = (signal: AbortSignal | undefined, stage: PipelineStage): void => {
  if (signal?.aborted) {
    throw new OrchestrationCancelledError(stage, { cause: signal.reason });
  }
};

const requireArbitration = (state: PipelineState): ArbitrationResult => {
  if (!state.arbitration) {
    throw new Error(`Stage ${state.stage} reached before arbitration`);
  }
  return state.arbitration;
};

/**
 * Runs one provider call. Whatever it throws comes back typed and tagged with
 * the stage; errors raised outside provider calls never pass through here.
 */
const callProvider = async <T>(
  provider: ProviderKind,
  stage: PipelineStage,
  signal: AbortSignal | undefined,
  call: () => Promise<T>
): Promise<T> => {
  try {
    return await call();
  } catch (error) {
    if (error instanceof OrchestrationCancelledError) {
      throw error;
    }
    if (signal?.aborted) {
      throw new OrchestrationCancelledError(stage, { cause: error });
    }
    if (error instanceof ProviderUnavailableError) {
      if (error.stage === undefined) {
        error.stage = stage;
      }
      throw error;
    }
    if (error instanceof ConcordError) {
      throw error;
    }
    throw new ProviderUnavailableError(
      `${provider} provider failed during ${stage}: ${describeError(error)}`,
      { provider, stage, cause: error }
    );
  }
};
