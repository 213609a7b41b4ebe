export { ArbitrationEngine, createArbitrationConfig } from "./arbitration/engine.js";
export type { ArbitrationConfigOverrides } from "./arbitration/engine.js";
export { countDiscourseConnectives, scoreCoherence, DISCOURSE_CONNECTIVES } from "./arbitration/coherence.js";
export {
  detectConsensus,
  diceBigramSimilarity,
  jaccardWordOverlap,
  lexicalSimilarity,
  DEFAULT_CONSENSUS_THRESHOLD
} from "./arbitration/consensus.js";
export type { ConsensusReport } from "./arbitration/consensus.js";
export { winningComposite } from "./arbitration/types.js";
export type {
  ArbitrateOptions,
  ArbitrationDecision,
  ArbitrationResult,
  Arbitrator,
  CandidateId,
  CandidateScore
} from "./arbitration/types.js";

export { MultiAgentOrchestrator, createOrchestrationConfig } from "./orchestrator/orchestrator.js";
export { buildAgentMessages } from "./orchestrator/messages.js";
export { previewText } from "./orchestrator/provenance.js";
export type { OrchestrationProvenance, StageProvenance } from "./orchestrator/provenance.js";
export { nextStage, STAGE_ROLES } from "./orchestrator/stages.js";
export type { GenerationStage, PipelineStage } from "./orchestrator/stages.js";
export type {
  OrchestrateOptions,
  OrchestrationConfigOverrides,
  OrchestrationResult
} from "./orchestrator/types.js";

export { MockEmbeddingProvider, MockGenerationProvider } from "./providers/mock.js";
export {
  OpenRouterEmbeddingProvider,
  OpenRouterGenerationProvider,
  createOpenRouterProviders
} from "./providers/openrouter.js";
export { assertValidMessages } from "./providers/messages.js";
export { AGENT_ROLES } from "./providers/types.js";
export type {
  AgentOutput,
  AgentRole,
  ChatMessage,
  ChatRole,
  EmbeddingProvider,
  EmbedOptions,
  GenerateOptions,
  GenerationProvider,
  GenerationResult,
  SafetyScore
} from "./providers/types.js";

export { resolveConfig, mergeConfigFile } from "./config/resolve-config.js";
export type { ResolveConfigOptions, ResolveConfigResult } from "./config/resolve-config.js";
export { DEFAULT_CONFIG } from "./config/defaults.js";
export type { ArbitrationConfig, ConcordConfig, OrchestrationConfig, ScoreWeights } from "./config/types.js";

export { EventBus } from "./events/event-bus.js";
export type { Event, EventOf, EventPayload, EventPayloadMap, EventType } from "./events/types.js";
export type { BusListener, EventHandler, ListenerErrorHandler } from "./events/event-bus.js";
export { createCollectingWarningSink, createConsoleWarningSink, createEventWarningSink } from "./utils/warnings.js";
export type { WarningSink } from "./utils/warnings.js";

export {
  ConcordError,
  InvalidInputError,
  OrchestrationCancelledError,
  ProviderUnavailableError,
  isConcordError
} from "./errors.js";
export type { ConcordErrorCode, ProviderKind } from "./errors.js";
