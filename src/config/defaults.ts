import type {
  ArbitrationConfig,
  ConcordConfig,
  OrchestrationConfig,
  ProvidersConfig
} from "./types.js";

export const MAX_PREVIEW_CHARS = 200;

export const DEFAULT_ARBITRATION_CONFIG: ArbitrationConfig = Object.freeze({
  divergenceThreshold: 0.3,
  weights: Object.freeze({ semantic: 0.4, safety: 0.4, coherence: 0.2 }),
  unknownSafetyConfidence: 0.5
});

export const DEFAULT_ORCHESTRATION_CONFIG: OrchestrationConfig = Object.freeze({
  confidenceThreshold: 0.7,
  previewChars: MAX_PREVIEW_CHARS
});

export const DEFAULT_PROVIDERS_CONFIG: ProvidersConfig = Object.freeze({
  generation: Object.freeze({
    model: "openai/gpt-4o-mini",
    params: Object.freeze({ temperature: 0.7, max_tokens: 1024 })
  }),
  embedding: Object.freeze({
    model: "openai/text-embedding-3-small",
    maxChars: 8000
  }),
  timeouts: Object.freeze({ perCallTimeoutMs: 60_000 }),
  retry: Object.freeze({ maxRetries: 0, backoffMs: 500 })
});

export const DEFAULT_CONFIG: ConcordConfig = Object.freeze({
  arbitration: DEFAULT_ARBITRATION_CONFIG,
  orchestration: DEFAULT_ORCHESTRATION_CONFIG,
  providers: DEFAULT_PROVIDERS_CONFIG
});
