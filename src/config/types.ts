export type ScoreWeights = Readonly<{
  semantic: number;
  safety: number;
  coherence: number;
}>;

export type ArbitrationConfig = Readonly<{
  divergenceThreshold: number;
  weights: ScoreWeights;
  /** Safety confidence used for candidates whose safety score is "unknown". */
  unknownSafetyConfidence: number;
}>;

export type OrchestrationConfig = Readonly<{
  confidenceThreshold: number;
  previewChars: number;
}>;

export type GenerationParams = Readonly<{
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
}>;

export type ProvidersConfig = Readonly<{
  baseUrl?: string;
  generation: Readonly<{
    model: string;
    params: GenerationParams;
  }>;
  embedding: Readonly<{
    model: string;
    maxChars: number;
  }>;
  timeouts: Readonly<{
    perCallTimeoutMs: number;
  }>;
  retry: Readonly<{
    maxRetries: number;
    backoffMs: number;
  }>;
}>;

export type ConcordConfig = Readonly<{
  arbitration: ArbitrationConfig;
  orchestration: OrchestrationConfig;
  providers: ProvidersConfig;
}>;

/** On-disk shape of concord.config.json; every field is optional. */
export type ConcordConfigFile = {
  arbitration?: {
    divergence_threshold?: number;
    weights?: {
      semantic?: number;
      safety?: number;
      coherence?: number;
    };
    unknown_safety_confidence?: number;
  };
  orchestration?: {
    confidence_threshold?: number;
    preview_chars?: number;
  };
  providers?: {
    base_url?: string;
    generation?: {
      model?: string;
      params?: {
        temperature?: number;
        top_p?: number;
        max_tokens?: number;
      };
    };
    embedding?: {
      model?: string;
      max_chars?: number;
    };
    timeouts?: {
      per_call_timeout_ms?: number;
    };
    retry?: {
      max_retries?: number;
      backoff_ms?: number;
    };
  };
};
