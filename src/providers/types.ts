export type AgentRole = "strategist" | "critic" | "synthesizer" | "verifier";

export const AGENT_ROLES: readonly AgentRole[] = ["strategist", "critic", "synthesizer", "verifier"];

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

/**
 * Either a classifier confidence in [0, 1] (1 = fully safe) or `"unknown"`
 * when the provider supplied none. Unknown is never read as safe.
 */
export type SafetyScore = number | "unknown";

export type GenerationResult = {
  text: string;
  safetyScore?: number;
  /** Set when the backend stopped early (length limit, content filter). */
  truncated?: boolean;
};

export type GenerateOptions = {
  role?: AgentRole;
  signal?: AbortSignal;
};

export interface GenerationProvider {
  generate(messages: readonly ChatMessage[], options?: GenerateOptions): Promise<GenerationResult>;
}

export type EmbedOptions = {
  signal?: AbortSignal;
};

/**
 * Vectors must keep one dimensionality for the provider's lifetime. A
 * provider that cannot embed must throw rather than return a zero vector.
 */
export interface EmbeddingProvider {
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
}

export type AgentOutput = Readonly<{
  role: AgentRole;
  text: string;
  safetyScore: SafetyScore;
  truncated: boolean;
}>;
