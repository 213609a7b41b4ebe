import { ProviderUnavailableError } from "../errors.js";
import type {
  AgentRole,
  ChatMessage,
  EmbedOptions,
  EmbeddingProvider,
  GenerateOptions,
  GenerationProvider,
  GenerationResult
} from "./types.js";

const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (signal?.aborted) {
    throw signal.reason ?? new Error("aborted");
  }
};

const firstUserTurn = (messages: readonly ChatMessage[]): string =>
  messages.find((message) => message.role === "user")?.content ?? "";

const MOCK_TEMPLATES: Record<AgentRole, (query: string) => string> = {
  strategist: (query) =>
    `Approach for "${query}": start from the hard constraints, because they bound every later choice. ` +
    "Split the work into an interface, a core, and an integration layer; therefore each part can be tested alone.",
  critic: (query) =>
    `Risks in the plan for "${query}": the integration layer hides failure modes. ` +
    "However, the larger gap is load behaviour; specifically, nothing bounds concurrent work.",
  synthesizer: (query) =>
    `Combined plan for "${query}": keep the three layers and add explicit limits on concurrent work, ` +
    "because the critique showed load is the main risk; specifically, fan-out must be capped. " +
    "Therefore each layer gets its own budget and tests.",
  verifier: (query) =>
    `Verification for "${query}": the combined plan is consistent with the constraints and the critique. ` +
    "The remaining risk is operational, thus it belongs in monitoring rather than design."
};

/**
 * Offline generation backend. Output depends only on the role and the user
 * query, so repeated runs are reproducible.
 */
export class MockGenerationProvider implements GenerationProvider {
  private readonly safetyScore?: number;

  constructor(options: { safetyScore?: number } = {}) {
    this.safetyScore = options.safetyScore;
  }

  async generate(messages: readonly ChatMessage[], options: GenerateOptions = {}): Promise<GenerationResult> {
    throwIfAborted(options.signal);
    const role = options.role ?? "strategist";
    const text = MOCK_TEMPLATES[role](firstUserTurn(messages).trim());
    return this.safetyScore === undefined ? { text } : { text, safetyScore: this.safetyScore };
  }
}

// 32-bit FNV-1a.
const hashKey = (key: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i += 1) {
    hash = Math.imul(hash ^ key.charCodeAt(i), 0x01000193);
  }
  return hash >>> 0;
};

/** Fixed pseudo-random direction in [-1, 1) per dimension, drawn with xorshift32. */
const tokenDirection = (key: string, dimensions: number): number[] => {
  let state = hashKey(key) || 0x9e3779b9;
  const direction = new Array<number>(dimensions);
  for (let i = 0; i < dimensions; i += 1) {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    direction[i] = (state / 0x100000000) * 2 - 1;
  }
  return direction;
};

const tokenize = (text: string): string[] =>
  text.toLowerCase().split(/[^a-z0-9]+/).filter((token) => token.length > 0);

/**
 * Hashed bag-of-words embedding: every token maps to a seeded pseudo-random
 * direction and a text is the sum of its token directions. Texts that share
 * vocabulary land close together.
 */
export class MockEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  private readonly seed: string;

  constructor(options: { dimensions?: number; seed?: string } = {}) {
    this.dimensions = options.dimensions ?? 64;
    this.seed = options.seed ?? "concord";
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    throwIfAborted(options.signal);
    const tokens = tokenize(text);
    if (tokens.length === 0) {
      throw new ProviderUnavailableError("Cannot embed text without tokens", { provider: "embedding" });
    }

    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokens) {
      tokenDirection(`${this.seed}:${token}`, this.dimensions).forEach((component, i) => {
        vector[i] += component;
      });
    }
    return vector;
  }
}
