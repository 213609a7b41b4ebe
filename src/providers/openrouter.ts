import {
  chatCompletion,
  embedText,
  OpenRouterError,
  type ChatCompletionParams,
  type RetryPolicy
} from "../openrouter/client.js";
import { ProviderUnavailableError, type ProviderKind } from "../errors.js";
import { vectorNorm, NORM_EPSILON } from "../core/vector-math.js";
import type { ProvidersConfig } from "../config/types.js";
import { createConsoleWarningSink, type WarningSink } from "../utils/warnings.js";
import { assertValidMessages } from "./messages.js";
import { prepareEmbedText } from "./embed-text.js";
import { createTimeoutSignal } from "./timeout.js";
import type {
  ChatMessage,
  EmbedOptions,
  EmbeddingProvider,
  GenerateOptions,
  GenerationProvider,
  GenerationResult
} from "./types.js";

// Finish reasons that mean the backend cut the completion short.
const TRUNCATING_FINISH_REASONS = new Set(["length", "content_filter"]);

export type OpenRouterProviderOptions = {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs: number;
  retry: RetryPolicy;
};

const toProviderError = (
  provider: ProviderKind,
  error: unknown,
  timedOut: boolean
): ProviderUnavailableError => {
  if (timedOut) {
    return new ProviderUnavailableError(`${provider} provider timed out`, {
      provider,
      timedOut: true,
      retryable: true,
      cause: error
    });
  }
  if (error instanceof OpenRouterError) {
    return new ProviderUnavailableError(error.message, {
      provider,
      retryable: error.retryable,
      status: error.status,
      cause: error
    });
  }
  return new ProviderUnavailableError(
    `${provider} provider failed: ${error instanceof Error ? error.message : String(error)}`,
    { provider, cause: error }
  );
};

/**
 * Runs one bounded provider call. Caller cancellation is rethrown untouched so
 * the orchestrator can report it as a cancellation rather than an outage.
 */
const withCallTimeout = async <T>(
  provider: ProviderKind,
  timeoutMs: number,
  parentSignal: AbortSignal | undefined,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> => {
  const timeout = createTimeoutSignal(timeoutMs, parentSignal);
  try {
    return await call(timeout.signal);
  } catch (error) {
    if (parentSignal?.aborted) {
      throw parentSignal.reason ?? error;
    }
    if (error instanceof ProviderUnavailableError) {
      throw error;
    }
    throw toProviderError(provider, error, timeout.didTimeout());
  } finally {
    timeout.cancel();
  }
};

export class OpenRouterGenerationProvider implements GenerationProvider {
  private readonly model: string;
  private readonly params: ChatCompletionParams;
  private readonly options: OpenRouterProviderOptions;

  constructor(input: { model: string; params?: ChatCompletionParams; options: OpenRouterProviderOptions }) {
    this.model = input.model;
    this.params = { ...input.params };
    this.options = input.options;
  }

  async generate(messages: readonly ChatMessage[], options: GenerateOptions = {}): Promise<GenerationResult> {
    const validated = assertValidMessages(messages);
    return withCallTimeout("generation", this.options.timeoutMs, options.signal, async (signal) => {
      const result = await chatCompletion({
        model: this.model,
        messages: validated,
        params: this.params,
        options: {
          apiKey: this.options.apiKey,
          baseUrl: this.options.baseUrl,
          retry: this.options.retry,
          signal
        }
      });
      if (result.content === null) {
        throw new ProviderUnavailableError("Generation response contained no assistant content", {
          provider: "generation"
        });
      }
      return {
        text: result.content,
        truncated: result.finishReason !== null && TRUNCATING_FINISH_REASONS.has(result.finishReason)
      };
    });
  }
}

export class OpenRouterEmbeddingProvider implements EmbeddingProvider {
  private readonly model: string;
  private readonly maxChars: number;
  private readonly options: OpenRouterProviderOptions;
  private readonly warnings: WarningSink;

  constructor(input: {
    model: string;
    maxChars: number;
    options: OpenRouterProviderOptions;
    warnings?: WarningSink;
  }) {
    this.model = input.model;
    this.maxChars = input.maxChars;
    this.options = input.options;
    this.warnings = input.warnings ?? createConsoleWarningSink();
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const prepared = prepareEmbedText(text, this.maxChars);
    if (prepared.was_empty) {
      throw new ProviderUnavailableError("Cannot embed empty text", { provider: "embedding" });
    }
    if (prepared.truncated) {
      this.warnings.warn(
        `Embedding input truncated from ${prepared.original_chars} to ${prepared.final_chars} chars`,
        "embedding"
      );
    }

    const vector = await withCallTimeout("embedding", this.options.timeoutMs, options.signal, async (signal) => {
      const result = await embedText({
        model: this.model,
        text: prepared.text,
        options: {
          apiKey: this.options.apiKey,
          baseUrl: this.options.baseUrl,
          retry: this.options.retry,
          signal
        }
      });
      return result.vector;
    });

    if (vectorNorm(vector) <= NORM_EPSILON) {
      throw new ProviderUnavailableError("Embedding backend returned a zero vector", {
        provider: "embedding"
      });
    }
    return vector;
  }
}

export const createOpenRouterProviders = (
  config: ProvidersConfig,
  env: NodeJS.ProcessEnv = process.env,
  warnings?: WarningSink
): { generator: OpenRouterGenerationProvider; embedder: OpenRouterEmbeddingProvider } => {
  const options: OpenRouterProviderOptions = {
    apiKey: env.OPENROUTER_API_KEY,
    baseUrl: config.baseUrl ?? env.OPENROUTER_BASE_URL,
    timeoutMs: config.timeouts.perCallTimeoutMs,
    retry: {
      maxRetries: config.retry.maxRetries,
      backoffMs: config.retry.backoffMs
    }
  };
  return {
    generator: new OpenRouterGenerationProvider({
      model: config.generation.model,
      params: config.generation.params,
      options
    }),
    embedder: new OpenRouterEmbeddingProvider({
      model: config.embedding.model,
      maxChars: config.embedding.maxChars,
      options,
      warnings
    })
  };
};
