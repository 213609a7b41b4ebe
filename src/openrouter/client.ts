import { setTimeout as delay } from "node:timers/promises";

import type { ChatMessage } from "../providers/types.js";

export type ChatCompletionParams = {
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
};

export type TokenUsage = {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
};

export type RetryPolicy = {
  maxRetries: number;
  backoffMs: number;
  maxBackoffMs?: number;
  jitter?: "none" | "full";
};

export interface OpenRouterRequestOptions {
  apiKey?: string;
  baseUrl?: string;
  signal?: AbortSignal;
  retry?: RetryPolicy;
}

export interface ChatCompletionResult {
  content: string | null;
  finishReason: string | null;
  model: string | null;
  usage: TokenUsage | null;
  latencyMs: number;
  retryCount: number;
}

export interface EmbeddingResult {
  vector: number[];
  model: string | null;
  latencyMs: number;
  retryCount: number;
}

export class OpenRouterError extends Error {
  status?: number;
  code?: string;
  retryable: boolean;
  aborted: boolean;
  retryCount: number;
  responseBody?: unknown;

  constructor(message: string, options: {
    status?: number;
    code?: string;
    retryable: boolean;
    aborted?: boolean;
    retryCount: number;
    responseBody?: unknown;
  }) {
    super(message);
    this.name = "OpenRouterError";
    this.status = options.status;
    this.code = options.code;
    this.retryable = options.retryable;
    this.aborted = options.aborted ?? false;
    this.retryCount = options.retryCount;
    this.responseBody = options.responseBody;
  }
}

const resolveBaseUrl = (baseUrl?: string): string =>
  (baseUrl ?? process.env.OPENROUTER_BASE_URL ?? "https://openrouter.ai/api/v1").replace(/\/$/, "");

const resolveApiKey = (apiKey?: string): string | undefined =>
  apiKey ?? process.env.OPENROUTER_API_KEY;

const toHeaderRecord = (headers: Headers): Record<string, string> => {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
};

const parseJsonBody = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
};

const asRecord = (value: unknown): Record<string, unknown> | null =>
  value && typeof value === "object" && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : null;

const toNumber = (value: unknown): number | null =>
  typeof value === "number" && Number.isFinite(value) ? value : null;

const extractModelFromBody = (body: unknown): string | null => {
  const model = asRecord(body)?.model;
  return typeof model === "string" ? model : null;
};

const extractUsageFromBody = (body: unknown): TokenUsage | null => {
  const usage = asRecord(asRecord(body)?.usage);
  if (!usage) {
    return null;
  }
  const prompt = toNumber(usage.prompt_tokens);
  const completion = toNumber(usage.completion_tokens);
  const total = toNumber(usage.total_tokens);
  if (prompt === null && completion === null && total === null) {
    return null;
  }
  return {
    prompt_tokens: prompt ?? 0,
    completion_tokens: completion ?? 0,
    total_tokens: total ?? (prompt ?? 0) + (completion ?? 0)
  };
};

export const extractCompletion = (
  body: unknown
): { content: string | null; finishReason: string | null } => {
  const choices = asRecord(body)?.choices;
  const first = Array.isArray(choices) ? asRecord(choices[0]) : null;
  const content = asRecord(first?.message)?.content;
  const finishReason = first?.finish_reason;
  return {
    content: typeof content === "string" ? content : null,
    finishReason: typeof finishReason === "string" ? finishReason : null
  };
};

export const extractEmbeddingVector = (body: unknown): unknown => {
  const data = asRecord(body)?.data;
  return Array.isArray(data) ? asRecord(data[0])?.embedding : undefined;
};

const classifyError = (
  status: number | undefined,
  body: unknown
): { retryable: boolean; code?: string; message?: string } => {
  const error = asRecord(asRecord(body)?.error);
  const code = typeof error?.code === "string" ? error.code : undefined;
  const message = typeof error?.message === "string" ? error.message : undefined;
  return {
    retryable: status === 429 || (status !== undefined && status >= 500),
    code,
    message
  };
};

const parseRetryAfterMs = (headers: Record<string, string>): number | null => {
  const raw = headers["retry-after"];
  if (!raw) {
    return null;
  }
  const numericSeconds = Number(raw);
  if (Number.isFinite(numericSeconds) && numericSeconds >= 0) {
    return Math.round(numericSeconds * 1000);
  }
  const asDate = Date.parse(raw);
  if (Number.isNaN(asDate)) {
    return null;
  }
  return Math.max(0, asDate - Date.now());
};

export const computeBackoffMs = (retry: RetryPolicy, attempt: number): number => {
  if (retry.backoffMs <= 0) {
    return 0;
  }
  const maxBackoffMs = retry.maxBackoffMs ?? 30_000;
  const exponential = retry.backoffMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(maxBackoffMs, exponential);
  if ((retry.jitter ?? "full") === "none") {
    return capped;
  }
  return Math.max(0, Math.round(capped * (0.5 + Math.random())));
};

const isAbortError = (error: unknown): boolean =>
  Boolean(error && typeof error === "object" && "name" in error && error.name === "AbortError");

const postWithRetry = async (
  path: string,
  requestPayload: Record<string, unknown>,
  options: OpenRouterRequestOptions
): Promise<{ responseBody: unknown; latencyMs: number; retryCount: number }> => {
  const apiKey = resolveApiKey(options.apiKey);
  if (!apiKey) {
    throw new OpenRouterError("OPENROUTER_API_KEY is required", {
      retryable: false,
      retryCount: 0
    });
  }
  const baseUrl = resolveBaseUrl(options.baseUrl);
  const retry = options.retry ?? { maxRetries: 0, backoffMs: 0 };
  let attempt = 0;

  const waitBackoff = async (retryAfterMs: number | null = null): Promise<void> => {
    const computed = computeBackoffMs(retry, attempt);
    const effective = retryAfterMs !== null ? Math.max(computed, retryAfterMs) : computed;
    if (effective <= 0) {
      return;
    }
    await delay(effective, undefined, options.signal ? { signal: options.signal } : undefined);
  };

  while (true) {
    const started = Date.now();
    try {
      const response = await fetch(`${baseUrl}${path}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify(requestPayload),
        signal: options.signal
      });
      const latencyMs = Date.now() - started;
      const responseBody = await parseJsonBody(response);

      if (response.ok) {
        return { responseBody, latencyMs, retryCount: attempt };
      }

      const classification = classifyError(response.status, responseBody);
      if (classification.retryable && attempt < retry.maxRetries) {
        attempt += 1;
        await waitBackoff(parseRetryAfterMs(toHeaderRecord(response.headers)));
        continue;
      }

      throw new OpenRouterError(
        classification.message ?? `OpenRouter request failed with status ${response.status}`,
        {
          status: response.status,
          code: classification.code,
          retryable: classification.retryable,
          retryCount: attempt,
          responseBody
        }
      );
    } catch (error) {
      if (error instanceof OpenRouterError) {
        throw error;
      }
      if (isAbortError(error) || options.signal?.aborted) {
        throw new OpenRouterError("OpenRouter request aborted", {
          retryable: false,
          aborted: true,
          retryCount: attempt
        });
      }
      if (attempt < retry.maxRetries) {
        attempt += 1;
        await waitBackoff();
        continue;
      }
      throw new OpenRouterError(
        `OpenRouter request failed: ${error instanceof Error ? error.message : String(error)}`,
        { retryable: true, retryCount: attempt }
      );
    }
  }
};

const cleanParams = (params?: ChatCompletionParams): Record<string, number> => {
  const cleaned: Record<string, number> = {};
  if (!params) {
    return cleaned;
  }
  if (params.temperature !== undefined) cleaned.temperature = params.temperature;
  if (params.top_p !== undefined) cleaned.top_p = params.top_p;
  if (params.max_tokens !== undefined) cleaned.max_tokens = params.max_tokens;
  return cleaned;
};

export const chatCompletion = async (input: {
  model: string;
  messages: readonly ChatMessage[];
  params?: ChatCompletionParams;
  options?: OpenRouterRequestOptions;
}): Promise<ChatCompletionResult> => {
  const requestPayload: Record<string, unknown> = {
    model: input.model,
    messages: input.messages,
    ...cleanParams(input.params)
  };

  const result = await postWithRetry("/chat/completions", requestPayload, input.options ?? {});
  const completion = extractCompletion(result.responseBody);
  return {
    content: completion.content,
    finishReason: completion.finishReason,
    model: extractModelFromBody(result.responseBody),
    usage: extractUsageFromBody(result.responseBody),
    latencyMs: result.latencyMs,
    retryCount: result.retryCount
  };
};

export const embedText = async (input: {
  model: string;
  text: string;
  options?: OpenRouterRequestOptions;
}): Promise<EmbeddingResult> => {
  const requestPayload: Record<string, unknown> = {
    model: input.model,
    input: input.text
  };

  const result = await postWithRetry("/embeddings", requestPayload, input.options ?? {});
  const vector = extractEmbeddingVector(result.responseBody);
  if (
    !Array.isArray(vector) ||
    !vector.every((item): item is number => typeof item === "number" && Number.isFinite(item))
  ) {
    throw new OpenRouterError("OpenRouter embedding response missing or invalid vector", {
      retryable: false,
      retryCount: result.retryCount,
      responseBody: result.responseBody
    });
  }

  return {
    vector,
    model: extractModelFromBody(result.responseBody),
    latencyMs: result.latencyMs,
    retryCount: result.retryCount
  };
};
