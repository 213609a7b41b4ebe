export type ConcordErrorCode =
  | "invalid_input"
  | "provider_unavailable"
  | "provider_timeout"
  | "cancelled";

export type ProviderKind = "generation" | "embedding";

export class ConcordError extends Error {
  readonly code: ConcordErrorCode;

  constructor(message: string, code: ConcordErrorCode, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidInputError extends ConcordError {
  readonly field?: string;

  constructor(message: string, options: { field?: string; cause?: unknown } = {}) {
    super(message, "invalid_input", { cause: options.cause });
    this.field = options.field;
  }
}

export class ProviderUnavailableError extends ConcordError {
  readonly provider: ProviderKind;
  stage?: string;
  readonly retryable: boolean;
  readonly status?: number;

  constructor(message: string, options: {
    provider: ProviderKind;
    stage?: string;
    timedOut?: boolean;
    retryable?: boolean;
    status?: number;
    cause?: unknown;
  }) {
    super(message, options.timedOut ? "provider_timeout" : "provider_unavailable", {
      cause: options.cause
    });
    this.provider = options.provider;
    this.stage = options.stage;
    this.retryable = options.retryable ?? false;
    this.status = options.status;
  }
}

export class OrchestrationCancelledError extends ConcordError {
  readonly stage: string;

  constructor(stage: string, options?: { cause?: unknown }) {
    super(`Orchestration cancelled during ${stage}`, "cancelled", options);
    this.stage = stage;
  }
}

export const isConcordError = (error: unknown): error is ConcordError =>
  error instanceof ConcordError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
