import { describe, expect, it } from "vitest";

import {
  ConcordError,
  InvalidInputError,
  OrchestrationCancelledError,
  ProviderUnavailableError,
  describeError,
  isConcordError
} from "../errors.js";

describe("error types", () => {
  it("carries codes and subclass names", () => {
    const invalid = new InvalidInputError("bad", { field: "query" });
    expect(invalid).toBeInstanceOf(ConcordError);
    expect(invalid.name).toBe("InvalidInputError");
    expect(invalid.code).toBe("invalid_input");
    expect(invalid.field).toBe("query");
  });

  it("distinguishes timeouts from other outages", () => {
    const timeout = new ProviderUnavailableError("slow", { provider: "generation", timedOut: true });
    const outage = new ProviderUnavailableError("down", { provider: "embedding", status: 503, retryable: true });
    expect(timeout.code).toBe("provider_timeout");
    expect(timeout.retryable).toBe(false);
    expect(outage.code).toBe("provider_unavailable");
    expect(outage.status).toBe(503);
    expect(outage.retryable).toBe(true);
  });

  it("names the stage on cancellation and keeps the cause", () => {
    const cause = new Error("aborted");
    const cancelled = new OrchestrationCancelledError("critique", { cause });
    expect(cancelled.message).toBe("Orchestration cancelled during critique");
    expect(cancelled.code).toBe("cancelled");
    expect(cancelled.cause).toBe(cause);
  });

  it("narrows and describes unknown errors", () => {
    expect(isConcordError(new InvalidInputError("x"))).toBe(true);
    expect(isConcordError(new Error("x"))).toBe(false);
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("plain")).toBe("plain");
  });
});
