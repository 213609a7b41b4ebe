import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { InvalidInputError } from "../../errors.js";
import { DEFAULT_CONFIG } from "../defaults.js";
import { resolveConfig } from "../resolve-config.js";

const repoRoot = fileURLToPath(new URL("../../../", import.meta.url));

describe("resolveConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "concord-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const writeConfig = (value: unknown, name = "concord.config.json"): string => {
    const path = join(dir, name);
    writeFileSync(path, typeof value === "string" ? value : JSON.stringify(value), "utf8");
    return path;
  };

  it("falls back to defaults when no config file exists", () => {
    const result = resolveConfig({ rootDir: dir });
    expect(result.config).toBe(DEFAULT_CONFIG);
    expect(result.configPath).toBeNull();
    expect(result.warnings).toEqual([]);
  });

  it("fails when an explicit config path is missing", () => {
    expect(() => resolveConfig({ rootDir: dir, configPath: "missing.json" })).toThrow(InvalidInputError);
  });

  it("merges a partial file onto defaults and freezes it", () => {
    const path = writeConfig({
      arbitration: { divergence_threshold: 0.5, weights: { coherence: 0.1 } },
      orchestration: { preview_chars: 120 },
      providers: { retry: { max_retries: 2 }, base_url: "https://llm.internal.test/v1" }
    });

    const { config, configPath } = resolveConfig({ rootDir: dir });

    expect(configPath).toBe(path);
    expect(config.arbitration).toEqual({
      divergenceThreshold: 0.5,
      weights: { semantic: 0.4, safety: 0.4, coherence: 0.1 },
      unknownSafetyConfidence: 0.5
    });
    expect(config.orchestration).toEqual({ confidenceThreshold: 0.7, previewChars: 120 });
    expect(config.providers.retry).toEqual({ maxRetries: 2, backoffMs: 500 });
    expect(config.providers.baseUrl).toBe("https://llm.internal.test/v1");
    expect(config.providers.generation.model).toBe("openai/gpt-4o-mini");
    expect(Object.isFrozen(config.arbitration.weights)).toBe(true);
    expect(Object.isFrozen(config.providers.generation.params)).toBe(true);
  });

  it("reports schema violations with their path", () => {
    writeConfig({ arbitration: { divergence_threshold: 2 } });
    expect(() => resolveConfig({ rootDir: dir })).toThrow(
      "config/arbitration/divergence_threshold: must be <= 1"
    );
  });

  it("rejects unknown keys", () => {
    writeConfig({ arbitraton: {} });
    expect(() => resolveConfig({ rootDir: dir })).toThrow("config: must NOT have additional properties");
  });

  it("rejects a malformed base URL", () => {
    writeConfig({ providers: { base_url: "not a url" } });
    expect(() => resolveConfig({ rootDir: dir })).toThrow('config/providers/base_url: must match format "uri"');
  });

  it("rejects invalid JSON", () => {
    writeConfig("{ not json");
    expect(() => resolveConfig({ rootDir: dir })).toThrow(InvalidInputError);
  });

  it("warns when weights sum above 1", () => {
    writeConfig({ arbitration: { weights: { semantic: 0.6 } } });
    expect(resolveConfig({ rootDir: dir }).warnings).toEqual([
      "arbitration.weights sum to 1.2; composite scores can exceed 1"
    ]);
  });

  it("warns when every weight is zero", () => {
    writeConfig({ arbitration: { weights: { semantic: 0, safety: 0, coherence: 0 } } });
    expect(resolveConfig({ rootDir: dir }).warnings).toEqual([
      "arbitration.weights are all zero; every composite score will be 0"
    ]);
  });

  it("accepts the shipped example config", () => {
    const result = resolveConfig({ rootDir: repoRoot });
    expect(result.configPath).toBe(join(repoRoot, "concord.config.json"));
    expect(result.config).toEqual(DEFAULT_CONFIG);
  });
});
