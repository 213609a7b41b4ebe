import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { InvalidInputError, describeError } from "../errors.js";
import { DEFAULT_CONFIG } from "./defaults.js";
import { formatAjvErrors, validateConfigFile } from "./schema-validation.js";
import type { ConcordConfig, ConcordConfigFile } from "./types.js";

export const DEFAULT_CONFIG_FILE = "concord.config.json";

// Weights may legitimately sum below 1; above 1 composites can leave [0, 1].
const WEIGHT_SUM_TOLERANCE = 1e-9;

export interface ResolveConfigOptions {
  /** Explicit path; a missing file is an error. Without it a missing default file means defaults. */
  configPath?: string;
  rootDir?: string;
}

export interface ResolveConfigResult {
  config: ConcordConfig;
  warnings: string[];
  configPath: string | null;
}

const readJsonFile = (path: string): unknown => {
  const raw = readFileSync(path, "utf8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new InvalidInputError(`Config file is not valid JSON: ${path} (${describeError(error)})`, {
      field: "config",
      cause: error
    });
  }
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};

export const mergeConfigFile = (
  file: ConcordConfigFile,
  base: ConcordConfig = DEFAULT_CONFIG
): ConcordConfig => {
  const arbitration = file.arbitration ?? {};
  const orchestration = file.orchestration ?? {};
  const providers = file.providers ?? {};

  const baseUrl = providers.base_url ?? base.providers.baseUrl;
  return deepFreeze({
    arbitration: {
      divergenceThreshold: arbitration.divergence_threshold ?? base.arbitration.divergenceThreshold,
      weights: {
        semantic: arbitration.weights?.semantic ?? base.arbitration.weights.semantic,
        safety: arbitration.weights?.safety ?? base.arbitration.weights.safety,
        coherence: arbitration.weights?.coherence ?? base.arbitration.weights.coherence
      },
      unknownSafetyConfidence:
        arbitration.unknown_safety_confidence ?? base.arbitration.unknownSafetyConfidence
    },
    orchestration: {
      confidenceThreshold:
        orchestration.confidence_threshold ?? base.orchestration.confidenceThreshold,
      previewChars: orchestration.preview_chars ?? base.orchestration.previewChars
    },
    providers: {
      ...(baseUrl !== undefined ? { baseUrl } : {}),
      generation: {
        model: providers.generation?.model ?? base.providers.generation.model,
        params: providers.generation?.params
          ? { ...providers.generation.params }
          : { ...base.providers.generation.params }
      },
      embedding: {
        model: providers.embedding?.model ?? base.providers.embedding.model,
        maxChars: providers.embedding?.max_chars ?? base.providers.embedding.maxChars
      },
      timeouts: {
        perCallTimeoutMs:
          providers.timeouts?.per_call_timeout_ms ?? base.providers.timeouts.perCallTimeoutMs
      },
      retry: {
        maxRetries: providers.retry?.max_retries ?? base.providers.retry.maxRetries,
        backoffMs: providers.retry?.backoff_ms ?? base.providers.retry.backoffMs
      }
    }
  });
};

export const collectConfigWarnings = (config: ConcordConfig): string[] => {
  const warnings: string[] = [];
  const { semantic, safety, coherence } = config.arbitration.weights;
  const sum = semantic + safety + coherence;
  if (sum > 1 + WEIGHT_SUM_TOLERANCE) {
    warnings.push(
      `arbitration.weights sum to ${Number(sum.toFixed(6))}; composite scores can exceed 1`
    );
  }
  if (sum === 0) {
    warnings.push("arbitration.weights are all zero; every composite score will be 0");
  }
  return warnings;
};

export const resolveConfig = (options: ResolveConfigOptions = {}): ResolveConfigResult => {
  const rootDir = options.rootDir ?? process.cwd();
  const configPath = resolve(rootDir, options.configPath ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(configPath)) {
    if (options.configPath !== undefined) {
      throw new InvalidInputError(`Config file not found: ${configPath}`, { field: "config" });
    }
    return { config: DEFAULT_CONFIG, warnings: collectConfigWarnings(DEFAULT_CONFIG), configPath: null };
  }

  const raw = readJsonFile(configPath);
  if (!validateConfigFile(raw)) {
    const formatted = formatAjvErrors("config", validateConfigFile.errors);
    throw new InvalidInputError(
      formatted.length > 0 ? formatted.join("\n") : "config is invalid",
      { field: "config" }
    );
  }

  const config = mergeConfigFile(raw);
  return { config, warnings: collectConfigWarnings(config), configPath };
};
