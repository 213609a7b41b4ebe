import { resolve } from "node:path";

import { ArbitrationEngine } from "../arbitration/engine.js";
import type { ArbitrationResult } from "../arbitration/types.js";
import { resolveConfig, type ResolveConfigResult } from "../config/resolve-config.js";
import type { ConcordConfig } from "../config/types.js";
import { InvalidInputError, describeError } from "../errors.js";
import { EventBus } from "../events/event-bus.js";
import { MultiAgentOrchestrator } from "../orchestrator/orchestrator.js";
import type { OrchestrationResult } from "../orchestrator/types.js";
import { MockEmbeddingProvider, MockGenerationProvider } from "../providers/mock.js";
import { createOpenRouterProviders } from "../providers/openrouter.js";
import type { EmbeddingProvider, GenerationProvider } from "../providers/types.js";
import { ExecutionLogger } from "../ui/execution-log.js";
import { createStderrFormatter, createStdoutFormatter } from "../ui/fmt.js";
import { formatArbitrationText, formatOrchestrationText } from "../ui/result-text.js";
import { writeJsonAtomic } from "../utils/io.js";
import { createEventWarningSink, type WarningSink } from "../utils/warnings.js";

export type ParsedArgs = {
  positional: string[];
  flags: Record<string, string | boolean>;
};

// Flags that never take a value, so `--mock "some query"` keeps the query positional.
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(["--mock", "--json", "--quiet", "--help"]);

export const parseArgs = (args: string[], booleanFlags: ReadonlySet<string> = BOOLEAN_FLAGS): ParsedArgs => {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const next = args[i + 1];
      if (!booleanFlags.has(arg) && next !== undefined && !next.startsWith("--")) {
        flags[arg] = next;
        i += 1;
      } else {
        flags[arg] = true;
      }
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags };
};

export const getFlag = (flags: ParsedArgs["flags"], name: string): string | undefined => {
  const value = flags[name];
  return typeof value === "string" ? value : undefined;
};

export const hasFlag = (flags: ParsedArgs["flags"], name: string): boolean => Boolean(flags[name]);

export const getFlagNumber = (flags: ParsedArgs["flags"], name: string): number | undefined => {
  const value = getFlag(flags, name);
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const requireFlagNumber = (flags: ParsedArgs["flags"], name: string): number | undefined => {
  if (!(name in flags)) {
    return undefined;
  }
  const value = getFlagNumber(flags, name);
  if (value === undefined) {
    throw new InvalidInputError(`${name} expects a number`, { field: name });
  }
  return value;
};

export type CommandOptions = {
  signal?: AbortSignal;
  /** Extra listeners can subscribe here before the run starts. */
  bus?: EventBus;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export type Providers = {
  generator: GenerationProvider;
  embedder: EmbeddingProvider;
};

export const createProviders = (
  config: ConcordConfig,
  input: { mock: boolean; env: NodeJS.ProcessEnv; warnings?: WarningSink }
): Providers => {
  if (input.mock) {
    return { generator: new MockGenerationProvider(), embedder: new MockEmbeddingProvider() };
  }
  if (!input.env.OPENROUTER_API_KEY) {
    throw new InvalidInputError(
      "Missing OPENROUTER_API_KEY. Set it in the environment or a .env file, or pass --mock.",
      { field: "OPENROUTER_API_KEY" }
    );
  }
  return createOpenRouterProviders(config.providers, input.env, input.warnings);
};

const loadConfig = (configPath: string | undefined, cwd: string, quiet: boolean): ResolveConfigResult => {
  const result = resolveConfig({ configPath, rootDir: cwd });
  if (!quiet && result.warnings.length > 0) {
    const fmt = createStderrFormatter();
    result.warnings.forEach((warning) => console.error(fmt.warnBlock(warning)));
  }
  return result;
};

const attachProgress = (bus: EventBus): Array<() => void> => {
  const fmt = createStderrFormatter();
  return [
    bus.subscribe("stage.completed", (payload) => {
      const label = payload.role ? `${payload.stage} (${payload.role})` : payload.stage;
      console.error(fmt.statusChip(label, "success", `${payload.elapsed_ms}ms`));
    }),
    bus.subscribe("verification.triggered", (payload) => {
      console.error(
        fmt.statusChip(
          "verification",
          "info",
          `composite ${payload.composite_score.toFixed(3)} < ${payload.confidence_threshold}`
        )
      );
    }),
    bus.subscribe("warning.raised", (payload) => {
      console.error(fmt.warnBlock(payload.message));
    })
  ];
};

export const runAsk = async (
  parsed: ParsedArgs,
  options: CommandOptions = {}
): Promise<OrchestrationResult> => {
  const query = parsed.positional.join(" ").trim();
  if (!query) {
    throw new InvalidInputError("Usage: concord ask <query> [--threshold N] [--mock]", { field: "query" });
  }
  const cwd = options.cwd ?? process.cwd();
  const json = hasFlag(parsed.flags, "--json");
  const quiet = hasFlag(parsed.flags, "--quiet");
  const confidenceThreshold = requireFlagNumber(parsed.flags, "--threshold");

  const { config } = loadConfig(getFlag(parsed.flags, "--config"), cwd, quiet);
  const bus = options.bus ?? new EventBus();
  const warnings = createEventWarningSink(bus);
  const { generator, embedder } = createProviders(config, {
    mock: hasFlag(parsed.flags, "--mock"),
    env: options.env ?? process.env,
    warnings
  });

  const unsubs = quiet || json ? [] : attachProgress(bus);
  const logPath = getFlag(parsed.flags, "--log");
  const logger = logPath ? new ExecutionLogger(resolve(cwd, logPath)) : null;
  logger?.attach(bus);

  const orchestrator = new MultiAgentOrchestrator({
    generator,
    arbitrator: new ArbitrationEngine(embedder, config.arbitration),
    config: config.orchestration,
    bus,
    warnings
  });

  try {
    const result = await orchestrator.orchestrate(query, {
      ...(confidenceThreshold !== undefined ? { confidenceThreshold } : {}),
      ...(options.signal ? { signal: options.signal } : {})
    });
    const outPath = getFlag(parsed.flags, "--out");
    if (outPath) {
      writeJsonAtomic(resolve(cwd, outPath), result);
    }
    if (json) {
      process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    } else {
      process.stdout.write(formatOrchestrationText(result, createStdoutFormatter()));
    }
    return result;
  } finally {
    // A listener failure must not replace the orchestration outcome.
    try {
      await bus.flush();
    } catch (error) {
      console.error(createStderrFormatter().warnBlock(`event listeners failed: ${describeError(error)}`));
    }
    unsubs.forEach((unsubscribe) => unsubscribe());
    logger?.detach();
    await logger?.close();
  }
};

/** Scores textA as the strategist candidate (model_a) and textB as the synthesizer candidate (model_b). */
export const runArbitrate = async (
  parsed: ParsedArgs,
  options: CommandOptions = {}
): Promise<ArbitrationResult> => {
  const [textA, textB] = parsed.positional;
  if (!textA?.trim() || !textB?.trim()) {
    throw new InvalidInputError("Usage: concord arbitrate <textA> <textB> [--mock] [--json]", {
      field: "text"
    });
  }
  const cwd = options.cwd ?? process.cwd();
  const { config } = loadConfig(getFlag(parsed.flags, "--config"), cwd, hasFlag(parsed.flags, "--quiet"));
  const { embedder } = createProviders(config, {
    mock: hasFlag(parsed.flags, "--mock"),
    env: options.env ?? process.env
  });

  const engine = new ArbitrationEngine(embedder, config.arbitration);
  const result = await engine.arbitrate(
    { role: "strategist", text: textA, safetyScore: "unknown", truncated: false },
    { role: "synthesizer", text: textB, safetyScore: "unknown", truncated: false },
    options.signal ? { signal: options.signal } : {}
  );

  if (hasFlag(parsed.flags, "--json")) {
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  } else {
    process.stdout.write(formatArbitrationText(result, createStdoutFormatter()));
  }
  return result;
};

export const runValidate = (parsed: ParsedArgs, options: CommandOptions = {}): ResolveConfigResult => {
  const configPath = getFlag(parsed.flags, "--config") ?? parsed.positional[0];
  const result = loadConfig(configPath, options.cwd ?? process.cwd(), false);
  const fmt = createStdoutFormatter();
  console.log(
    fmt.statusChip("Config valid", "success", result.configPath ?? "(no config file, using defaults)")
  );
  return result;
};
