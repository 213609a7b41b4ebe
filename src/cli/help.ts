import type { Formatter } from "../ui/fmt.js";

export type HelpFlag = {
  name: string;
  description: string;
};

export type HelpCommand = {
  name: string;
  summary: string;
  usage: string;
  flags?: HelpFlag[];
  examples?: string[];
};

const CONFIG_FLAG: HelpFlag = {
  name: "--config <path>",
  description: "config path (default: concord.config.json, optional)"
};

const MOCK_FLAG: HelpFlag = {
  name: "--mock",
  description: "use offline mock providers instead of OpenRouter"
};

const COMMANDS: HelpCommand[] = [
  {
    name: "ask",
    summary: "run the strategist/critic/synthesizer pipeline on a query",
    usage: "concord ask <query> [flags]",
    flags: [
      CONFIG_FLAG,
      MOCK_FLAG,
      { name: "--threshold <N>", description: "confidence threshold in [0, 1] for verification" },
      { name: "--json", description: "print the full result as JSON" },
      { name: "--out <file>", description: "also write the result JSON to a file" },
      { name: "--log <file>", description: "append an execution log" },
      { name: "--quiet", description: "suppress progress and warnings on stderr" }
    ],
    examples: [
      "concord ask \"Design a caching layer\" --mock",
      "concord ask \"Plan a schema migration\" --threshold 0.8 --out result.json"
    ]
  },
  {
    name: "arbitrate",
    summary: "score two candidate texts and pick one",
    usage: "concord arbitrate <textA> <textB> [flags]",
    flags: [CONFIG_FLAG, MOCK_FLAG, { name: "--json", description: "print the result as JSON" }],
    examples: ["concord arbitrate \"Use a write-through cache\" \"Use a write-back cache\" --mock"]
  },
  {
    name: "validate",
    summary: "validate a config file against the schema",
    usage: "concord validate [config.json]",
    examples: ["concord validate", "concord validate experiments/strict.json"]
  }
];

export const getHelpCommand = (name: string): HelpCommand | undefined =>
  COMMANDS.find((command) => command.name === name);

export const renderRootHelp = (fmt: Formatter): string => {
  const lines: string[] = [];
  lines.push(fmt.header("concord // multi-agent reasoning with arbitration"));
  lines.push("");
  lines.push("Commands:");
  COMMANDS.forEach((command) => {
    lines.push(`  ${fmt.brand(command.name.padEnd(10))} ${command.summary}`);
  });
  lines.push("");
  lines.push("Environment:");
  lines.push(`  ${fmt.muted("OPENROUTER_API_KEY  required unless --mock (a .env file is loaded)")}`);
  lines.push(`  ${fmt.muted("OPENROUTER_BASE_URL optional API base URL")}`);
  lines.push("");
  lines.push(`Run ${fmt.bold("concord <command> --help")} for command flags.`);
  return `${lines.join("\n")}\n`;
};

export const renderCommandHelp = (fmt: Formatter, command: HelpCommand): string => {
  const lines: string[] = [];
  lines.push(fmt.header(`concord ${command.name}: ${command.summary}`));
  lines.push("");
  lines.push("Usage:");
  lines.push(`  ${command.usage}`);

  if (command.flags && command.flags.length > 0) {
    lines.push("");
    lines.push("Flags:");
    command.flags.forEach((flag) => {
      lines.push(`  ${flag.name.padEnd(24)} ${fmt.muted(flag.description)}`);
    });
  }

  if (command.examples && command.examples.length > 0) {
    lines.push("");
    lines.push("Examples:");
    command.examples.forEach((example) => lines.push(`  ${fmt.muted(example)}`));
  }

  return `${lines.join("\n")}\n`;
};
