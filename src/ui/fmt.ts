export type FormatterStream = {
  isTTY?: boolean;
  columns?: number;
};

export type FormatterOptions = {
  stream?: FormatterStream;
  env?: NodeJS.ProcessEnv;
};

export type StatusLevel = "success" | "warn" | "error" | "info";

type ColorKey = "brand" | "success" | "error" | "warn" | "info" | "muted" | "bold";

const RESET = "\x1b[0m";

const NO_COLORS: Record<ColorKey, string> = {
  brand: "",
  success: "",
  error: "",
  warn: "",
  info: "",
  muted: "",
  bold: ""
};

const ANSI_COLORS: Record<ColorKey, string> = {
  brand: "\x1b[35m",
  success: "\x1b[32m",
  error: "\x1b[31m",
  warn: "\x1b[33m",
  info: "\x1b[36m",
  muted: "\x1b[90m",
  bold: "\x1b[1m"
};

const isTruthyEnv = (value: string | undefined): boolean =>
  typeof value === "string" && value !== "0" && value.trim().length > 0;

const shouldUseColor = (stream: FormatterStream, env: NodeJS.ProcessEnv): boolean => {
  if (isTruthyEnv(env.CLICOLOR_FORCE)) {
    return true;
  }
  if (isTruthyEnv(env.NO_COLOR) || env.CLICOLOR === "0") {
    return false;
  }
  return Boolean(stream.isTTY);
};

const PLAIN_PREFIX: Record<StatusLevel, string> = {
  success: "OK",
  warn: "WARN",
  error: "ERROR",
  info: "INFO"
};

const SYMBOL: Record<StatusLevel, string> = {
  success: "✔",
  warn: "▲",
  error: "✖",
  info: "●"
};

const padKey = (value: string, width: number): string =>
  value.length >= width ? value : `${value}${" ".repeat(width - value.length)}`;

const normalizeWidth = (width: number): number => Math.max(24, Math.min(width, 78));

export type Formatter = {
  isTTY: boolean;
  isColorEnabled: boolean;
  brand: (value: string) => string;
  muted: (value: string) => string;
  bold: (value: string) => string;
  divider: (width?: number) => string;
  header: (title: string) => string;
  kv: (key: string, value: string, keyWidth?: number) => string;
  statusChip: (label: string, level: StatusLevel, detail?: string) => string;
  warnBlock: (message: string) => string;
  errorBlock: (message: string, suggestion?: string) => string;
};

/**
 * Terminal styling. Off a TTY every helper degrades to plain text, so output
 * piped into files or tests carries no escape codes.
 */
export const createFormatter = (options?: FormatterOptions): Formatter => {
  const stream = options?.stream ?? process.stdout;
  const env = options?.env ?? process.env;

  const tty = Boolean(stream.isTTY);
  const colorEnabled = shouldUseColor(stream, env);
  const colors = colorEnabled ? ANSI_COLORS : NO_COLORS;

  const color = (key: ColorKey, value: string): string =>
    colors[key] ? `${colors[key]}${value}${RESET}` : value;

  const divider = (width?: number): string =>
    color("muted", (tty ? "─" : "-").repeat(normalizeWidth(width ?? stream.columns ?? 80)));

  const statusChip = (label: string, level: StatusLevel, detail?: string): string => {
    const suffix = detail ? ` ${color("muted", detail)}` : "";
    if (!tty) {
      return `${PLAIN_PREFIX[level]} ${label}${detail ? ` ${detail}` : ""}`;
    }
    return `${color(level, SYMBOL[level])} ${label}${suffix}`;
  };

  return {
    isTTY: tty,
    isColorEnabled: colorEnabled,
    brand: (value) => color("brand", value),
    muted: (value) => color("muted", value),
    bold: (value) => color("bold", value),
    divider,
    header: (title) => (tty ? `${color("bold", color("brand", title))}\n${divider()}` : title),
    kv: (key, value, keyWidth = 14) =>
      tty ? `${color("muted", padKey(key, keyWidth))} ${value}` : `${key}: ${value}`,
    statusChip,
    warnBlock: (message) =>
      tty ? `${color("warn", `${SYMBOL.warn} warn:`)} ${message}` : `warn: ${message}`,
    errorBlock: (message, suggestion) => {
      const first = tty ? `${color("error", `${SYMBOL.error} error:`)} ${message}` : `error: ${message}`;
      if (!suggestion) {
        return first;
      }
      return `${first}\n${color("muted", suggestion)}`;
    }
  };
};

export const createStdoutFormatter = (): Formatter =>
  createFormatter({ stream: process.stdout, env: process.env });

export const createStderrFormatter = (): Formatter =>
  createFormatter({ stream: process.stderr, env: process.env });
