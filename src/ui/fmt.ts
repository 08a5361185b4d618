export type FormatterStream = {
  isTTY?: boolean;
};

export type FormatterOptions = {
  stream?: FormatterStream;
  env?: NodeJS.ProcessEnv;
};

export type StatusLevel = "success" | "warn" | "error" | "info";

const RESET = "\x1b[0m";

const LEVEL_CODES: Record<StatusLevel | "muted" | "bold", string> = {
  success: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  info: "\x1b[36m",
  muted: "\x1b[90m",
  bold: "\x1b[1m"
};

const PLAIN_PREFIX: Record<StatusLevel, string> = {
  success: "OK",
  warn: "WARN",
  error: "ERROR",
  info: "INFO"
};

const isTruthyEnv = (value: string | undefined): boolean =>
  typeof value === "string" && value !== "0" && value.trim().length > 0;

const shouldUseColor = (stream: FormatterStream | undefined, env: NodeJS.ProcessEnv): boolean => {
  if (isTruthyEnv(env.CLICOLOR_FORCE)) {
    return true;
  }
  if (isTruthyEnv(env.NO_COLOR)) {
    return false;
  }
  if (env.CLICOLOR === "0") {
    return false;
  }
  return Boolean(stream?.isTTY);
};

export type Formatter = {
  isColorEnabled: boolean;
  muted: (value: string) => string;
  bold: (value: string) => string;
  statusChip: (label: string, level: StatusLevel, detail?: string) => string;
  warnBlock: (message: string) => string;
  errorBlock: (message: string, suggestion?: string) => string;
};

export const createFormatter = (options?: FormatterOptions): Formatter => {
  const stream = options?.stream ?? process.stdout;
  const env = options?.env ?? process.env;
  const colorEnabled = shouldUseColor(stream, env);

  const color = (key: keyof typeof LEVEL_CODES, value: string): string =>
    colorEnabled ? `${LEVEL_CODES[key]}${value}${RESET}` : value;

  const statusChip = (label: string, level: StatusLevel, detail?: string): string =>
    `${color(level, PLAIN_PREFIX[level])} ${label}${detail ? ` ${color("muted", detail)}` : ""}`;

  const errorBlock = (message: string, suggestion?: string): string => {
    const firstLine = `${color("error", "error:")} ${message}`;
    return suggestion ? `${firstLine}\n${color("muted", suggestion)}` : firstLine;
  };

  return {
    isColorEnabled: colorEnabled,
    muted: (value) => color("muted", value),
    bold: (value) => color("bold", value),
    statusChip,
    warnBlock: (message) => `${color("warn", "warn:")} ${message}`,
    errorBlock
  };
};

export const createStdoutFormatter = (): Formatter =>
  createFormatter({ stream: process.stdout, env: process.env });

export const createStderrFormatter = (): Formatter =>
  createFormatter({ stream: process.stderr, env: process.env });
