#!/usr/bin/env node
import "dotenv/config";

import { copyFileSync, existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { DEFAULT_CONFIG_FILENAME } from "../config/defaults.js";
import { loadConfig } from "../config/resolve-config.js";
import type { ResolvedConfig, WorkflowConfig } from "../config/types.js";
import type { WorkflowStatus } from "../ledger/types.js";
import {
  collectBatchEntries,
  demoConfig,
  runBatch,
  runWorkflow,
  setupShutdownHandlers
} from "../run/run-service.js";
import { formatVerifyReport, verifyRunDir } from "../tools/verify-run.js";
import { createStderrFormatter, createStdoutFormatter, type StatusLevel } from "../ui/fmt.js";
import { getAssetRoot } from "../utils/asset-root.js";
import { createConsoleWarningSink } from "../utils/warnings.js";

const USAGE = [
  "Usage:",
  "  reqloop init [--out <path>] [--force]",
  "  reqloop validate [config.json]",
  "  reqloop run (--requirement <text> | --requirement-file <path>) [--config <path>] [--out <runs_dir>]",
  "              [--max-iterations N] [--mock] [--quiet]",
  "  reqloop batch <dir> [--config <path>] [--out <runs_dir>] [--workers N] [--max-iterations N] [--mock]",
  "  reqloop verify <run_dir>",
  "",
  "--mock routes every role to an offline demo provider; no API keys are needed."
].join("\n");

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

type ParsedArgs = {
  positional: string[];
  flags: Record<string, string | boolean>;
};

const parseArgs = (args: string[]): ParsedArgs => {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (arg.startsWith("--")) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
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

const getFlag = (flags: ParsedArgs["flags"], name: string): string | undefined => {
  const value = flags[name];
  return typeof value === "string" ? value : undefined;
};

const hasFlag = (flags: ParsedArgs["flags"], name: string): boolean => Boolean(flags[name]);

const getFlagNumber = (flags: ParsedArgs["flags"], name: string): number | undefined => {
  const value = getFlag(flags, name);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`${name} expects a positive integer, got "${value}"`);
  }
  return parsed;
};

const workflowOverrides = (flags: ParsedArgs["flags"]): WorkflowConfig => {
  const maxIterations = getFlagNumber(flags, "--max-iterations");
  return maxIterations === undefined ? {} : { max_iterations: maxIterations };
};

const loadCliConfig = (parsed: ParsedArgs): ResolvedConfig => {
  const overrides = workflowOverrides(parsed.flags);
  const explicitPath = getFlag(parsed.flags, "--config");
  if (hasFlag(parsed.flags, "--mock")) {
    const base = explicitPath ? demoConfig(loadConfig(explicitPath, { workflowOverrides: overrides })) : demoConfig();
    return { ...base, workflow: { ...base.workflow, ...overrides } };
  }
  return loadConfig(explicitPath ?? DEFAULT_CONFIG_FILENAME, { workflowOverrides: overrides });
};

const STATUS_LEVEL: Record<WorkflowStatus, StatusLevel> = {
  ready: "success",
  budget_exceeded: "warn",
  failed: "error"
};

const readRequirement = (parsed: ParsedArgs): string => {
  const inline = getFlag(parsed.flags, "--requirement");
  const file = getFlag(parsed.flags, "--requirement-file");
  if (inline !== undefined && file !== undefined) {
    throw new UsageError("Use either --requirement or --requirement-file (not both).");
  }
  const text = file !== undefined ? readFileSync(resolve(file), "utf8") : inline;
  if (text === undefined || text.trim().length === 0) {
    throw new UsageError("A non-empty requirement is required (--requirement or --requirement-file).");
  }
  return text.trim();
};

const runInit = (parsed: ParsedArgs): void => {
  const target = resolve(getFlag(parsed.flags, "--out") ?? DEFAULT_CONFIG_FILENAME);
  if (existsSync(target) && !hasFlag(parsed.flags, "--force")) {
    throw new UsageError(`${target} already exists (use --force to overwrite).`);
  }
  copyFileSync(resolve(getAssetRoot(), "templates", "default.config.json"), target);
  console.log(`Wrote ${target}`);
  console.log("Set OPENAI_API_KEY and ANTHROPIC_API_KEY (a .env file is loaded), then run: reqloop validate");
};

const runValidate = (parsed: ParsedArgs): void => {
  const configPath = getFlag(parsed.flags, "--config") ?? parsed.positional[0] ?? DEFAULT_CONFIG_FILENAME;
  const config = loadConfig(configPath);
  const fmt = createStdoutFormatter();
  console.log(fmt.statusChip("Config valid", "success", resolve(configPath)));
  for (const role of Object.values(config.roles)) {
    console.log(`  ${role.role}: ${role.provider}/${role.model}`);
  }
  console.log(
    fmt.muted(
      `  max_iterations=${config.workflow.max_iterations} max_parse_attempts=${config.workflow.max_parse_attempts} policy=${config.workflow.protocol_violation_policy}`
    )
  );
};

const runCommand = async (parsed: ParsedArgs): Promise<void> => {
  const requirement = readRequirement(parsed);
  const config = loadCliConfig(parsed);
  const warningSink = createConsoleWarningSink();
  const shutdown = setupShutdownHandlers(warningSink);
  try {
    const outcome = await runWorkflow({
      config,
      requirement,
      runsDir: getFlag(parsed.flags, "--out"),
      quiet: hasFlag(parsed.flags, "--quiet"),
      warningSink,
      shouldStop: shutdown.isRequested
    });
    if (outcome.result.status === "failed") {
      process.exitCode = 1;
    }
  } finally {
    shutdown.dispose();
  }
};

const runBatchCommand = async (parsed: ParsedArgs): Promise<void> => {
  const dir = parsed.positional[0];
  if (!dir) {
    throw new UsageError("Usage: reqloop batch <dir>");
  }
  const entries = collectBatchEntries(resolve(dir));
  if (entries.length === 0) {
    throw new UsageError(`No .txt or .md requirement files found in ${dir}`);
  }
  const config = loadCliConfig(parsed);
  const fmt = createStdoutFormatter();
  const warningSink = createConsoleWarningSink();
  const shutdown = setupShutdownHandlers(warningSink);
  try {
    const batch = await runBatch({
      config,
      entries,
      workers: getFlagNumber(parsed.flags, "--workers") ?? 1,
      runsDir: getFlag(parsed.flags, "--out"),
      warningSink,
      shouldStop: shutdown.isRequested,
      onWorkflowDone: (entry, outcome) => {
        const status = outcome.result.status;
        console.log(fmt.statusChip(entry.label, STATUS_LEVEL[status], `${status} -> ${outcome.runDir}`));
      }
    });
    console.log(`Batch output: ${batch.batchDir}`);
    if (batch.stopped) {
      console.log(fmt.warnBlock(`Stopped early; ${batch.outcomes.length} of ${entries.length} workflow(s) ran.`));
    }
    if (batch.stopped || batch.outcomes.some(({ outcome }) => outcome.result.status === "failed")) {
      process.exitCode = 1;
    }
  } finally {
    shutdown.dispose();
  }
};

const runVerify = (parsed: ParsedArgs): void => {
  const runDir = parsed.positional[0];
  if (!runDir) {
    throw new UsageError("Usage: reqloop verify <run_dir>");
  }
  const report = verifyRunDir(resolve(runDir));
  console.log(formatVerifyReport(report));
  if (!report.ok) {
    process.exitCode = 1;
  }
};

const main = async (): Promise<void> => {
  const args = process.argv.slice(2);
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    return;
  }

  const [command, ...rest] = args;
  const parsed = parseArgs(rest);
  const fmt = createStderrFormatter();

  try {
    switch (command) {
      case "init":
        runInit(parsed);
        return;
      case "validate":
        runValidate(parsed);
        return;
      case "run":
        await runCommand(parsed);
        return;
      case "batch":
        await runBatchCommand(parsed);
        return;
      case "verify":
        runVerify(parsed);
        return;
      default:
        throw new UsageError(`Unknown command: ${command ?? ""}`);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(fmt.errorBlock(message, error instanceof UsageError ? USAGE : undefined));
    process.exitCode = 1;
  }
};

void main();
