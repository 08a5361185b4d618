import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import type { UsageTotals } from "../artifacts/usage-tracker.js";
import type { TraceError, WorkflowStatus } from "../ledger/types.js";

const ARTIFACT_FILES = [
  "trace.json",
  "trace.txt",
  "result.json",
  "code.txt",
  "tests.txt",
  "events.jsonl",
  "execution.log"
];

type ResultFile = {
  workflow_id: string;
  status: WorkflowStatus;
  correction_iterations: number;
  rounds: number;
  finalized_requirement: { version: number; text: string };
  usage?: { totals: UsageTotals };
  error?: TraceError;
};

const readJsonIfExists = (path: string): unknown => {
  if (!existsSync(path)) {
    return undefined;
  }
  return JSON.parse(readFileSync(path, "utf8")) as unknown;
};

const isResultFile = (value: unknown): value is ResultFile =>
  typeof value === "object" &&
  value !== null &&
  "workflow_id" in value &&
  "status" in value &&
  "finalized_requirement" in value;

const truncate = (value: string, max = 120): string => {
  const flat = value.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
};

export type ReceiptModel = {
  workflow_id: string;
  run_dir: string;
  status: WorkflowStatus;
  rounds: number;
  correction_iterations: number;
  requirement_version: number;
  requirement_preview: string;
  usage?: UsageTotals;
  error?: TraceError;
  artifacts: string[];
};

export const buildReceiptModel = (runDir: string): ReceiptModel => {
  const result = readJsonIfExists(resolve(runDir, "result.json"));
  if (!isResultFile(result)) {
    throw new Error("result.json not found; cannot build receipt");
  }

  return {
    workflow_id: result.workflow_id,
    run_dir: runDir,
    status: result.status,
    rounds: result.rounds,
    correction_iterations: result.correction_iterations,
    requirement_version: result.finalized_requirement.version,
    requirement_preview: truncate(result.finalized_requirement.text),
    usage: result.usage?.totals,
    error: result.error,
    artifacts: ARTIFACT_FILES.filter((file) => existsSync(resolve(runDir, file)))
  };
};
