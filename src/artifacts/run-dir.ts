import { mkdirSync } from "node:fs";
import { resolve } from "node:path";

export interface RunDirOptions {
  outRoot?: string;
  runId: string;
}

export interface RunPaths {
  runDir: string;
  tracePath: string;
  traceTextPath: string;
  resultPath: string;
  codePath: string;
  testsPath: string;
  eventsPath: string;
  logPath: string;
  receiptPath: string;
}

export const DEFAULT_RUNS_DIR = "runs";

export const createRunDir = (options: RunDirOptions): RunPaths => {
  const outRoot = resolve(options.outRoot ?? DEFAULT_RUNS_DIR);
  const runDir = resolve(outRoot, options.runId);
  mkdirSync(runDir, { recursive: true });

  return {
    runDir,
    tracePath: resolve(runDir, "trace.json"),
    traceTextPath: resolve(runDir, "trace.txt"),
    resultPath: resolve(runDir, "result.json"),
    codePath: resolve(runDir, "code.txt"),
    testsPath: resolve(runDir, "tests.txt"),
    eventsPath: resolve(runDir, "events.jsonl"),
    logPath: resolve(runDir, "execution.log"),
    receiptPath: resolve(runDir, "receipt.txt")
  };
};
