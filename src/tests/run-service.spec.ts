import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { RateLimiter } from "../dispatch/rate-limiter.js";
import { collectBatchEntries, demoConfig, runBatch, runWorkflow } from "../run/run-service.js";
import { formatVerifyReport, verifyRunDir } from "../tools/verify-run.js";

const tempDirs: string[] = [];

const makeTempDir = (): string => {
  const dir = mkdtempSync(join(tmpdir(), "reqloop-run-"));
  tempDirs.push(dir);
  return dir;
};

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe("runWorkflow", () => {
  it("runs the demo workflow end to end and writes verifiable artifacts", async () => {
    const runsDir = makeTempDir();

    const outcome = await runWorkflow({
      config: demoConfig(),
      requirement: "Parse a CSV line into fields.",
      runsDir,
      label: "csv",
      quiet: true,
      receiptMode: "writeOnly",
      rateLimiter: new RateLimiter(),
      now: () => new Date("2026-03-04T05:06:07.000Z")
    });

    expect(outcome.runId).toMatch(/^20260304T050607Z_[0-9a-f]{6}_csv$/);
    expect(outcome.result.status).toBe("ready");
    expect(outcome.result.correction_iterations).toBe(1);
    expect(outcome.result.trace.rounds).toHaveLength(2);
    expect(outcome.result.finalized_requirement.version).toBe(2);
    expect(outcome.result.finalized_requirement.text).toContain("Empty or invalid input raises a ValueError.");
    expect(outcome.usage.totals.calls).toBe(4);

    for (const file of ["trace.json", "trace.txt", "result.json", "code.txt", "tests.txt", "events.jsonl", "execution.log", "receipt.txt"]) {
      expect(existsSync(join(outcome.runDir, file))).toBe(true);
    }
    expect(readFileSync(join(outcome.runDir, "code.txt"), "utf8")).toBe(`${outcome.result.code}\n`);
    const receipt = readFileSync(join(outcome.runDir, "receipt.txt"), "utf8").split("\n");
    expect(receipt[0]).toBe("Done: requirement judged unambiguous");
    expect(receipt).toContain("- rounds: 2, correction iterations: 1");

    const report = verifyRunDir(outcome.runDir);
    expect(formatVerifyReport(report)).not.toContain("FAIL");
    expect(report.ok).toBe(true);
  });

  it("lets verify catch a tampered result payload", async () => {
    const runsDir = makeTempDir();
    const outcome = await runWorkflow({
      config: demoConfig(),
      requirement: "Count words in a sentence.",
      runsDir,
      quiet: true,
      receiptMode: "skip",
      rateLimiter: new RateLimiter()
    });
    const resultPath = join(outcome.runDir, "result.json");
    const result: unknown = JSON.parse(readFileSync(resultPath, "utf8"));
    if (typeof result !== "object" || result === null) {
      throw new Error("result.json is not an object");
    }
    writeFileSync(resultPath, JSON.stringify({ ...result, correction_iterations: 5 }), "utf8");

    const report = verifyRunDir(outcome.runDir);

    expect(report.ok).toBe(false);
    expect(report.results).toContainEqual({
      status: "FAIL",
      label: "result.json",
      detail: "correction_iterations 5 differs from 1 corrector step(s)"
    });
    expect(existsSync(join(outcome.runDir, "receipt.txt"))).toBe(false);
  });
});

describe("runBatch", () => {
  it("runs every requirement file and writes a batch summary", async () => {
    const inputDir = makeTempDir();
    const runsDir = makeTempDir();
    writeFileSync(join(inputDir, "b-sort.txt"), "Sort numbers.", "utf8");
    writeFileSync(join(inputDir, "a-parse.md"), "Parse dates.", "utf8");
    writeFileSync(join(inputDir, "empty.txt"), "   ", "utf8");
    writeFileSync(join(inputDir, "notes.json"), "{}", "utf8");

    const entries = collectBatchEntries(inputDir);
    expect(entries.map((entry) => entry.label)).toEqual(["a-parse", "b-sort"]);

    const finished: string[] = [];
    const batch = await runBatch({
      config: demoConfig(),
      entries,
      workers: 2,
      runsDir,
      rateLimiter: new RateLimiter(),
      onWorkflowDone: (entry) => finished.push(entry.label)
    });

    expect(batch.stopped).toBe(false);
    expect([...finished].sort()).toEqual(["a-parse", "b-sort"]);
    const summary: unknown = JSON.parse(readFileSync(join(batch.batchDir, "batch_summary.json"), "utf8"));
    expect(summary).toMatchObject({
      stopped: false,
      workflows: [
        { source: join(inputDir, "a-parse.md"), status: "ready", rounds: 2, correction_iterations: 1 },
        { source: join(inputDir, "b-sort.txt"), status: "ready", rounds: 2, correction_iterations: 1 }
      ]
    });
    for (const { outcome } of batch.outcomes) {
      expect(verifyRunDir(outcome.runDir).ok).toBe(true);
      expect(existsSync(join(outcome.runDir, "receipt.txt"))).toBe(true);
    }
  });
});
