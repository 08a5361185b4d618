import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { formatAjvErrors, validateTrace } from "../config/schema-validation.js";
import type { Round, Trace } from "../ledger/types.js";

export type VerifyStatus = "OK" | "WARN" | "FAIL";

export type VerifyResult = {
  status: VerifyStatus;
  label: string;
  detail?: string;
};

export type VerifyReport = {
  results: VerifyResult[];
  ok: boolean;
};

type ResultFile = {
  status?: unknown;
  correction_iterations?: unknown;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const addResult = (
  results: VerifyResult[],
  status: VerifyStatus,
  label: string,
  detail?: string
): void => {
  results.push(detail === undefined ? { status, label } : { status, label, detail });
};

const readJson = (results: VerifyResult[], label: string, path: string): unknown => {
  if (!existsSync(path)) {
    addResult(results, "FAIL", label, `Missing file: ${path}`);
    return null;
  }
  try {
    return JSON.parse(readFileSync(path, "utf8")) as unknown;
  } catch (error) {
    addResult(results, "FAIL", label, error instanceof Error ? error.message : String(error));
    return null;
  }
};

const verifyRoundSequence = (results: VerifyResult[], trace: Trace): void => {
  const gaps = trace.rounds.filter((round, index) => round.round !== index + 1);
  if (gaps.length > 0) {
    addResult(results, "FAIL", "round numbering", `round ${gaps[0]?.round} out of sequence`);
  } else {
    addResult(results, "OK", "round numbering");
  }
  if (trace.rounds.length > trace.max_iterations) {
    addResult(
      results,
      "FAIL",
      "iteration budget",
      `${trace.rounds.length} rounds exceed max_iterations ${trace.max_iterations}`
    );
  } else {
    addResult(results, "OK", "iteration budget", `${trace.rounds.length}/${trace.max_iterations}`);
  }
};

const verifyVersions = (results: VerifyResult[], trace: Trace): void => {
  let expected = trace.initial_requirement.version;
  for (const round of trace.rounds) {
    if (round.requirement.version !== expected) {
      addResult(
        results,
        "FAIL",
        "requirement versions",
        `round ${round.round} analyzed v${round.requirement.version}, expected v${expected}`
      );
      return;
    }
    if (round.corrector) {
      const next = round.corrector.resulting_requirement.version;
      if (next !== expected + 1) {
        addResult(
          results,
          "FAIL",
          "requirement versions",
          `round ${round.round} produced v${next} from v${expected}`
        );
        return;
      }
      expected = next;
    }
  }
  if (trace.writer && trace.writer.requirement.version !== expected) {
    addResult(
      results,
      "FAIL",
      "requirement versions",
      `writer received v${trace.writer.requirement.version}, expected v${expected}`
    );
    return;
  }
  addResult(results, "OK", "requirement versions");
};

const conservationGap = (round: Round): string | null => {
  const corrector = round.corrector;
  if (!corrector) {
    return null;
  }
  const seen = new Map<string, number>();
  for (const resolution of corrector.accepted_resolutions) {
    seen.set(resolution.issue_id, (seen.get(resolution.issue_id) ?? 0) + 1);
  }
  for (const id of corrector.unresolved_issue_ids) {
    seen.set(id, (seen.get(id) ?? 0) + 1);
  }
  for (const issue of round.analyzer.issue_list.issues) {
    const count = seen.get(issue.id) ?? 0;
    if (count !== 1) {
      return `round ${round.round} issue ${issue.id} accounted ${count} time(s)`;
    }
    seen.delete(issue.id);
  }
  const stray = Array.from(seen.keys());
  return stray.length > 0 ? `round ${round.round} accounts for unknown issue ${stray[0]}` : null;
};

const verifyLedger = (results: VerifyResult[], trace: Trace): void => {
  const gap = trace.rounds.map(conservationGap).find((detail) => detail !== null);
  if (gap) {
    addResult(results, "FAIL", "issue conservation", gap);
  } else {
    addResult(results, "OK", "issue conservation");
  }

  let previousUnresolved = new Set<string>();
  for (const round of trace.rounds) {
    const stray = round.analyzer.carried_issue_ids.find((id) => !previousUnresolved.has(id));
    if (stray) {
      addResult(results, "FAIL", "carried issues", `round ${round.round} carries ${stray}, which was not left open`);
      return;
    }
    previousUnresolved = new Set(round.corrector?.unresolved_issue_ids ?? []);
  }
  addResult(results, "OK", "carried issues");
};

const verifyTermination = (results: VerifyResult[], trace: Trace): void => {
  const last = trace.rounds[trace.rounds.length - 1];
  const label = "termination";
  switch (trace.status) {
    case "ready":
      if (!last || !last.analyzer.issue_list.ready_for_codegen || last.corrector) {
        addResult(results, "FAIL", label, "status ready but the last round was not judged ready");
        return;
      }
      break;
    case "budget_exceeded":
      if (!last || last.analyzer.issue_list.ready_for_codegen || trace.rounds.length !== trace.max_iterations) {
        addResult(results, "FAIL", label, "status budget_exceeded but the budget was not spent");
        return;
      }
      break;
    case "failed":
      if (!trace.incomplete || !trace.error) {
        addResult(results, "FAIL", label, "failed trace must be incomplete and carry an error");
        return;
      }
      addResult(results, "WARN", label, `workflow failed in ${trace.error.state}: ${trace.error.message}`);
      return;
    default:
      addResult(results, "FAIL", label, "trace was never finalized");
      return;
  }
  if (!trace.writer) {
    addResult(results, "FAIL", label, `status ${trace.status} without a writer step`);
    return;
  }
  addResult(results, "OK", label, trace.status);
};

const verifyResultFile = (results: VerifyResult[], runDir: string, trace: Trace): void => {
  const raw = readJson(results, "result.json", resolve(runDir, "result.json"));
  if (raw === null) {
    return;
  }
  if (!isRecord(raw)) {
    addResult(results, "FAIL", "result.json", "not a JSON object");
    return;
  }
  const result: ResultFile = raw;
  const corrections = trace.rounds.filter((round) => round.corrector).length;
  if (result.status !== trace.status) {
    addResult(results, "FAIL", "result.json", `status ${String(result.status)} differs from trace ${trace.status}`);
  } else if (result.correction_iterations !== corrections) {
    addResult(
      results,
      "FAIL",
      "result.json",
      `correction_iterations ${String(result.correction_iterations)} differs from ${corrections} corrector step(s)`
    );
  } else {
    addResult(results, "OK", "result.json");
  }
};

const verifyEvents = (results: VerifyResult[], runDir: string): void => {
  const path = resolve(runDir, "events.jsonl");
  if (!existsSync(path)) {
    addResult(results, "WARN", "events.jsonl", "File not present");
    return;
  }
  const lines = readFileSync(path, "utf8")
    .split("\n")
    .filter((line) => line.trim().length > 0);
  let invalid = 0;
  for (const line of lines) {
    try {
      const record: unknown = JSON.parse(line);
      if (!isRecord(record) || typeof record.type !== "string") {
        invalid += 1;
      }
    } catch {
      invalid += 1;
    }
  }
  if (invalid > 0) {
    addResult(results, "FAIL", "events.jsonl", `${invalid} malformed record(s)`);
  } else {
    addResult(results, "OK", "events.jsonl", `${lines.length} record(s)`);
  }
};

/** Re-checks a finished run directory: trace schema, ledger invariants and the result payload. */
export const verifyRunDir = (runDir: string): VerifyReport => {
  const results: VerifyResult[] = [];
  const raw = readJson(results, "trace.json", resolve(runDir, "trace.json"));
  if (raw !== null) {
    if (!validateTrace(raw)) {
      const errors = formatAjvErrors("trace.json", validateTrace.errors);
      addResult(results, "FAIL", "trace.json", errors.join("; ") || "Schema validation failed");
    } else {
      addResult(results, "OK", "trace.json");
      verifyRoundSequence(results, raw);
      verifyVersions(results, raw);
      verifyLedger(results, raw);
      verifyTermination(results, raw);
      verifyResultFile(results, runDir, raw);
    }
  }
  verifyEvents(results, runDir);

  const ok = !results.some((result) => result.status === "FAIL");
  return { results, ok };
};

export const formatVerifyReport = (report: VerifyReport): string =>
  report.results
    .map((result) => {
      const detail = result.detail ? `: ${result.detail}` : "";
      return `${result.status} ${result.label}${detail}`;
    })
    .join("\n");
