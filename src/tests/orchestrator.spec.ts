import { describe, expect, it } from "vitest";

import type { ResolvedRole, RoleName, WorkflowConfig } from "../config/types.js";
import { validateTrace } from "../config/schema-validation.js";
import { Dispatcher } from "../dispatch/dispatcher.js";
import { RateLimiter } from "../dispatch/rate-limiter.js";
import { Orchestrator, type WorkflowRunOptions } from "../engine/orchestrator.js";
import { EventBus } from "../events/event-bus.js";
import type { EventPayloadMap, EventType } from "../events/types.js";
import { ScriptedAdapter, type ScriptedReply } from "../providers/mock.js";
import { ProviderError } from "../providers/types.js";

const ready = (): string => JSON.stringify({ ready_for_codegen: true, issues: [] });

const notReady = (...ids: string[]): string =>
  JSON.stringify({
    ready_for_codegen: false,
    issues: ids.map((id) => ({ id, category: "ambiguity", description: `unclear ${id}` }))
  });

const corrected = (text: string, ...ids: string[]): string =>
  JSON.stringify({
    updated_requirement: text,
    resolutions: ids.map((id) => ({ issue_id: id, action_taken: `resolved ${id}` }))
  });

const written = (code = "print('ok')"): string =>
  JSON.stringify({ code, tests: "assert True", assumptions: ["none"] });

const ROLES: Record<RoleName, ResolvedRole> = {
  analyzer: { role: "analyzer", provider: "analyzer-p", model: "am" },
  corrector: { role: "corrector", provider: "corrector-p", model: "cm" },
  writer: { role: "writer", provider: "writer-p", model: "wm" }
};

const PROMPTS = {
  analyzer: { text: "analyze", sha256: "a".repeat(64) },
  corrector: { text: "correct", sha256: "c".repeat(64) },
  writer: { text: "write", sha256: "e".repeat(64) }
};

const harness = (
  scripts: Record<RoleName, ScriptedReply[]>,
  workflow: WorkflowConfig = {}
) => {
  const adapters: Record<RoleName, ScriptedAdapter> = {
    analyzer: new ScriptedAdapter("analyzer-p", scripts.analyzer, "am"),
    corrector: new ScriptedAdapter("corrector-p", scripts.corrector, "cm"),
    writer: new ScriptedAdapter("writer-p", scripts.writer, "wm")
  };
  const byProvider = new Map(Object.values(adapters).map((adapter) => [adapter.id, adapter]));
  const bus = new EventBus();
  const warnings: string[] = [];
  const dispatcher = new Dispatcher({
    resolveAdapter: (provider) => {
      const adapter = byProvider.get(provider);
      if (!adapter) {
        throw new Error(`no adapter for ${provider}`);
      }
      return adapter;
    },
    rateLimiter: new RateLimiter({ now: () => 0 }),
    retry: { maxRetries: 3, backoffMs: 0 },
    sleep: async () => {}
  });
  const orchestrator = new Orchestrator({
    dispatcher,
    roles: ROLES,
    prompts: PROMPTS,
    workflow: {
      max_iterations: 5,
      max_parse_attempts: 2,
      protocol_violation_policy: "carry_forward",
      include_history: false,
      ...workflow
    },
    bus,
    warnings: { warn: (message) => warnings.push(message) },
    now: () => new Date("2024-01-01T00:00:00.000Z")
  });
  const run = (text: string, options?: WorkflowRunOptions) =>
    orchestrator.run(text, { workflowId: "wf-1", ...options });
  const record = <T extends EventType>(type: T): Array<EventPayloadMap[T]> => {
    const seen: Array<EventPayloadMap[T]> = [];
    bus.subscribe(type, (payload) => {
      seen.push(payload);
    });
    return seen;
  };
  return { adapters, warnings, run, record };
};

describe("Orchestrator", () => {
  it("goes straight to the writer when the first analysis is ready", async () => {
    const { adapters, run, record } = harness({ analyzer: [ready()], corrector: [], writer: [written()] });
    const states = record("workflow.state");

    const result = await run("Print ok.");

    expect(result.status).toBe("ready");
    expect(result.correction_iterations).toBe(0);
    expect(result.code).toBe("print('ok')");
    expect(result.tests).toBe("assert True");
    expect(result.assumptions).toEqual(["none"]);
    expect(result.finalized_requirement).toEqual({ version: 1, text: "Print ok." });
    expect(result.trace.rounds).toHaveLength(1);
    expect(result.trace.rounds[0]?.corrector).toBeUndefined();
    expect(result.trace.writer?.requirement.version).toBe(1);
    expect(result.trace.incomplete).toBe(false);
    expect(validateTrace(result.trace)).toBe(true);
    expect(adapters.corrector.calls).toBe(0);
    expect(states.map((payload) => payload.to)).toEqual(["ANALYZING", "READY", "WRITING", "DONE"]);
  });

  it("hands the last requirement to the writer once the iteration budget is spent", async () => {
    const { adapters, run, record } = harness({
      analyzer: [notReady("i1"), notReady("i1"), notReady("i1"), notReady("i1"), notReady("i1")],
      corrector: [corrected("v2", "i1"), corrected("v3", "i1"), corrected("v4", "i1"), corrected("v5", "i1")],
      writer: [written()]
    });
    const states = record("workflow.state");
    const completed = record("workflow.completed");

    const result = await run("v1");

    expect(result.status).toBe("budget_exceeded");
    expect(result.trace.rounds).toHaveLength(5);
    expect(result.correction_iterations).toBe(4);
    expect(adapters.analyzer.calls).toBe(5);
    expect(adapters.corrector.calls).toBe(4);
    expect(result.trace.rounds.map((round) => round.requirement.version)).toEqual([1, 2, 3, 4, 5]);
    expect(result.trace.rounds[4]?.corrector).toBeUndefined();
    expect(result.finalized_requirement).toEqual({ version: 5, text: "v5" });
    expect(result.trace.writer?.requirement).toEqual({ version: 5, text: "v5" });
    expect(validateTrace(result.trace)).toBe(true);
    expect(states.map((payload) => payload.to).slice(-3)).toEqual([
      "BUDGET_EXCEEDED",
      "WRITING",
      "DONE"
    ]);
    expect(completed).toEqual([
      {
        workflow_id: "wf-1",
        completed_at: "2024-01-01T00:00:00.000Z",
        status: "budget_exceeded",
        rounds: 5,
        correction_iterations: 4
      }
    ]);
  });

  it("carries an issue the corrector omitted into the next round unchanged", async () => {
    const { adapters, run, warnings, record } = harness({
      analyzer: [notReady("i1", "i2"), ready()],
      corrector: [corrected("v2", "i1")],
      writer: [written()]
    });
    const correctedRounds = record("round.corrected");

    const result = await run("v1");

    expect(result.status).toBe("ready");
    const second = result.trace.rounds[1];
    expect(second?.analyzer.carried_issue_ids).toEqual(["i2"]);
    expect(second?.analyzer.issue_list.issues).toEqual([
      { id: "i2", category: "ambiguity", description: "unclear i2" }
    ]);
    expect(result.trace.rounds[0]?.corrector?.unresolved_issue_ids).toEqual(["i2"]);
    expect(adapters.analyzer.prompts[1]?.user).toContain(
      "Issues still open from the previous round:\n- [i2] (ambiguity) unclear i2"
    );
    expect(warnings).toEqual(["Round 1: Issue i2 has no resolution; carrying it into the next round"]);
    expect(correctedRounds).toEqual([
      {
        workflow_id: "wf-1",
        round: 1,
        resolved_issue_ids: ["i1"],
        unresolved_issue_ids: ["i2"],
        requirement_version: 2
      }
    ]);
  });

  it("accounts for every issue of a corrected round exactly once", async () => {
    const { run } = harness({
      analyzer: [notReady("a", "b", "c"), ready()],
      corrector: [corrected("v2", "c", "a", "ghost", "a")],
      writer: [written()]
    });

    const result = await run("v1");
    const corrector = result.trace.rounds[0]?.corrector;

    const accounted = [
      ...(corrector?.accepted_resolutions.map((resolution) => resolution.issue_id) ?? []),
      ...(corrector?.unresolved_issue_ids ?? [])
    ];
    expect(accounted.sort()).toEqual(["a", "b", "c"]);
    expect(corrector?.violations.map((violation) => violation.kind)).toEqual([
      "unknown_issue",
      "duplicate_resolution",
      "dropped_issue"
    ]);
  });

  it("fails on the first protocol violation under the fail policy", async () => {
    const { adapters, run } = harness(
      { analyzer: [notReady("i1", "i2")], corrector: [corrected("v2", "i1")], writer: [written()] },
      { protocol_violation_policy: "fail" }
    );

    const result = await run("v1");

    expect(result.status).toBe("failed");
    expect(result.error).toMatchObject({ code: "protocol_violation", state: "CORRECTING" });
    expect(result.code).toBe("");
    expect(result.trace.rounds[0]?.corrector?.violations).toHaveLength(1);
    expect(adapters.writer.calls).toBe(0);
  });

  it("survives a rate-limited analyzer call", async () => {
    const throttled = new ProviderError("HTTP 429", { kind: "transient", provider: "analyzer-p", status: 429 });
    const { adapters, run } = harness({ analyzer: [throttled, ready()], corrector: [], writer: [written()] });

    const result = await run("Print ok.");

    expect(result.status).toBe("ready");
    expect(adapters.analyzer.calls).toBe(2);
    expect(result.trace.rounds[0]?.analyzer.attempts).toBe(1);
  });

  it("returns a failed result with the partial trace when a role fails", async () => {
    const fatal = new ProviderError("HTTP 401", { kind: "fatal", provider: "corrector-p", status: 401 });
    const { run, record } = harness({ analyzer: [notReady("i1")], corrector: [fatal], writer: [] });
    const failures = record("workflow.failed");

    const result = await run("v1");

    expect(result.status).toBe("failed");
    expect(result.error).toEqual({ name: "ProviderError", message: "HTTP 401", state: "CORRECTING" });
    expect(result.trace.incomplete).toBe(true);
    expect(result.trace.status).toBe("failed");
    expect(result.trace.rounds).toHaveLength(1);
    expect(result.trace.writer).toBeNull();
    expect(result.finalized_requirement).toEqual({ version: 1, text: "v1" });
    expect(validateTrace(result.trace)).toBe(true);
    expect(failures).toEqual([
      {
        workflow_id: "wf-1",
        completed_at: "2024-01-01T00:00:00.000Z",
        state: "CORRECTING",
        error: "HTTP 401",
        error_code: undefined
      }
    ]);
  });

  it("fails with role_failed once analyzer replies stay malformed", async () => {
    const { run } = harness({ analyzer: ["nope", "still nope"], corrector: [], writer: [] });

    const result = await run("v1");

    expect(result.status).toBe("failed");
    expect(result.error).toMatchObject({ name: "RoleFailedError", code: "role_failed", state: "ANALYZING" });
    expect(result.trace.rounds).toHaveLength(0);
  });

  it("fails in WRITING when the writer drops a signature", async () => {
    const { run } = harness({
      analyzer: [ready()],
      corrector: [],
      writer: [written("def add(a, b):\n    return a + b")]
    });

    const result = await run("Implement def add(a: int, b: int) -> int: returns the sum.");

    expect(result.status).toBe("failed");
    expect(result.error).toMatchObject({ code: "signature_mismatch", state: "WRITING" });
    expect(result.trace.rounds).toHaveLength(1);
    expect(result.trace.writer).toBeNull();
  });

  it("writes code for a prose requirement that names a function in words", async () => {
    const prose = "Write a function add(a, b) that returns the sum of two integers.";
    const { adapters, run } = harness({
      analyzer: [notReady("i1"), ready()],
      corrector: [corrected(`${prose} Both inputs are int.`, "i1")],
      writer: [written("def add(a, b):\n    return a + b")]
    });

    const result = await run(prose);

    expect(result.status).toBe("ready");
    expect(result.correction_iterations).toBe(1);
    expect(result.code).toBe("def add(a, b):\n    return a + b");
    expect(result.trace.writer?.preserved_signatures).toEqual([]);
    expect(adapters.corrector.calls).toBe(1);
    expect(validateTrace(result.trace)).toBe(true);
  });

  it("keeps an analyzer issue that reuses a carried id as a separate issue", async () => {
    const reused = JSON.stringify({
      ready_for_codegen: false,
      issues: [{ id: "i2", category: "conflict", description: "sort order conflicts with the example" }]
    });
    const { adapters, run, warnings, record } = harness({
      analyzer: [notReady("i1", "i2"), reused, ready()],
      corrector: [corrected("v2", "i1"), corrected("v3", "i2", "R2-1")],
      writer: [written()]
    });
    const violations = record("protocol.violation");

    const result = await run("v1");

    expect(result.status).toBe("ready");
    const second = result.trace.rounds[1];
    expect(second?.analyzer.issue_list.issues).toEqual([
      { id: "i2", category: "ambiguity", description: "unclear i2" },
      { id: "R2-1", category: "conflict", description: "sort order conflicts with the example" }
    ]);
    expect(second?.analyzer.violations).toEqual([
      {
        kind: "id_collision",
        issue_id: "i2",
        message: "Analyzer reused carried issue id i2 for a different issue; recorded it as R2-1"
      }
    ]);
    expect(second?.corrector?.accepted_resolutions.map((resolution) => resolution.issue_id)).toEqual(["i2", "R2-1"]);
    expect(adapters.corrector.prompts[1]?.user).toContain("- [R2-1] (conflict) sort order conflicts with the example");
    expect(violations.map((payload) => [payload.round, payload.kind, payload.issue_id])).toEqual([
      [1, "dropped_issue", "i2"],
      [2, "id_collision", "i2"]
    ]);
    expect(warnings[1]).toBe("Round 2: Analyzer reused carried issue id i2 for a different issue; recorded it as R2-1");
    expect(validateTrace(result.trace)).toBe(true);
  });

  it("stops between rounds when asked to", async () => {
    let checks = 0;
    const { adapters, run } = harness({
      analyzer: [notReady("i1"), ready()],
      corrector: [corrected("v2", "i1")],
      writer: [written()]
    });

    const result = await run("v1", { shouldStop: () => checks++ >= 1 });

    expect(result.status).toBe("failed");
    expect(result.error).toMatchObject({ code: "aborted", state: "CORRECTING" });
    expect(result.trace.rounds).toHaveLength(1);
    expect(result.correction_iterations).toBe(1);
    expect(adapters.analyzer.calls).toBe(1);
  });

  it("does not start when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const { adapters, run } = harness({ analyzer: [ready()], corrector: [], writer: [written()] });

    const result = await run("v1", { signal: controller.signal });

    expect(result.error).toMatchObject({ code: "aborted", state: "START" });
    expect(result.trace.rounds).toHaveLength(0);
    expect(adapters.analyzer.calls).toBe(0);
  });

  it("shows the analyzer earlier rounds when history is enabled", async () => {
    const { adapters, run } = harness(
      { analyzer: [notReady("i1"), ready()], corrector: [corrected("v2", "i1")], writer: [written()] },
      { include_history: true }
    );

    await run("v1");

    expect(adapters.analyzer.prompts[0]?.user).toBe("Requirement (version 1):\nv1");
    expect(adapters.analyzer.prompts[1]?.user).toBe(
      ["Requirement (version 2):", "v2", "", "Previous rounds:", "- Round 1: 1 issue(s) (i1)", "  i1: resolved i1"].join("\n")
    );
  });
});
