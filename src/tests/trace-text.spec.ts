import { describe, expect, it } from "vitest";

import { renderTraceText } from "../artifacts/trace-text.js";
import type { Trace } from "../ledger/types.js";

const call = { attempts: 1, raw_text: "{}", provider: "demo", model: "demo-model" };

const trace: Trace = {
  workflow_id: "wf-1",
  started_at: "2026-01-01T00:00:00.000Z",
  completed_at: "2026-01-01T00:00:05.000Z",
  initial_requirement: { version: 0, text: "Sort a list." },
  rounds: [
    {
      round: 1,
      requirement: { version: 0, text: "Sort a list." },
      analyzer: {
        ...call,
        issue_list: {
          issues: [{ id: "R1-1", category: "ambiguity", description: "Order unspecified", clarifying_question: "Ascending?" }],
          ready_for_codegen: false
        },
        carried_issue_ids: []
      },
      corrector: {
        ...call,
        attempts: 2,
        output: {
          updated_requirement: "Sort a list ascending.",
          resolutions: [{ issue_id: "R1-1", action_taken: "chose ascending", assumption: "numbers only" }],
          open_questions: []
        },
        accepted_resolutions: [{ issue_id: "R1-1", action_taken: "chose ascending", assumption: "numbers only" }],
        unresolved_issue_ids: [],
        violations: [],
        resulting_requirement: { version: 1, text: "Sort a list ascending." }
      }
    },
    {
      round: 2,
      requirement: { version: 1, text: "Sort a list ascending." },
      analyzer: { ...call, issue_list: { issues: [], ready_for_codegen: true }, carried_issue_ids: [] }
    }
  ],
  writer: {
    ...call,
    requirement: { version: 1, text: "Sort a list ascending." },
    output: { code: "def sort_list(xs):\n    return sorted(xs)", tests: "", assumptions: ["numbers only"] },
    preserved_signatures: []
  },
  status: "ready",
  incomplete: false,
  max_iterations: 5,
  prompts: []
};

describe("renderTraceText", () => {
  it("renders every round, the writer and the summary header", () => {
    expect(renderTraceText(trace).split("\n")).toEqual([
      "Workflow wf-1",
      "Status: ready",
      "Rounds: 2 of max 5 | Correction iterations: 1",
      "Started: 2026-01-01T00:00:00.000Z",
      "Completed: 2026-01-01T00:00:05.000Z",
      "",
      "Initial requirement (v0):",
      "  Sort a list.",
      "",
      "== Round 1 (requirement v0) ==",
      "Analyzer (demo/demo-model, 1 attempt): not ready, 1 issue(s)",
      "  [R1-1] ambiguity: Order unspecified",
      "      ? Ascending?",
      "Corrector (demo/demo-model, 2 attempts): requirement v1",
      "  R1-1 -> chose ascending (assumption: numbers only)",
      "  Updated requirement:",
      "    Sort a list ascending.",
      "",
      "== Round 2 (requirement v1) ==",
      "Analyzer (demo/demo-model, 1 attempt): ready, 0 issue(s)",
      "",
      "== Writer (requirement v1) ==",
      "Writer (demo/demo-model, 1 attempt)",
      "Assumptions:",
      "  - numbers only",
      "Code:",
      "  def sort_list(xs):",
      "      return sorted(xs)",
      ""
    ]);
  });

  it("marks unfinished traces and their error", () => {
    const failed: Trace = {
      ...trace,
      rounds: trace.rounds.slice(0, 1),
      writer: null,
      status: "failed",
      incomplete: true,
      completed_at: null,
      error: { name: "RoleFailedError", message: "corrector gave up", state: "CORRECTING" }
    };

    const lines = renderTraceText(failed).split("\n");

    expect(lines[1]).toBe("Status: failed (incomplete)");
    expect(lines[4]).toBe("Completed: -");
    expect(lines[lines.length - 2]).toBe("Error in CORRECTING: RoleFailedError: corrector gave up");
  });

  it("shows severity, evidence and analyzer id collisions", () => {
    const collided: Trace = {
      ...trace,
      rounds: [
        {
          round: 1,
          requirement: { version: 0, text: "Sort a list." },
          analyzer: {
            ...call,
            issue_list: {
              issues: [
                { id: "R1-1", category: "conflict", description: "Order clashes", severity: "high", evidence: "Sort a list." }
              ],
              ready_for_codegen: true
            },
            carried_issue_ids: [],
            violations: [{ kind: "id_collision", issue_id: "R1-1", message: "reused" }]
          }
        }
      ]
    };

    const lines = renderTraceText(collided).split("\n");

    expect(lines.slice(9, 14)).toEqual([
      "== Round 1 (requirement v0) ==",
      "Analyzer (demo/demo-model, 1 attempt): ready, 1 issue(s)",
      "  [R1-1] conflict [high]: Order clashes",
      "      evidence: Sort a list.",
      "  violation id_collision R1-1: reused"
    ]);
  });
});
