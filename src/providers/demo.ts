import { extractSignatures } from "../agents/signature.js";
import type { RoleName } from "../config/types.js";
import { ScriptedAdapter } from "./mock.js";
import type { Prompt } from "./types.js";

export const DEMO_PROVIDER_ID = "demo";

const versionOf = (prompt: Prompt): number => {
  const match = /Requirement \(version (\d+)\)/.exec(prompt.user);
  return match ? Number(match[1]) : 1;
};

const requirementOf = (prompt: Prompt): string => {
  const [, ...rest] = prompt.user.split("\n");
  const body = rest.join("\n");
  const cut = body.indexOf("\n\nIssues to resolve:");
  return (cut >= 0 ? body.slice(0, cut) : body).trim();
};

const analyzerReply = (prompt: Prompt): string => {
  if (versionOf(prompt) > 1) {
    return JSON.stringify({ ready_for_codegen: true, issues: [], reasoning: "Clarifications cover the open points." });
  }
  return JSON.stringify({
    ready_for_codegen: false,
    issues: [
      {
        category: "incompleteness",
        description: "Behaviour for empty or invalid input is not stated.",
        clarifying_question: "What should happen when the input is empty or invalid?"
      }
    ]
  });
};

const correctorReply = (prompt: Prompt): string => {
  const ids = Array.from(prompt.user.matchAll(/- \[([^\]]+)\]/g), (match) => match[1]);
  return JSON.stringify({
    updated_requirement: `${requirementOf(prompt)}\n\nEmpty or invalid input raises a ValueError.`,
    resolutions: ids.map((id) => ({
      issue_id: id,
      action_taken: "Stated the behaviour for empty or invalid input.",
      assumption: "Invalid input is reported with an exception."
    })),
    open_questions: []
  });
};

const writerReply = (prompt: Prompt): string => {
  const signatures = extractSignatures(prompt.user);
  const code = signatures.length > 0
    ? signatures.map((signature) => `def ${signature.tokens.join(" ")}:\n    raise NotImplementedError\n`).join("\n")
    : "def solve():\n    raise NotImplementedError\n";
  return JSON.stringify({
    code,
    tests: "def test_placeholder():\n    assert True\n",
    assumptions: ["Offline demo output; no model was called."]
  });
};

const REPLIES: Record<RoleName, (prompt: Prompt) => string> = {
  analyzer: analyzerReply,
  corrector: correctorReply,
  writer: writerReply
};

/**
 * Offline stand-in used by `--mock`: the Analyzer raises one issue, the Corrector settles
 * it, and the Writer stubs every signature in the requirement.
 */
export const createDemoAdapter = (role: RoleName): ScriptedAdapter =>
  new ScriptedAdapter(DEMO_PROVIDER_ID, [], `demo-${role}`, REPLIES[role]);

export const demoRoleFromModel = (model: string): RoleName | null => {
  const role = model.replace(/^demo-/, "");
  return role === "analyzer" || role === "corrector" || role === "writer" ? role : null;
};
