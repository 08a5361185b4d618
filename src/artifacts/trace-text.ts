import type { AgentCallRecord, Round, Trace, WriterStep } from "../ledger/types.js";

const indent = (text: string, prefix = "  "): string[] =>
  text.split(/\r?\n/).map((line) => (line.length > 0 ? `${prefix}${line}` : ""));

const describeCall = (label: string, call: AgentCallRecord): string =>
  `${label} (${call.provider}/${call.model}, ${call.attempts} attempt${call.attempts === 1 ? "" : "s"})`;

const renderRound = (round: Round): string[] => {
  const lines = [`== Round ${round.round} (requirement v${round.requirement.version}) ==`];
  const { issue_list: issueList } = round.analyzer;
  lines.push(
    `${describeCall("Analyzer", round.analyzer)}: ${issueList.ready_for_codegen ? "ready" : "not ready"}, ${issueList.issues.length} issue(s)`
  );
  const carried = new Set(round.analyzer.carried_issue_ids);
  for (const issue of issueList.issues) {
    const severity = issue.severity ? ` [${issue.severity}]` : "";
    lines.push(
      `  [${issue.id}] ${issue.category}${severity}: ${issue.description}${carried.has(issue.id) ? " (carried)" : ""}`
    );
    if (issue.evidence) {
      lines.push(`      evidence: ${issue.evidence}`);
    }
    if (issue.clarifying_question) {
      lines.push(`      ? ${issue.clarifying_question}`);
    }
  }
  for (const violation of round.analyzer.violations ?? []) {
    lines.push(`  violation ${violation.kind} ${violation.issue_id}: ${violation.message}`);
  }
  if (issueList.reasoning) {
    lines.push(`  reasoning: ${issueList.reasoning}`);
  }

  const corrector = round.corrector;
  if (!corrector) {
    return lines;
  }
  lines.push(`${describeCall("Corrector", corrector)}: requirement v${corrector.resulting_requirement.version}`);
  for (const resolution of corrector.accepted_resolutions) {
    const assumption = resolution.assumption ? ` (assumption: ${resolution.assumption})` : "";
    lines.push(`  ${resolution.issue_id} -> ${resolution.action_taken}${assumption}`);
  }
  if (corrector.unresolved_issue_ids.length > 0) {
    lines.push(`  unresolved: ${corrector.unresolved_issue_ids.join(", ")}`);
  }
  for (const violation of corrector.violations) {
    lines.push(`  violation ${violation.kind} ${violation.issue_id}: ${violation.message}`);
  }
  for (const question of corrector.output.open_questions) {
    lines.push(`  open question: ${question}`);
  }
  lines.push("  Updated requirement:");
  lines.push(...indent(corrector.resulting_requirement.text, "    "));
  return lines;
};

const renderWriter = (writer: WriterStep): string[] => {
  const lines = [
    `== Writer (requirement v${writer.requirement.version}) ==`,
    describeCall("Writer", writer)
  ];
  if (writer.preserved_signatures.length > 0) {
    lines.push("Signatures preserved:");
    lines.push(...writer.preserved_signatures.map((signature) => `  ${signature}`));
  }
  if (writer.output.assumptions.length > 0) {
    lines.push("Assumptions:");
    lines.push(...writer.output.assumptions.map((assumption) => `  - ${assumption}`));
  }
  lines.push("Code:");
  lines.push(...indent(writer.output.code));
  if (writer.output.tests) {
    lines.push("Tests:");
    lines.push(...indent(writer.output.tests));
  }
  return lines;
};

/** Human-readable rendering of a trace; every line is derived from the trace alone. */
export const renderTraceText = (trace: Trace): string => {
  const corrections = trace.rounds.filter((round) => round.corrector).length;
  const lines = [
    `Workflow ${trace.workflow_id}`,
    `Status: ${trace.status ?? "running"}${trace.incomplete ? " (incomplete)" : ""}`,
    `Rounds: ${trace.rounds.length} of max ${trace.max_iterations} | Correction iterations: ${corrections}`,
    `Started: ${trace.started_at}`,
    `Completed: ${trace.completed_at ?? "-"}`,
    "",
    `Initial requirement (v${trace.initial_requirement.version}):`,
    ...indent(trace.initial_requirement.text)
  ];

  for (const round of trace.rounds) {
    lines.push("", ...renderRound(round));
  }
  if (trace.writer) {
    lines.push("", ...renderWriter(trace.writer));
  }
  if (trace.error) {
    lines.push("", `Error in ${trace.error.state}: ${trace.error.name}: ${trace.error.message}`);
  }
  return `${lines.join("\n")}\n`;
};
