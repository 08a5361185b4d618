import type { Issue, IssueList, Requirement, Round } from "../ledger/types.js";
import type { Prompt } from "../providers/types.js";

const formatIssue = (issue: Issue): string => {
  const severity = issue.severity ? `, ${issue.severity}` : "";
  const lines = [`- [${issue.id}] (${issue.category}${severity}) ${issue.description}`];
  if (issue.evidence) {
    lines.push(`  Evidence: ${issue.evidence}`);
  }
  if (issue.clarifying_question) {
    lines.push(`  Question: ${issue.clarifying_question}`);
  }
  return lines.join("\n");
};

const formatRequirement = (requirement: Requirement): string =>
  `Requirement (version ${requirement.version}):\n${requirement.text.trim()}`;

const formatHistory = (history: ReadonlyArray<Round>): string => {
  const lines = ["Previous rounds:"];
  for (const round of history) {
    const ids = round.analyzer.issue_list.issues.map((issue) => issue.id);
    lines.push(
      `- Round ${round.round}: ${ids.length} issue(s)${ids.length > 0 ? ` (${ids.join(", ")})` : ""}`
    );
    for (const resolution of round.corrector?.accepted_resolutions ?? []) {
      lines.push(`  ${resolution.issue_id}: ${resolution.action_taken}`);
    }
  }
  return lines.join("\n");
};

export const buildAnalyzerPrompt = (
  template: string,
  input: {
    requirement: Requirement;
    carriedIssues: ReadonlyArray<Issue>;
    history?: ReadonlyArray<Round>;
  }
): Prompt => {
  const sections = [formatRequirement(input.requirement)];
  if (input.carriedIssues.length > 0) {
    sections.push(
      ["Issues still open from the previous round:", ...input.carriedIssues.map(formatIssue)].join("\n")
    );
  }
  if (input.history && input.history.length > 0) {
    sections.push(formatHistory(input.history));
  }
  return { system: template, user: sections.join("\n\n") };
};

export const buildCorrectorPrompt = (
  template: string,
  input: { requirement: Requirement; issueList: IssueList }
): Prompt => {
  const issues = input.issueList.issues.length > 0
    ? input.issueList.issues.map(formatIssue).join("\n")
    : "- (none reported; tighten the requirement where it is vague)";
  return {
    system: template,
    user: [formatRequirement(input.requirement), `Issues to resolve:\n${issues}`].join("\n\n")
  };
};

/** The Writer sees the finalized requirement and nothing from the clarification history. */
export const buildWriterPrompt = (template: string, requirement: Requirement): Prompt => ({
  system: template,
  user: `Finalized requirement:\n${requirement.text.trim()}`
});
