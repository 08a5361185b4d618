import type { CorrectorOutput, Issue, IssueList, ProtocolViolation, Resolution } from "./types.js";

export type Reconciliation = {
  accepted: Resolution[];
  /** Open issues with no resolution; they go to the next Analyzer round unchanged. */
  carried: Issue[];
  violations: ProtocolViolation[];
};

/**
 * Matches the Corrector's resolutions against the issues it was given.
 *
 * - a resolution for an id that was not in the list is recorded as `unknown_issue` and ignored
 * - a second resolution for the same id is recorded as `duplicate_resolution`; the first wins
 * - an open issue with no resolution is recorded as `dropped_issue` and carried forward
 */
export const reconcileResolutions = (
  issueList: IssueList,
  output: CorrectorOutput
): Reconciliation => {
  const issuesById = new Map(issueList.issues.map((issue) => [issue.id, issue]));
  const resolved = new Set<string>();
  const accepted: Resolution[] = [];
  const violations: ProtocolViolation[] = [];

  for (const resolution of output.resolutions) {
    if (!issuesById.has(resolution.issue_id)) {
      violations.push({
        kind: "unknown_issue",
        issue_id: resolution.issue_id,
        message: `Resolution references unknown issue ${resolution.issue_id}`
      });
      continue;
    }
    if (resolved.has(resolution.issue_id)) {
      violations.push({
        kind: "duplicate_resolution",
        issue_id: resolution.issue_id,
        message: `Issue ${resolution.issue_id} was resolved more than once; keeping the first resolution`
      });
      continue;
    }
    resolved.add(resolution.issue_id);
    accepted.push(resolution);
  }

  const carried = issueList.issues.filter((issue) => !resolved.has(issue.id));
  for (const issue of carried) {
    violations.push({
      kind: "dropped_issue",
      issue_id: issue.id,
      message: `Issue ${issue.id} has no resolution; carrying it into the next round`
    });
  }

  return { accepted, carried, violations };
};

const sameIssue = (a: Issue, b: Issue): boolean =>
  a.category === b.category && a.description === b.description;

/**
 * The IssueList recorded for a round: the Analyzer's issues in its order, with carried
 * issues kept verbatim and carried issues the Analyzer omitted appended.
 *
 * An Analyzer issue that reuses a carried id for a different finding is kept under a fresh
 * `R<round>-<n>` id next to the carried issue, and the collision is reported as `id_collision`.
 */
export const mergeCarriedIssues = (
  issueList: IssueList,
  carried: ReadonlyArray<Issue>,
  round: number
): { issueList: IssueList; carriedIds: string[]; violations: ProtocolViolation[] } => {
  if (carried.length === 0) {
    return { issueList, carriedIds: [], violations: [] };
  }
  const carriedById = new Map(carried.map((issue) => [issue.id, issue]));
  const taken = new Set([...carriedById.keys(), ...issueList.issues.map((issue) => issue.id)]);
  let counter = 0;
  const freshId = (): string => {
    let candidate: string;
    do {
      counter += 1;
      candidate = `R${round}-${counter}`;
    } while (taken.has(candidate));
    taken.add(candidate);
    return candidate;
  };

  const issues: Issue[] = [];
  const placed = new Set<string>();
  const violations: ProtocolViolation[] = [];
  for (const issue of issueList.issues) {
    const previous = carriedById.get(issue.id);
    if (!previous) {
      issues.push(issue);
      continue;
    }
    issues.push(previous);
    placed.add(previous.id);
    if (sameIssue(previous, issue)) {
      continue;
    }
    const id = freshId();
    issues.push({ ...issue, id });
    violations.push({
      kind: "id_collision",
      issue_id: issue.id,
      message: `Analyzer reused carried issue id ${issue.id} for a different issue; recorded it as ${id}`
    });
  }
  issues.push(...carried.filter((issue) => !placed.has(issue.id)));

  return {
    issueList: { ...issueList, issues },
    carriedIds: carried.map((issue) => issue.id),
    violations
  };
};
