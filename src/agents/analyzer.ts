import { validateAnalyzerReply } from "../config/schema-validation.js";
import {
  ISSUE_CATEGORIES,
  ISSUE_SEVERITIES,
  type Issue,
  type IssueCategory,
  type IssueSeverity,
  type IssueList,
  type Requirement,
  type Round
} from "../ledger/types.js";
import { buildAnalyzerPrompt } from "./prompts.js";
import { parseReply, runRole, type RoleContext } from "./role.js";
import type { AnalyzerReply, ParseOutcome, RoleReply } from "./types.js";

export type AnalyzerInput = {
  requirement: Requirement;
  round: number;
  /** Issues the previous Corrector left unresolved. */
  carriedIssues: ReadonlyArray<Issue>;
  history?: ReadonlyArray<Round>;
};

const CATEGORY_SYNONYMS: Record<string, IssueCategory> = {
  ambiguous: "ambiguity",
  inconsistent: "inconsistency",
  incomplete: "incompleteness",
  underspecified: "incompleteness",
  boundary: "incompleteness",
  edge_case: "incompleteness",
  conflicting: "conflict",
  contradiction: "conflict",
  missing: "missing_context",
  missing_information: "missing_context",
  context: "missing_context"
};

const isIssueCategory = (value: string): value is IssueCategory =>
  ISSUE_CATEGORIES.some((category) => category === value);

export const normalizeCategory = (raw: string): IssueCategory | null => {
  const key = raw.trim().toLowerCase().replace(/[\s-]+/g, "_");
  if (isIssueCategory(key)) {
    return key;
  }
  return CATEGORY_SYNONYMS[key] ?? null;
};

const isIssueSeverity = (value: string): value is IssueSeverity =>
  ISSUE_SEVERITIES.some((severity) => severity === value);

/** `critical` folds into `high`; any other unrecognised label becomes `medium`. */
export const normalizeSeverity = (raw: string | null | undefined): IssueSeverity | undefined => {
  if (typeof raw !== "string" || raw.trim().length === 0) {
    return undefined;
  }
  const key = raw.trim().toLowerCase();
  if (key === "critical") {
    return "high";
  }
  return isIssueSeverity(key) ? key : "medium";
};

const optionalText = (value: string | null | undefined): string | undefined => {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

/**
 * Maps category synonyms onto the five categories and assigns `R<round>-<n>` ids to issues
 * the model left unnamed, skipping `reservedIds`. Unknown categories and repeated ids make
 * the reply malformed.
 */
export const normalizeIssueList = (
  reply: AnalyzerReply,
  round: number,
  reservedIds: ReadonlyArray<string> = []
): ParseOutcome<IssueList> => {
  const reasons: string[] = [];
  const explicitIds = new Set<string>();
  for (const issue of reply.issues) {
    const id = issue.id?.trim();
    if (!id) {
      continue;
    }
    if (explicitIds.has(id)) {
      reasons.push(`duplicate issue id ${id}`);
    }
    explicitIds.add(id);
  }

  const reserved = new Set(reservedIds);
  let counter = 0;
  const nextId = (): string => {
    let candidate: string;
    do {
      counter += 1;
      candidate = `R${round}-${counter}`;
    } while (explicitIds.has(candidate) || reserved.has(candidate));
    return candidate;
  };

  const issues: Issue[] = [];
  reply.issues.forEach((raw, index) => {
    const category = normalizeCategory(raw.category);
    if (!category) {
      reasons.push(`issues[${index}] has unknown category "${raw.category}"`);
      return;
    }
    const questions = [raw.clarifying_question, ...(raw.clarifying_questions ?? [])]
      .map(optionalText)
      .filter((question): question is string => question !== undefined);
    const severity = normalizeSeverity(raw.severity);
    const evidence = optionalText(raw.evidence);
    issues.push({
      id: raw.id?.trim() || nextId(),
      category,
      description: raw.description.trim(),
      ...(questions.length > 0 ? { clarifying_question: questions.join(" ") } : {}),
      ...(severity ? { severity } : {}),
      ...(evidence ? { evidence } : {})
    });
  });

  if (reasons.length > 0) {
    return { ok: false, reasons };
  }

  const normalized = optionalText(reply.normalized_requirement);
  const reasoning = optionalText(reply.reasoning);
  return {
    ok: true,
    value: {
      issues,
      ready_for_codegen: reply.ready_for_codegen,
      ...(normalized ? { normalized_requirement: normalized } : {}),
      ...(reasoning ? { reasoning } : {})
    }
  };
};

export const runAnalyzer = (
  context: RoleContext,
  input: AnalyzerInput
): Promise<RoleReply<IssueList>> =>
  runRole(
    "analyzer",
    context,
    buildAnalyzerPrompt(context.template, input),
    (raw) =>
      parseReply(raw, "analyzer", validateAnalyzerReply, (reply) =>
        normalizeIssueList(
          reply,
          input.round,
          input.carriedIssues.map((issue) => issue.id)
        )
      )
  );
