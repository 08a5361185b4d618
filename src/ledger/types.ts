export const ISSUE_CATEGORIES = [
  "ambiguity",
  "inconsistency",
  "incompleteness",
  "conflict",
  "missing_context"
] as const;

export type IssueCategory = (typeof ISSUE_CATEGORIES)[number];

export const ISSUE_SEVERITIES = ["low", "medium", "high"] as const;

export type IssueSeverity = (typeof ISSUE_SEVERITIES)[number];

export type Requirement = {
  readonly version: number;
  readonly text: string;
};

export type Issue = {
  readonly id: string;
  readonly category: IssueCategory;
  readonly description: string;
  readonly clarifying_question?: string;
  readonly severity?: IssueSeverity;
  /** The requirement text the issue points at. */
  readonly evidence?: string;
};

/**
 * One round's findings, in the Analyzer's priority order.
 * `ready_for_codegen` is the only signal the orchestrator uses to stop clarifying;
 * the list may still hold informational issues when it is set.
 */
export type IssueList = {
  readonly issues: ReadonlyArray<Issue>;
  readonly ready_for_codegen: boolean;
  readonly normalized_requirement?: string;
  readonly reasoning?: string;
};

export type Resolution = {
  readonly issue_id: string;
  readonly action_taken: string;
  readonly assumption?: string;
};

export type CorrectorOutput = {
  readonly updated_requirement: string;
  readonly resolutions: ReadonlyArray<Resolution>;
  readonly open_questions: ReadonlyArray<string>;
};

export type WriterOutput = {
  readonly code: string;
  readonly tests: string;
  readonly assumptions: ReadonlyArray<string>;
};

export type ViolationKind = "unknown_issue" | "duplicate_resolution" | "dropped_issue" | "id_collision";

export type ProtocolViolation = {
  readonly kind: ViolationKind;
  readonly issue_id: string;
  readonly message: string;
};

export type AgentCallRecord = {
  readonly attempts: number;
  readonly raw_text: string;
  readonly provider: string;
  readonly model: string;
};

export type AnalyzerStep = AgentCallRecord & {
  readonly issue_list: IssueList;
  /** Ids of issues that were carried into this round unresolved from the previous one. */
  readonly carried_issue_ids: ReadonlyArray<string>;
  /** Carried ids the Analyzer reused for new issues; omitted when there were none. */
  readonly violations?: ReadonlyArray<ProtocolViolation>;
};

export type CorrectorStep = AgentCallRecord & {
  readonly output: CorrectorOutput;
  /** Resolutions that referenced an issue of this round; unknown and duplicate ids are excluded. */
  readonly accepted_resolutions: ReadonlyArray<Resolution>;
  readonly unresolved_issue_ids: ReadonlyArray<string>;
  readonly violations: ReadonlyArray<ProtocolViolation>;
  readonly resulting_requirement: Requirement;
};

export type Round = {
  readonly round: number;
  readonly requirement: Requirement;
  readonly analyzer: AnalyzerStep;
  readonly corrector?: CorrectorStep;
};

export type WriterStep = AgentCallRecord & {
  readonly requirement: Requirement;
  readonly output: WriterOutput;
  readonly preserved_signatures: ReadonlyArray<string>;
};

export type WorkflowStatus = "ready" | "budget_exceeded" | "failed";

export type TraceError = {
  readonly name: string;
  readonly message: string;
  readonly code?: string;
  readonly state: string;
};

export type PromptFingerprint = {
  readonly role: string;
  readonly sha256: string;
};

export type Trace = {
  readonly workflow_id: string;
  readonly started_at: string;
  readonly completed_at: string | null;
  readonly initial_requirement: Requirement;
  readonly rounds: ReadonlyArray<Round>;
  readonly writer: WriterStep | null;
  readonly status: WorkflowStatus | null;
  readonly incomplete: boolean;
  readonly max_iterations: number;
  readonly prompts: ReadonlyArray<PromptFingerprint>;
  readonly error?: TraceError;
};

/** The complete contract between the workflow core and any caller. */
export type WorkflowResult = {
  readonly status: WorkflowStatus;
  readonly finalized_requirement: Requirement;
  readonly code: string;
  readonly tests: string;
  readonly assumptions: ReadonlyArray<string>;
  readonly trace: Trace;
  readonly correction_iterations: number;
  readonly error?: TraceError;
};
