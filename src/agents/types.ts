import type { AgentCallRecord } from "../ledger/types.js";

/** Analyzer reply as the model writes it, before ids and categories are normalized. */
export type AnalyzerReply = {
  ready_for_codegen: boolean;
  issues: Array<{
    id?: string;
    category: string;
    description: string;
    clarifying_question?: string | null;
    clarifying_questions?: string[] | null;
    severity?: string | null;
    evidence?: string | null;
  }>;
  normalized_requirement?: string | null;
  reasoning?: string | null;
};

export type CorrectorReply = {
  updated_requirement: string;
  resolutions: Array<{
    issue_id: string;
    action_taken: string;
    assumption?: string | null;
  }>;
  open_questions?: string[];
};

export type WriterReply = {
  code: string;
  tests?: string | null;
  assumptions?: string[] | string | null;
};

export type ParseOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; reasons: string[] };

export type RoleReply<T> = {
  value: T;
  record: AgentCallRecord;
};
