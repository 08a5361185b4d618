import type { AgentRole } from "../engine/errors.js";
import type { TokenUsage } from "../providers/types.js";
import type { ViolationKind, WorkflowStatus } from "../ledger/types.js";

export type WorkflowState =
  | "START"
  | "ANALYZING"
  | "CORRECTING"
  | "READY"
  | "BUDGET_EXCEEDED"
  | "WRITING"
  | "DONE"
  | "FAILED";

export type WorkflowStartedPayload = {
  workflow_id: string;
  started_at: string;
  requirement_version: number;
  max_iterations: number;
};

export type WorkflowStatePayload = {
  workflow_id: string;
  from: WorkflowState;
  to: WorkflowState;
  round: number;
};

export type RoundAnalyzedPayload = {
  workflow_id: string;
  round: number;
  requirement_version: number;
  ready_for_codegen: boolean;
  issue_ids: string[];
  carried_issue_ids: string[];
};

export type RoundCorrectedPayload = {
  workflow_id: string;
  round: number;
  resolved_issue_ids: string[];
  unresolved_issue_ids: string[];
  requirement_version: number;
};

export type ProtocolViolationPayload = {
  workflow_id: string;
  round: number;
  kind: ViolationKind;
  issue_id: string;
  message: string;
};

export type RoleRejectedPayload = {
  workflow_id?: string;
  role: AgentRole;
  attempt: number;
  max_attempts: number;
  raw_text: string;
  reasons: string[];
};

export type DispatchThrottledPayload = {
  workflow_id?: string;
  provider: string;
  wait_ms: number;
  reason: string;
};

export type DispatchRetryPayload = {
  workflow_id?: string;
  provider: string;
  model: string;
  attempt: number;
  delay_ms: number;
  error: string;
  status?: number;
};

export type DispatchCompletedPayload = {
  workflow_id?: string;
  provider: string;
  model: string;
  role?: AgentRole;
  attempts: number;
  latency_ms: number;
  usage: TokenUsage | null;
};

export type WriterCompletedPayload = {
  workflow_id: string;
  requirement_version: number;
  preserved_signatures: string[];
};

export type WorkflowCompletedPayload = {
  workflow_id: string;
  completed_at: string;
  status: WorkflowStatus;
  rounds: number;
  correction_iterations: number;
};

export type WorkflowFailedPayload = {
  workflow_id: string;
  completed_at: string;
  state: WorkflowState;
  error: string;
  error_code?: string;
};

export type ArtifactWrittenPayload = {
  path: string;
  record_count?: number;
};

export type WarningRaisedPayload = {
  message: string;
  source?: string;
  recorded_at: string;
};

export type Event =
  | { type: "workflow.started"; payload: WorkflowStartedPayload }
  | { type: "workflow.state"; payload: WorkflowStatePayload }
  | { type: "round.analyzed"; payload: RoundAnalyzedPayload }
  | { type: "round.corrected"; payload: RoundCorrectedPayload }
  | { type: "protocol.violation"; payload: ProtocolViolationPayload }
  | { type: "role.rejected"; payload: RoleRejectedPayload }
  | { type: "dispatch.throttled"; payload: DispatchThrottledPayload }
  | { type: "dispatch.retry"; payload: DispatchRetryPayload }
  | { type: "dispatch.completed"; payload: DispatchCompletedPayload }
  | { type: "writer.completed"; payload: WriterCompletedPayload }
  | { type: "workflow.completed"; payload: WorkflowCompletedPayload }
  | { type: "workflow.failed"; payload: WorkflowFailedPayload }
  | { type: "artifact.written"; payload: ArtifactWrittenPayload }
  | { type: "warning.raised"; payload: WarningRaisedPayload };

export type EventType = Event["type"];

export type EventPayloadMap = {
  [K in EventType]: Extract<Event, { type: K }>["payload"];
};

export type EventEnvelope<T extends EventType = EventType> = {
  type: T;
  version: 1;
  sequence: number;
  emitted_at: string;
  payload: EventPayloadMap[T];
};
