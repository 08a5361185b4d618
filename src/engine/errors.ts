import type { ViolationKind } from "../ledger/types.js";

export type AgentRole = "analyzer" | "corrector" | "writer";

export class ConfigError extends Error {
  readonly code = "config_invalid";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class MalformedResponseError extends Error {
  readonly code = "malformed_response";
  role: AgentRole;
  rawText: string;
  reasons: string[];

  constructor(role: AgentRole, rawText: string, reasons: string[]) {
    super(`${role} reply could not be parsed: ${reasons.join("; ") || "no JSON object found"}`);
    this.name = "MalformedResponseError";
    this.role = role;
    this.rawText = rawText;
    this.reasons = reasons;
  }
}

export class ProtocolViolationError extends Error {
  readonly code = "protocol_violation";
  round: number;
  issueId: string;
  kind: ViolationKind;

  constructor(options: { round: number; issueId: string; kind: ViolationKind; message: string }) {
    super(options.message);
    this.name = "ProtocolViolationError";
    this.round = options.round;
    this.issueId = options.issueId;
    this.kind = options.kind;
  }
}

export class SignatureMismatchError extends Error {
  readonly code = "signature_mismatch";
  missing: string[];

  constructor(missing: string[]) {
    super(`Generated code does not preserve the required signature(s): ${missing.join(" | ")}`);
    this.name = "SignatureMismatchError";
    this.missing = missing;
  }
}

export class RoleFailedError extends Error {
  readonly code = "role_failed";
  role: AgentRole;
  attempts: number;
  override cause: unknown;

  constructor(role: AgentRole, attempts: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${role} failed after ${attempts} attempt(s): ${detail}`);
    this.name = "RoleFailedError";
    this.role = role;
    this.attempts = attempts;
    this.cause = cause;
  }
}

export class WorkflowAbortedError extends Error {
  readonly code = "aborted";

  constructor(message = "Workflow aborted between rounds") {
    super(message);
    this.name = "WorkflowAbortedError";
  }
}

export const errorCode = (error: unknown): string | undefined => {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  const code = (error as { code?: unknown }).code;
  if (typeof code !== "string") {
    return undefined;
  }
  const trimmed = code.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};
