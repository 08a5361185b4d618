import { randomUUID } from "node:crypto";

import { runAnalyzer } from "../agents/analyzer.js";
import { runCorrector } from "../agents/corrector.js";
import type { RoleContext } from "../agents/role.js";
import { runWriter } from "../agents/writer.js";
import type { ResolvedRole, RoleName, WorkflowConfig } from "../config/types.js";
import type { Dispatcher } from "../dispatch/dispatcher.js";
import type { EventBus } from "../events/event-bus.js";
import type { WorkflowState } from "../events/types.js";
import { mergeCarriedIssues, reconcileResolutions } from "../ledger/reconcile.js";
import { TraceRecorder } from "../ledger/trace-recorder.js";
import type {
  Issue,
  PromptFingerprint,
  ProtocolViolation,
  Requirement,
  TraceError,
  WorkflowResult,
  WorkflowStatus
} from "../ledger/types.js";
import type { WarningSink } from "../utils/warnings.js";
import { ProtocolViolationError, WorkflowAbortedError, errorCode } from "./errors.js";

export type RolePrompt = {
  text: string;
  sha256: string;
};

export type OrchestratorOptions = {
  dispatcher: Dispatcher;
  roles: Record<RoleName, ResolvedRole>;
  prompts: Record<RoleName, RolePrompt>;
  workflow: Required<WorkflowConfig>;
  bus?: EventBus;
  warnings?: WarningSink;
  now?: () => Date;
};

export type WorkflowRunOptions = {
  workflowId?: string;
  /** Checked between rounds; returning true aborts the workflow as failed. */
  shouldStop?: () => boolean;
  signal?: AbortSignal;
};

const ROLE_NAMES: RoleName[] = ["analyzer", "corrector", "writer"];

const toTraceError = (error: unknown, state: WorkflowState): TraceError => {
  const code = errorCode(error);
  return {
    name: error instanceof Error ? error.name : "Error",
    message: error instanceof Error ? error.message : String(error),
    ...(code ? { code } : {}),
    state
  };
};

/**
 * Drives one requirement through Analyzer/Corrector rounds and the Writer.
 *
 * States: START -> ANALYZING -> (READY | CORRECTING | BUDGET_EXCEEDED); CORRECTING loops
 * back to ANALYZING; READY and BUDGET_EXCEEDED go to WRITING -> DONE. Any fatal error
 * moves to FAILED. `run` resolves in every case; failures come back as
 * `status: "failed"` with the partial trace.
 */
export class Orchestrator {
  private readonly now: () => Date;

  constructor(private readonly options: OrchestratorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async run(requirementText: string, runOptions: WorkflowRunOptions = {}): Promise<WorkflowResult> {
    const { bus, workflow } = this.options;
    const workflowId = runOptions.workflowId ?? randomUUID();
    const startedAt = this.now().toISOString();
    const initialRequirement: Requirement = { version: 1, text: requirementText };
    const fingerprints: PromptFingerprint[] = ROLE_NAMES.map((role) => ({
      role,
      sha256: this.options.prompts[role].sha256
    }));
    const recorder = new TraceRecorder({
      workflowId,
      startedAt,
      initialRequirement,
      maxIterations: workflow.max_iterations,
      prompts: fingerprints
    });

    let state: WorkflowState = "START";
    let round = 0;
    let requirement = initialRequirement;
    let carried: Issue[] = [];
    let correctionIterations = 0;

    const transition = (to: WorkflowState): void => {
      bus?.emit({ type: "workflow.state", payload: { workflow_id: workflowId, from: state, to, round } });
      state = to;
    };

    const checkAbort = (): void => {
      if (runOptions.signal?.aborted || runOptions.shouldStop?.()) {
        throw new WorkflowAbortedError();
      }
    };

    const context = (role: RoleName): RoleContext => ({
      dispatcher: this.options.dispatcher,
      config: this.options.roles[role],
      maxParseAttempts: workflow.max_parse_attempts,
      template: this.options.prompts[role].text,
      bus,
      workflowId
    });

    const reportViolations = (atRound: number, violations: ReadonlyArray<ProtocolViolation>): void => {
      for (const violation of violations) {
        bus?.emit({
          type: "protocol.violation",
          payload: {
            workflow_id: workflowId,
            round: atRound,
            kind: violation.kind,
            issue_id: violation.issue_id,
            message: violation.message
          }
        });
        this.options.warnings?.warn(`Round ${atRound}: ${violation.message}`, "ledger");
      }
      const [first] = violations;
      if (first && workflow.protocol_violation_policy === "fail") {
        throw new ProtocolViolationError({
          round: atRound,
          issueId: first.issue_id,
          kind: first.kind,
          message: first.message
        });
      }
    };

    bus?.emit({
      type: "workflow.started",
      payload: {
        workflow_id: workflowId,
        started_at: startedAt,
        requirement_version: requirement.version,
        max_iterations: workflow.max_iterations
      }
    });

    try {
      checkAbort();
      transition("ANALYZING");
      let status: WorkflowStatus;

      while (true) {
        round += 1;
        const analysis = await runAnalyzer(context("analyzer"), {
          requirement,
          round,
          carriedIssues: carried,
          history: workflow.include_history ? recorder.rounds : undefined
        });
        const merged = mergeCarriedIssues(analysis.value, carried, round);
        recorder.recordAnalysis(round, requirement, {
          ...analysis.record,
          issue_list: merged.issueList,
          carried_issue_ids: merged.carriedIds,
          ...(merged.violations.length > 0 ? { violations: merged.violations } : {})
        });
        bus?.emit({
          type: "round.analyzed",
          payload: {
            workflow_id: workflowId,
            round,
            requirement_version: requirement.version,
            ready_for_codegen: merged.issueList.ready_for_codegen,
            issue_ids: merged.issueList.issues.map((issue) => issue.id),
            carried_issue_ids: merged.carriedIds
          }
        });
        reportViolations(round, merged.violations);

        if (merged.issueList.ready_for_codegen) {
          transition("READY");
          status = "ready";
          break;
        }
        if (round >= workflow.max_iterations) {
          transition("BUDGET_EXCEEDED");
          status = "budget_exceeded";
          break;
        }

        transition("CORRECTING");
        const correction = await runCorrector(context("corrector"), {
          requirement,
          issueList: merged.issueList
        });
        correctionIterations += 1;

        const reconciliation = reconcileResolutions(merged.issueList, correction.value);
        const nextRequirement: Requirement = {
          version: requirement.version + 1,
          text: correction.value.updated_requirement
        };
        recorder.recordCorrection(round, {
          ...correction.record,
          output: correction.value,
          accepted_resolutions: reconciliation.accepted,
          unresolved_issue_ids: reconciliation.carried.map((issue) => issue.id),
          violations: reconciliation.violations,
          resulting_requirement: nextRequirement
        });

        reportViolations(round, reconciliation.violations);

        bus?.emit({
          type: "round.corrected",
          payload: {
            workflow_id: workflowId,
            round,
            resolved_issue_ids: reconciliation.accepted.map((resolution) => resolution.issue_id),
            unresolved_issue_ids: reconciliation.carried.map((issue) => issue.id),
            requirement_version: nextRequirement.version
          }
        });

        requirement = nextRequirement;
        carried = reconciliation.carried;
        checkAbort();
        transition("ANALYZING");
      }

      transition("WRITING");
      const written = await runWriter(context("writer"), requirement);
      recorder.recordWriter({
        ...written.record,
        requirement,
        output: written.value,
        preserved_signatures: written.preservedSignatures
      });
      bus?.emit({
        type: "writer.completed",
        payload: {
          workflow_id: workflowId,
          requirement_version: requirement.version,
          preserved_signatures: written.preservedSignatures
        }
      });
      transition("DONE");

      const completedAt = this.now().toISOString();
      const trace = recorder.finalize({ status, completedAt });
      bus?.emit({
        type: "workflow.completed",
        payload: {
          workflow_id: workflowId,
          completed_at: completedAt,
          status,
          rounds: trace.rounds.length,
          correction_iterations: correctionIterations
        }
      });

      return {
        status,
        finalized_requirement: requirement,
        code: written.value.code,
        tests: written.value.tests,
        assumptions: written.value.assumptions,
        trace,
        correction_iterations: correctionIterations
      };
    } catch (error) {
      const failedIn = state;
      const traceError = toTraceError(error, failedIn);
      transition("FAILED");
      const completedAt = this.now().toISOString();
      const trace = recorder.finalize({ status: "failed", completedAt, error: traceError });
      bus?.emit({
        type: "workflow.failed",
        payload: {
          workflow_id: workflowId,
          completed_at: completedAt,
          state: failedIn,
          error: traceError.message,
          error_code: traceError.code
        }
      });

      return {
        status: "failed",
        finalized_requirement: requirement,
        code: "",
        tests: "",
        assumptions: [],
        trace,
        correction_iterations: correctionIterations,
        error: traceError
      };
    }
  }
}
