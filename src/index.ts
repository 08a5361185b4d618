export * from "./ledger/types.js";
export * from "./config/types.js";
export type { ProviderAdapter, Prompt, SamplingParams, GenerateResult, TokenUsage, ProviderType } from "./providers/types.js";
export { ProviderError, isTransientProviderError } from "./providers/types.js";
export {
  ConfigError,
  MalformedResponseError,
  ProtocolViolationError,
  RoleFailedError,
  SignatureMismatchError,
  WorkflowAbortedError
} from "./engine/errors.js";

export { loadConfig, resolveConfig } from "./config/resolve-config.js";
export { EventBus } from "./events/event-bus.js";
export type { Event, EventEnvelope, EventType, WorkflowState } from "./events/types.js";
export { RateLimiter, getSharedRateLimiter } from "./dispatch/rate-limiter.js";
export { Dispatcher } from "./dispatch/dispatcher.js";
export type { DispatchRequest, DispatchResult, DispatcherOptions } from "./dispatch/dispatcher.js";
export { createProviderAdapter } from "./providers/factory.js";
export { ScriptedAdapter } from "./providers/mock.js";
export { reconcileResolutions, mergeCarriedIssues } from "./ledger/reconcile.js";
export { TraceRecorder } from "./ledger/trace-recorder.js";
export { Orchestrator } from "./engine/orchestrator.js";
export type { OrchestratorOptions, WorkflowRunOptions } from "./engine/orchestrator.js";
export { renderTraceText } from "./artifacts/trace-text.js";
export { runWorkflow, runBatch, demoConfig } from "./run/run-service.js";
export type { RunWorkflowOptions, RunWorkflowOutcome, BatchOutcome } from "./run/run-service.js";
export { verifyRunDir, formatVerifyReport } from "./tools/verify-run.js";
