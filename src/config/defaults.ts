import type { DispatchConfig, WorkflowConfig } from "./types.js";

export const DEFAULT_CONFIG_FILENAME = "reqloop.config.json";
export const DEFAULT_PROVIDER_TIMEOUT_MS = 120_000;

export const DEFAULT_WORKFLOW: Required<WorkflowConfig> = {
  max_iterations: 5,
  max_parse_attempts: 3,
  protocol_violation_policy: "carry_forward",
  include_history: true
};

export const DEFAULT_DISPATCH: Required<DispatchConfig> = {
  max_retries: 3,
  backoff_ms: 500,
  max_backoff_ms: 30_000,
  jitter: "full",
  rate_window_ms: 60_000
};

export const DEFAULT_RATE_LIMITS = {
  requests_per_minute: 60,
  input_tokens_per_minute: 100_000,
  output_tokens_per_minute: 50_000
};
