import type { ProviderType } from "../providers/types.js";

export type RateLimits = {
  requests_per_minute?: number;
  input_tokens_per_minute?: number;
  output_tokens_per_minute?: number;
};

export type Pricing = {
  input_per_million: number;
  output_per_million: number;
};

/** Provider entry as written in the config file. */
export type ProviderConfig = {
  type: ProviderType;
  base_url?: string;
  api_key?: string;
  api_key_env?: string;
  timeout_ms?: number;
  rate_limits?: RateLimits;
  pricing?: Pricing;
  responses?: string[];
  headers?: Record<string, string>;
};

export type RoleConfig = {
  provider: string;
  model: string;
  temperature?: number;
  max_output_tokens?: number;
  max_input_tokens?: number;
};

export type ProtocolViolationPolicy = "carry_forward" | "fail";

export type WorkflowConfig = {
  max_iterations?: number;
  max_parse_attempts?: number;
  protocol_violation_policy?: ProtocolViolationPolicy;
  include_history?: boolean;
};

export type DispatchConfig = {
  max_retries?: number;
  backoff_ms?: number;
  max_backoff_ms?: number;
  jitter?: "none" | "full";
  rate_window_ms?: number;
};

export type RoleName = "analyzer" | "corrector" | "writer";

export type ReqloopConfig = {
  $schema?: string;
  providers: Record<string, ProviderConfig>;
  roles: Record<RoleName, RoleConfig>;
  workflow?: WorkflowConfig;
  dispatch?: DispatchConfig;
  prompts?: Partial<Record<RoleName, string>>;
};

export type ResolvedProvider = {
  id: string;
  type: ProviderType;
  baseUrl: string;
  apiKey: string | null;
  timeoutMs: number;
  rateLimits: Required<RateLimits>;
  pricing: Pricing | null;
  responses: string[];
  headers: Record<string, string>;
};

export type ResolvedRole = {
  role: RoleName;
  provider: string;
  model: string;
  temperature?: number;
  max_output_tokens?: number;
  max_input_tokens?: number;
};

export type ResolvedPrompt = {
  role: RoleName;
  path: string;
  sha256: string;
  text: string;
};

export type ResolvedConfig = {
  providers: Record<string, ResolvedProvider>;
  roles: Record<RoleName, ResolvedRole>;
  workflow: Required<WorkflowConfig>;
  dispatch: Required<DispatchConfig>;
  prompts: Record<RoleName, ResolvedPrompt>;
};
