export type ProviderType = "openai_compatible" | "anthropic" | "ollama" | "mock";

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type Prompt = {
  system: string;
  user: string;
};

export type SamplingParams = {
  temperature?: number;
  max_output_tokens?: number;
  max_input_tokens?: number;
};

export type TokenUsage = {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
};

export type GenerateResult = {
  text: string;
  model: string | null;
  usage: TokenUsage | null;
  latencyMs: number;
};

export type GenerateOptions = {
  signal?: AbortSignal;
};

/**
 * One backend family. Implementations translate the prompt into their wire format and
 * either return plain text or throw a ProviderError.
 */
export interface ProviderAdapter {
  readonly id: string;
  readonly type: ProviderType;
  readonly model: string;
  generate(prompt: Prompt, params: SamplingParams, options?: GenerateOptions): Promise<GenerateResult>;
}

export type ProviderErrorKind = "transient" | "fatal";

export class ProviderError extends Error {
  kind: ProviderErrorKind;
  provider: string;
  status?: number;
  code?: string;
  retryAfterMs?: number;
  responseBody?: unknown;
  latencyMs?: number;

  constructor(message: string, options: {
    kind: ProviderErrorKind;
    provider: string;
    status?: number;
    code?: string;
    retryAfterMs?: number;
    responseBody?: unknown;
    latencyMs?: number;
  }) {
    super(message);
    this.name = "ProviderError";
    this.kind = options.kind;
    this.provider = options.provider;
    this.status = options.status;
    this.code = options.code;
    this.retryAfterMs = options.retryAfterMs;
    this.responseBody = options.responseBody;
    this.latencyMs = options.latencyMs;
  }

  get transient(): boolean {
    return this.kind === "transient";
  }
}

export const isTransientProviderError = (error: unknown): error is ProviderError =>
  error instanceof ProviderError && error.kind === "transient";

export const toMessages = (prompt: Prompt): ChatMessage[] => {
  const messages: ChatMessage[] = [];
  if (prompt.system.trim().length > 0) {
    messages.push({ role: "system", content: prompt.system });
  }
  messages.push({ role: "user", content: prompt.user });
  return messages;
};
