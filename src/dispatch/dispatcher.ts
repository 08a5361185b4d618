import type { AgentRole } from "../engine/errors.js";
import type { EventBus } from "../events/event-bus.js";
import {
  ProviderError,
  isTransientProviderError,
  type Prompt,
  type ProviderAdapter,
  type SamplingParams,
  type TokenUsage
} from "../providers/types.js";
import type { RateLimiter } from "./rate-limiter.js";
import { computeBackoffMs, defaultSleep, withRetry, type BackoffPolicy, type Sleep } from "./retry.js";
import { DEFAULT_OUTPUT_TOKEN_ESTIMATE, estimatePromptTokens } from "./tokens.js";

export type DispatchRetryPolicy = BackoffPolicy & {
  /** Retries after the first attempt; 3 means at most 4 attempts. */
  maxRetries: number;
};

export type DispatcherOptions = {
  resolveAdapter: (provider: string, model: string) => ProviderAdapter;
  rateLimiter: RateLimiter;
  retry: DispatchRetryPolicy;
  sleep?: Sleep;
  random?: () => number;
  bus?: EventBus;
};

export type DispatchRequest = {
  provider: string;
  model: string;
  prompt: Prompt;
  params: SamplingParams;
  maxRetries?: number;
  role?: AgentRole;
  workflowId?: string;
};

export type DispatchResult = {
  text: string;
  provider: string;
  model: string;
  attempts: number;
  latencyMs: number;
  usage: TokenUsage | null;
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * The only path from an agent role to a model: every attempt is admitted by the rate
 * limiter first, transient provider failures are retried with backoff, fatal ones are
 * rethrown immediately.
 */
export class Dispatcher {
  private readonly adapters = new Map<string, ProviderAdapter>();
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(private readonly options: DispatcherOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  private adapterFor(provider: string, model: string): ProviderAdapter {
    const key = `${provider}::${model}`;
    const cached = this.adapters.get(key);
    if (cached) {
      return cached;
    }
    const adapter = this.options.resolveAdapter(provider, model);
    this.adapters.set(key, adapter);
    return adapter;
  }

  async call(request: DispatchRequest): Promise<DispatchResult> {
    const adapter = this.adapterFor(request.provider, request.model);
    const estimatedInput = estimatePromptTokens(request.prompt);
    const estimatedOutput = request.params.max_output_tokens ?? DEFAULT_OUTPUT_TOKEN_ESTIMATE;

    const maxInput = request.params.max_input_tokens;
    if (maxInput !== undefined && estimatedInput > maxInput) {
      throw new ProviderError(
        `Prompt for ${request.provider}/${request.model} is ~${estimatedInput} tokens, over max_input_tokens ${maxInput}`,
        { kind: "fatal", provider: request.provider, code: "input_too_long" }
      );
    }

    const maxRetries = Math.max(0, request.maxRetries ?? this.options.retry.maxRetries);
    const bus = this.options.bus;
    let attempts = 0;

    const generated = await withRetry({
      maxAttempts: maxRetries + 1,
      sleep: this.sleep,
      isRetriable: isTransientProviderError,
      delayMs: (attempt, error) => {
        const backoff = computeBackoffMs(this.options.retry, attempt, this.random);
        const retryAfter = error instanceof ProviderError ? error.retryAfterMs ?? 0 : 0;
        return Math.max(backoff, retryAfter);
      },
      onRetry: ({ attempt, error, delayMs }) => {
        bus?.emit({
          type: "dispatch.retry",
          payload: {
            workflow_id: request.workflowId,
            provider: request.provider,
            model: request.model,
            attempt,
            delay_ms: delayMs,
            error: describeError(error),
            status: error instanceof ProviderError ? error.status : undefined
          }
        });
      },
      operation: async (attempt) => {
        attempts = attempt;
        await this.options.rateLimiter.acquire(request.provider, estimatedInput, estimatedOutput, {
          onWait: (wait) => {
            bus?.emit({
              type: "dispatch.throttled",
              payload: {
                workflow_id: request.workflowId,
                provider: request.provider,
                wait_ms: wait.waitMs,
                reason: wait.reason
              }
            });
          }
        });
        return adapter.generate(request.prompt, request.params);
      }
    });

    bus?.emit({
      type: "dispatch.completed",
      payload: {
        workflow_id: request.workflowId,
        provider: request.provider,
        model: generated.model ?? request.model,
        role: request.role,
        attempts,
        latency_ms: generated.latencyMs,
        usage: generated.usage
      }
    });

    return {
      text: generated.text,
      provider: request.provider,
      model: generated.model ?? request.model,
      attempts,
      latencyMs: generated.latencyMs,
      usage: generated.usage
    };
  }
}
