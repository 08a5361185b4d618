import { setTimeout as delay } from "node:timers/promises";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  if (ms <= 0) {
    return;
  }
  await delay(ms, undefined, signal ? { signal } : undefined);
};

export type BackoffPolicy = {
  backoffMs: number;
  maxBackoffMs?: number;
  jitter?: "none" | "full";
};

export const computeBackoffMs = (
  policy: BackoffPolicy,
  attempt: number,
  random: () => number = Math.random
): number => {
  if (policy.backoffMs <= 0) {
    return 0;
  }
  const maxBackoffMs = policy.maxBackoffMs ?? 30_000;
  const exponential = policy.backoffMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(maxBackoffMs, exponential);
  if ((policy.jitter ?? "full") === "none") {
    return capped;
  }
  return Math.max(0, Math.round(capped * (0.5 + random())));
};

export type RetryInfo = {
  attempt: number;
  error: unknown;
  delayMs: number;
};

export type RetryOptions<T> = {
  /** Called with the 1-based attempt number. */
  operation: (attempt: number) => Promise<T>;
  maxAttempts: number;
  isRetriable: (error: unknown) => boolean;
  delayMs?: (attempt: number, error: unknown) => number;
  onRetry?: (info: RetryInfo) => void;
  sleep?: Sleep;
  signal?: AbortSignal;
};

/**
 * Bounded retry. A non-retriable error, or the error of the final attempt, is rethrown
 * unchanged so callers can still tell transient exhaustion from a fatal failure.
 */
export const withRetry = async <T>(options: RetryOptions<T>): Promise<T> => {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await options.operation(attempt);
    } catch (error) {
      if (!options.isRetriable(error) || attempt >= maxAttempts) {
        throw error;
      }
      const delayMs = Math.max(0, options.delayMs?.(attempt, error) ?? 0);
      options.onRetry?.({ attempt, error, delayMs });
      await sleep(delayMs, options.signal);
    }
  }
};
