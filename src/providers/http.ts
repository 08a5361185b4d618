import { ProviderError, type TokenUsage } from "./types.js";

export type HttpProviderOptions = {
  provider: string;
  baseUrl: string;
  headers: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
};

export type HttpJsonResponse = {
  responseBody: unknown;
  headers: Record<string, string>;
  latencyMs: number;
};

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);

export const isTransientStatus = (status: number): boolean =>
  TRANSIENT_STATUSES.has(status) || status >= 500;

const toHeaderRecord = (headers: Headers): Record<string, string> => {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
};

const parseJsonBody = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
};

export const parseRetryAfterMs = (
  headers: Record<string, string>,
  now: number = Date.now()
): number | undefined => {
  const raw = headers["retry-after"];
  if (!raw) {
    return undefined;
  }
  const numericSeconds = Number(raw);
  if (Number.isFinite(numericSeconds) && numericSeconds >= 0) {
    return Math.round(numericSeconds * 1000);
  }
  const asDate = Date.parse(raw);
  if (Number.isNaN(asDate)) {
    return undefined;
  }
  return Math.max(0, asDate - now);
};

const extractErrorDetails = (body: unknown): { code?: string; message?: string } => {
  if (!body || typeof body !== "object" || !("error" in body)) {
    return {};
  }
  const error = (body as { error?: unknown }).error;
  if (typeof error === "string") {
    return { message: error };
  }
  if (!error || typeof error !== "object") {
    return {};
  }
  const fields = error as { code?: unknown; type?: unknown; message?: unknown };
  const code = fields.code ?? fields.type;
  const message = fields.message;
  return {
    code: typeof code === "string" ? code : undefined,
    message: typeof message === "string" ? message : undefined
  };
};

export const createTimeoutSignal = (
  timeoutMs: number,
  parentSignal?: AbortSignal
): { signal: AbortSignal; cancel: () => void; didTimeout: () => boolean } => {
  let timedOut = false;
  const controller = new AbortController();
  let timeout: ReturnType<typeof setTimeout> | null = null;
  let parentListenerAttached = false;
  const onParentAbort = (): void => {
    controller.abort();
    cleanup();
  };
  const cleanup = (): void => {
    if (timeout) {
      clearTimeout(timeout);
      timeout = null;
    }
    if (parentSignal && parentListenerAttached) {
      parentSignal.removeEventListener("abort", onParentAbort);
      parentListenerAttached = false;
    }
  };

  timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
    cleanup();
  }, timeoutMs);

  if (parentSignal) {
    if (parentSignal.aborted) {
      controller.abort();
    } else {
      parentSignal.addEventListener("abort", onParentAbort, { once: true });
      parentListenerAttached = true;
    }
  }

  return {
    signal: controller.signal,
    cancel: cleanup,
    didTimeout: () => timedOut
  };
};

const isAbortError = (error: unknown): boolean => {
  if (!error || typeof error !== "object") {
    return false;
  }
  return "name" in error && (error as { name?: string }).name === "AbortError";
};

/**
 * Single POST attempt. Never retries: retry and rate admission belong to the dispatcher.
 */
export const postJson = async (
  path: string,
  payload: Record<string, unknown>,
  options: HttpProviderOptions
): Promise<HttpJsonResponse> => {
  const baseUrl = options.baseUrl.replace(/\/$/, "");
  const timeout = createTimeoutSignal(options.timeoutMs, options.signal);
  const started = Date.now();

  try {
    const response = await fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...options.headers
      },
      body: JSON.stringify(payload),
      signal: timeout.signal
    });
    const responseBody = await parseJsonBody(response);
    const latencyMs = Date.now() - started;
    const headers = toHeaderRecord(response.headers);

    if (response.ok) {
      return { responseBody, headers, latencyMs };
    }

    const details = extractErrorDetails(responseBody);
    throw new ProviderError(
      details.message ?? `${options.provider} request failed with status ${response.status}`,
      {
        kind: isTransientStatus(response.status) ? "transient" : "fatal",
        provider: options.provider,
        status: response.status,
        code: details.code,
        retryAfterMs: parseRetryAfterMs(headers),
        responseBody,
        latencyMs
      }
    );
  } catch (error) {
    if (error instanceof ProviderError) {
      throw error;
    }
    const latencyMs = Date.now() - started;
    if (timeout.didTimeout()) {
      throw new ProviderError(`${options.provider} request timed out after ${options.timeoutMs}ms`, {
        kind: "transient",
        provider: options.provider,
        code: "timeout",
        latencyMs
      });
    }
    if (isAbortError(error)) {
      throw new ProviderError(`${options.provider} request aborted`, {
        kind: "fatal",
        provider: options.provider,
        code: "aborted",
        latencyMs
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ProviderError(`${options.provider} request failed: ${message}`, {
      kind: "transient",
      provider: options.provider,
      code: "network_error",
      latencyMs
    });
  } finally {
    timeout.cancel();
  }
};

const toNumber = (value: unknown): number | null =>
  typeof value === "number" && Number.isFinite(value) ? value : null;

export const buildUsage = (
  prompt: unknown,
  completion: unknown,
  total?: unknown
): TokenUsage | null => {
  const promptTokens = toNumber(prompt);
  const completionTokens = toNumber(completion);
  const totalTokens = toNumber(total);
  if (promptTokens === null && completionTokens === null && totalTokens === null) {
    return null;
  }
  const normalizedPrompt = promptTokens ?? 0;
  const normalizedCompletion = completionTokens ?? 0;
  return {
    prompt_tokens: normalizedPrompt,
    completion_tokens: normalizedCompletion,
    total_tokens: totalTokens ?? normalizedPrompt + normalizedCompletion
  };
};

export const asRecord = (value: unknown): Record<string, unknown> | null =>
  value && typeof value === "object" && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : null;

export const invalidResponse = (
  provider: string,
  message: string,
  response: HttpJsonResponse
): ProviderError =>
  new ProviderError(message, {
    kind: "transient",
    provider,
    code: "invalid_response",
    responseBody: response.responseBody,
    latencyMs: response.latencyMs
  });

export const stringOrNull = (value: unknown): string | null =>
  typeof value === "string" ? value : null;
