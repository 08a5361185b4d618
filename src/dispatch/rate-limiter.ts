import { defaultSleep, type Sleep } from "./retry.js";

export const DEFAULT_RATE_WINDOW_MS = 60_000;

/** Ceilings per window; 0 or a missing value means unlimited. */
export type RateCeilings = {
  requests_per_minute?: number;
  input_tokens_per_minute?: number;
  output_tokens_per_minute?: number;
};

export type RateBudget = {
  requests_used: number;
  input_tokens_used: number;
  output_tokens_used: number;
};

export type RateDimension = "requests" | "input_tokens" | "output_tokens";

export type Permit = {
  granted: true;
  provider: string;
  admittedAt: number;
  inputTokens: number;
  outputTokens: number;
};

export type WaitDuration = {
  granted: false;
  provider: string;
  waitMs: number;
  reason: RateDimension;
};

export type Admission = Permit | WaitDuration;

type AdmittedEvent = {
  at: number;
  input: number;
  output: number;
};

export type RateLimiterOptions = {
  windowMs?: number;
  now?: () => number;
  sleep?: Sleep;
};

export type AcquireOptions = {
  signal?: AbortSignal;
  onWait?: (wait: WaitDuration) => void;
};

const ceilingOf = (value: number | undefined): number | null =>
  value !== undefined && Number.isFinite(value) && value > 0 ? value : null;

/**
 * Sliding-log admission control shared by every workflow in the process.
 *
 * An admitted event counts against its provider until `windowMs` has elapsed since it was
 * admitted, so no interval of `windowMs` ever holds more admissions than the ceiling.
 * Budgets change only when admission is granted.
 */
export class RateLimiter {
  readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private readonly ceilings = new Map<string, RateCeilings>();
  private readonly logs = new Map<string, AdmittedEvent[]>();
  private readonly locks = new Map<string, Promise<unknown>>();

  constructor(options: RateLimiterOptions = {}) {
    const windowMs = options.windowMs ?? DEFAULT_RATE_WINDOW_MS;
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new Error("windowMs must be positive");
    }
    this.windowMs = windowMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  configure(provider: string, ceilings: RateCeilings): void {
    this.ceilings.set(provider, { ...ceilings });
  }

  isConfigured(provider: string): boolean {
    return this.ceilings.has(provider);
  }

  budget(provider: string): RateBudget {
    const log = this.prune(provider, this.now());
    return {
      requests_used: log.length,
      input_tokens_used: log.reduce((sum, event) => sum + event.input, 0),
      output_tokens_used: log.reduce((sum, event) => sum + event.output, 0)
    };
  }

  admit(provider: string, estimatedInputTokens: number, estimatedOutputTokens: number): Admission {
    const now = this.now();
    const log = this.prune(provider, now);
    const ceilings = this.ceilings.get(provider) ?? {};
    const input = Math.max(0, Math.ceil(estimatedInputTokens));
    const output = Math.max(0, Math.ceil(estimatedOutputTokens));

    const checks: Array<{ reason: RateDimension; ceiling: number | null; cost: number; weight: (event: AdmittedEvent) => number }> = [
      { reason: "requests", ceiling: ceilingOf(ceilings.requests_per_minute), cost: 1, weight: () => 1 },
      { reason: "input_tokens", ceiling: ceilingOf(ceilings.input_tokens_per_minute), cost: input, weight: (event) => event.input },
      { reason: "output_tokens", ceiling: ceilingOf(ceilings.output_tokens_per_minute), cost: output, weight: (event) => event.output }
    ];

    let refusal: WaitDuration | null = null;
    for (const check of checks) {
      if (check.ceiling === null) {
        continue;
      }
      const waitMs = this.waitToFit(log, now, check.ceiling, check.cost, check.weight);
      if (waitMs > 0 && (refusal === null || waitMs > refusal.waitMs)) {
        refusal = { granted: false, provider, waitMs, reason: check.reason };
      }
    }

    if (refusal) {
      return refusal;
    }

    log.push({ at: now, input, output });
    return { granted: true, provider, admittedAt: now, inputTokens: input, outputTokens: output };
  }

  /**
   * Waits until admission is granted. Callers for the same provider are admitted one at a
   * time in arrival order.
   */
  async acquire(
    provider: string,
    estimatedInputTokens: number,
    estimatedOutputTokens: number,
    options: AcquireOptions = {}
  ): Promise<Permit> {
    const previous = this.locks.get(provider) ?? Promise.resolve();
    const turn = previous.then(() =>
      this.acquireInOrder(provider, estimatedInputTokens, estimatedOutputTokens, options)
    );
    const settled = turn.catch(() => undefined);
    this.locks.set(provider, settled);
    try {
      return await turn;
    } finally {
      if (this.locks.get(provider) === settled) {
        this.locks.delete(provider);
      }
    }
  }

  private async acquireInOrder(
    provider: string,
    estimatedInputTokens: number,
    estimatedOutputTokens: number,
    options: AcquireOptions
  ): Promise<Permit> {
    while (true) {
      const admission = this.admit(provider, estimatedInputTokens, estimatedOutputTokens);
      if (admission.granted) {
        return admission;
      }
      options.onWait?.(admission);
      await this.sleep(admission.waitMs, options.signal);
    }
  }

  private prune(provider: string, now: number): AdmittedEvent[] {
    const log = this.logs.get(provider) ?? [];
    const live = log.filter((event) => now - event.at < this.windowMs);
    this.logs.set(provider, live);
    return live;
  }

  /**
   * Milliseconds until `cost` fits under `ceiling`, or 0 when it fits now. A single cost
   * larger than the ceiling is admitted only into an empty window.
   */
  private waitToFit(
    log: AdmittedEvent[],
    now: number,
    ceiling: number,
    cost: number,
    weight: (event: AdmittedEvent) => number
  ): number {
    const used = log.reduce((sum, event) => sum + weight(event), 0);
    if (used + cost <= ceiling || log.length === 0) {
      return 0;
    }
    const target = cost > ceiling ? 0 : ceiling - cost;
    let remaining = used;
    for (const event of log) {
      remaining -= weight(event);
      if (remaining <= target) {
        return Math.max(1, event.at + this.windowMs - now);
      }
    }
    const last = log[log.length - 1];
    return Math.max(1, last.at + this.windowMs - now);
  }
}

let sharedLimiter: RateLimiter | undefined;

/** The process-wide limiter; every workflow in one process must use this instance. */
export const getSharedRateLimiter = (options?: RateLimiterOptions): RateLimiter => {
  if (!sharedLimiter) {
    sharedLimiter = new RateLimiter(options);
  }
  return sharedLimiter;
};

export const resetSharedRateLimiterForTests = (): void => {
  sharedLimiter = undefined;
};
