import type { Pricing } from "../config/types.js";
import type { EventBus } from "../events/event-bus.js";
import type { DispatchCompletedPayload } from "../events/types.js";

export type UsageTotals = {
  calls: number;
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  cost?: number;
};

export type UsageSummary = {
  totals: UsageTotals;
  by_model: Record<string, UsageTotals>;
};

const emptyTotals = (): UsageTotals => ({
  calls: 0,
  prompt_tokens: 0,
  completion_tokens: 0,
  total_tokens: 0
});

/** Aggregates reported token usage per `provider/model` and prices it when pricing is known. */
export class UsageTracker {
  private readonly usageTotals = emptyTotals();
  private readonly usageByModel = new Map<string, UsageTotals>();

  constructor(private readonly pricing: Record<string, Pricing | null> = {}) {}

  attach(bus: EventBus): () => void {
    return bus.subscribe("dispatch.completed", (payload) => this.ingest(payload));
  }

  ingest(payload: DispatchCompletedPayload): void {
    const key = `${payload.provider}/${payload.model}`;
    const addition: UsageTotals = { ...emptyTotals(), calls: 1 };
    if (payload.usage) {
      addition.prompt_tokens = payload.usage.prompt_tokens;
      addition.completion_tokens = payload.usage.completion_tokens;
      addition.total_tokens = payload.usage.total_tokens;
      const pricing = this.pricing[payload.provider];
      if (pricing) {
        addition.cost =
          (payload.usage.prompt_tokens * pricing.input_per_million +
            payload.usage.completion_tokens * pricing.output_per_million) /
          1_000_000;
      }
    }

    this.addUsage(this.usageTotals, addition);
    const existing = this.usageByModel.get(key) ?? emptyTotals();
    this.addUsage(existing, addition);
    this.usageByModel.set(key, existing);
  }

  buildSummary(): UsageSummary {
    const byModel: Record<string, UsageTotals> = {};
    for (const [model, usage] of this.usageByModel.entries()) {
      byModel[model] = { ...usage };
    }
    return { totals: { ...this.usageTotals }, by_model: byModel };
  }

  private addUsage(target: UsageTotals, addition: UsageTotals): void {
    target.calls += addition.calls;
    target.prompt_tokens += addition.prompt_tokens;
    target.completion_tokens += addition.completion_tokens;
    target.total_tokens += addition.total_tokens;
    if (addition.cost !== undefined) {
      target.cost = (target.cost ?? 0) + addition.cost;
    }
  }
}
