import { describe, expect, it } from "vitest";

import { UsageTracker } from "../artifacts/usage-tracker.js";
import { EventBus } from "../events/event-bus.js";

describe("UsageTracker", () => {
  it("aggregates per provider/model and prices priced providers", () => {
    const tracker = new UsageTracker({
      openai: { input_per_million: 2, output_per_million: 8 },
      local: null
    });
    const bus = new EventBus();
    const detach = tracker.attach(bus);

    bus.emit({
      type: "dispatch.completed",
      payload: {
        provider: "openai",
        model: "gpt-test",
        role: "analyzer",
        attempts: 1,
        latency_ms: 10,
        usage: { prompt_tokens: 1_000, completion_tokens: 500, total_tokens: 1_500 }
      }
    });
    bus.emit({
      type: "dispatch.completed",
      payload: {
        provider: "openai",
        model: "gpt-test",
        role: "corrector",
        attempts: 2,
        latency_ms: 10,
        usage: { prompt_tokens: 500_000, completion_tokens: 0, total_tokens: 500_000 }
      }
    });
    bus.emit({
      type: "dispatch.completed",
      payload: {
        provider: "local",
        model: "llama-test",
        attempts: 1,
        latency_ms: 10,
        usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 }
      }
    });
    bus.emit({
      type: "dispatch.completed",
      payload: { provider: "local", model: "llama-test", attempts: 1, latency_ms: 10, usage: null }
    });
    detach();

    const summary = tracker.buildSummary();
    expect(summary.by_model["openai/gpt-test"]).toEqual({
      calls: 2,
      prompt_tokens: 501_000,
      completion_tokens: 500,
      total_tokens: 501_500,
      cost: 0.006 + 1
    });
    expect(summary.by_model["local/llama-test"]).toEqual({
      calls: 2,
      prompt_tokens: 10,
      completion_tokens: 5,
      total_tokens: 15
    });
    expect(summary.totals.calls).toBe(4);
    expect(summary.totals.total_tokens).toBe(501_515);
    expect(summary.totals.cost).toBeCloseTo(1.006, 10);
  });
});
