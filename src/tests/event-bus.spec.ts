import { describe, expect, it } from "vitest";

import { EventBus } from "../events/event-bus.js";

const warning = (message: string) =>
  ({ type: "warning.raised", payload: { message, recorded_at: "2024-01-01T00:00:00.000Z" } }) as const;

describe("EventBus", () => {
  it("delivers typed payloads and numbers envelopes in emission order", () => {
    const bus = new EventBus();
    const messages: string[] = [];
    const sequences: number[] = [];
    bus.subscribe("warning.raised", (payload) => {
      messages.push(payload.message);
    });
    bus.subscribeAll((envelope) => {
      sequences.push(envelope.sequence);
    });

    bus.emit(warning("a"));
    bus.emit({ type: "artifact.written", payload: { path: "trace.json" } });
    bus.emit(warning("b"));

    expect(messages).toEqual(["a", "b"]);
    expect(sequences).toEqual([1, 2, 3]);
  });

  it("stops delivering after unsubscribe", () => {
    const bus = new EventBus();
    const messages: string[] = [];
    const unsubscribe = bus.subscribe("warning.raised", (payload) => {
      messages.push(payload.message);
    });

    bus.emit(warning("a"));
    unsubscribe();
    bus.emit(warning("b"));

    expect(messages).toEqual(["a"]);
  });

  it("routes subscribeSafe failures to the error handler", () => {
    const bus = new EventBus();
    const errors: unknown[] = [];
    bus.subscribeSafe(
      "warning.raised",
      () => {
        throw new Error("boom");
      },
      (error) => errors.push(error)
    );

    expect(() => bus.emit(warning("a"))).not.toThrow();
    expect(errors).toHaveLength(1);
  });

  it("waits for async handlers on flush and reports their failures", async () => {
    const bus = new EventBus();
    const seen: string[] = [];
    bus.subscribe("warning.raised", async (payload) => {
      await Promise.resolve();
      seen.push(payload.message);
    });
    bus.subscribe("artifact.written", async () => {
      await Promise.resolve();
      throw new Error("disk full");
    });

    bus.emit(warning("a"));
    await bus.flush();
    expect(seen).toEqual(["a"]);

    bus.emit({ type: "artifact.written", payload: { path: "trace.json" } });
    await expect(bus.flush()).rejects.toThrow("EventBus async handlers failed");
  });
});
