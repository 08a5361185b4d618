import { createWriteStream } from "node:fs";

import type { EventBus } from "../events/event-bus.js";
import type { EventPayloadMap, EventType } from "../events/types.js";

const preview = (text: string, max = 200): string => {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
};

/** Appends one timestamped line per workflow event to `execution.log`. */
export class ExecutionLogger {
  private stream: ReturnType<typeof createWriteStream> | null;
  private unsubs: Array<() => void> = [];

  constructor(logPath: string) {
    this.stream = createWriteStream(logPath, { flags: "a" });
  }

  private append(line: string): void {
    if (!this.stream) {
      return;
    }
    this.stream.write(`${new Date().toISOString()} ${line}\n`);
  }

  private on<K extends EventType>(
    bus: EventBus,
    type: K,
    format: (payload: EventPayloadMap[K]) => string
  ): void {
    this.unsubs.push(
      bus.subscribeSafe(
        type,
        (payload) => this.append(format(payload)),
        (error) => {
          const message = error instanceof Error ? error.message : String(error);
          this.append(`Execution log subscriber error (${type}): ${message}`);
        }
      )
    );
  }

  attach(bus: EventBus): void {
    this.on(bus, "workflow.started", (payload) =>
      `Workflow started: ${payload.workflow_id} (max iterations ${payload.max_iterations})`
    );
    this.on(bus, "workflow.state", (payload) =>
      `State ${payload.from} -> ${payload.to} (round ${payload.round})`
    );
    this.on(bus, "round.analyzed", (payload) =>
      `Round ${payload.round} analyzed: v${payload.requirement_version}, ${payload.issue_ids.length} issue(s), ready=${payload.ready_for_codegen}`
    );
    this.on(bus, "round.corrected", (payload) =>
      `Round ${payload.round} corrected: resolved [${payload.resolved_issue_ids.join(", ")}], unresolved [${payload.unresolved_issue_ids.join(", ")}] -> v${payload.requirement_version}`
    );
    this.on(bus, "protocol.violation", (payload) =>
      `Protocol violation in round ${payload.round} (${payload.kind}, ${payload.issue_id}): ${payload.message}`
    );
    this.on(bus, "role.rejected", (payload) =>
      `Rejected ${payload.role} reply (attempt ${payload.attempt}/${payload.max_attempts}): ${payload.reasons.join("; ")} | raw: ${preview(payload.raw_text)}`
    );
    this.on(bus, "dispatch.throttled", (payload) =>
      `Throttled ${payload.provider} on ${payload.reason} for ${payload.wait_ms}ms`
    );
    this.on(bus, "dispatch.retry", (payload) =>
      `Retrying ${payload.provider}/${payload.model} after attempt ${payload.attempt} in ${payload.delay_ms}ms: ${payload.error}`
    );
    this.on(bus, "dispatch.completed", (payload) =>
      `Call ${payload.role ?? "-"} ${payload.provider}/${payload.model}: ${payload.attempts} attempt(s), ${payload.latency_ms}ms`
    );
    this.on(bus, "writer.completed", (payload) =>
      `Writer completed on v${payload.requirement_version} (${payload.preserved_signatures.length} signature(s) preserved)`
    );
    this.on(bus, "workflow.completed", (payload) =>
      `Workflow completed: ${payload.workflow_id} (${payload.status}, ${payload.rounds} round(s), ${payload.correction_iterations} correction(s))`
    );
    this.on(bus, "workflow.failed", (payload) =>
      `Workflow failed in ${payload.state}: ${payload.workflow_id} (${payload.error_code ?? "error"}: ${payload.error})`
    );
    this.on(bus, "warning.raised", (payload) =>
      `Warning${payload.source ? ` [${payload.source}]` : ""}: ${payload.message}`
    );
  }

  async close(): Promise<void> {
    if (!this.stream) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.stream?.end(() => resolve());
      this.stream?.on("error", (error) => reject(error));
    });
    this.stream = null;
  }

  detach(): void {
    this.unsubs.forEach((unsubscribe) => unsubscribe());
    this.unsubs = [];
  }
}
