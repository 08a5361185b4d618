import { basename } from "node:path";

import { formatAjvErrors, validateTrace } from "../config/schema-validation.js";
import type { EventBus } from "../events/event-bus.js";
import type { WorkflowResult } from "../ledger/types.js";
import { JsonlWriter, writeJsonAtomic, writeTextAtomic } from "./io.js";
import type { RunPaths } from "./run-dir.js";
import { renderTraceText } from "./trace-text.js";
import type { UsageSummary } from "./usage-tracker.js";

export interface TraceWriterOptions {
  paths: RunPaths;
  validateArtifacts?: boolean;
}

export type WrittenArtifact = {
  path: string;
  record_count?: number;
};

/**
 * Trace sink for one workflow run directory. While attached it mirrors every bus event to
 * `events.jsonl`; `writeResult` renders the finalized trace both ways and writes the
 * result payload next to it.
 */
export class TraceWriter {
  private readonly paths: RunPaths;
  private readonly validateArtifacts: boolean;
  private readonly eventsWriter: JsonlWriter;
  private readonly written: WrittenArtifact[] = [];
  private bus: EventBus | null = null;
  private unsubscribe: (() => void) | null = null;
  private closed = false;

  constructor(options: TraceWriterOptions) {
    this.paths = options.paths;
    this.validateArtifacts = options.validateArtifacts ?? true;
    this.eventsWriter = new JsonlWriter(options.paths.eventsPath);
  }

  get artifacts(): ReadonlyArray<WrittenArtifact> {
    return this.written;
  }

  attach(bus: EventBus): void {
    this.bus = bus;
    this.unsubscribe = bus.subscribeAll((envelope) => {
      this.eventsWriter.append(envelope);
    });
  }

  writeResult(result: WorkflowResult, usage?: UsageSummary): void {
    const trace = result.trace;
    if (this.validateArtifacts && !validateTrace(trace)) {
      const formatted = formatAjvErrors("trace", validateTrace.errors);
      throw new Error(formatted.length > 0 ? formatted.join("\n") : "trace is invalid");
    }

    writeJsonAtomic(this.paths.tracePath, trace);
    this.record(this.paths.tracePath, trace.rounds.length);
    writeTextAtomic(this.paths.traceTextPath, renderTraceText(trace));
    this.record(this.paths.traceTextPath);

    writeJsonAtomic(this.paths.resultPath, {
      workflow_id: trace.workflow_id,
      status: result.status,
      correction_iterations: result.correction_iterations,
      rounds: trace.rounds.length,
      finalized_requirement: result.finalized_requirement,
      code: result.code,
      tests: result.tests,
      assumptions: result.assumptions,
      trace: basename(this.paths.tracePath),
      ...(usage ? { usage } : {}),
      ...(result.error ? { error: result.error } : {})
    });
    this.record(this.paths.resultPath);

    if (result.status !== "failed") {
      writeTextAtomic(this.paths.codePath, result.code);
      this.record(this.paths.codePath);
      writeTextAtomic(this.paths.testsPath, result.tests);
      this.record(this.paths.testsPath);
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.eventsWriter.close();
    this.written.push({ path: this.paths.eventsPath, record_count: this.eventsWriter.recordCount });
  }

  private record(path: string, recordCount?: number): void {
    const artifact: WrittenArtifact = recordCount === undefined ? { path } : { path, record_count: recordCount };
    this.written.push(artifact);
    this.bus?.emit({
      type: "artifact.written",
      payload: artifact
    });
  }
}
