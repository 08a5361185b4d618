import type {
  AnalyzerStep,
  CorrectorStep,
  PromptFingerprint,
  Requirement,
  Round,
  Trace,
  TraceError,
  WorkflowStatus,
  WriterStep
} from "./types.js";

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

export type TraceRecorderOptions = {
  workflowId: string;
  startedAt: string;
  initialRequirement: Requirement;
  maxIterations: number;
  prompts: ReadonlyArray<PromptFingerprint>;
};

/**
 * Append-only record of one workflow. A round opens with its analysis and is sealed by
 * its correction, by the next analysis, by the writer step, or by finalize. Sealed rounds
 * are frozen and never replaced.
 */
export class TraceRecorder {
  private readonly sealed: Round[] = [];
  private open: Round | null = null;
  private writer: WriterStep | null = null;
  private finalized: Trace | null = null;

  constructor(private readonly options: TraceRecorderOptions) {}

  get rounds(): ReadonlyArray<Round> {
    return this.open ? [...this.sealed, this.open] : [...this.sealed];
  }

  get isFinalized(): boolean {
    return this.finalized !== null;
  }

  recordAnalysis(round: number, requirement: Requirement, analyzer: AnalyzerStep): void {
    this.assertWritable();
    this.sealOpen();
    const expected = this.sealed.length + 1;
    if (round !== expected) {
      throw new Error(`Expected analysis for round ${expected}, got round ${round}`);
    }
    this.open = deepFreeze({ round, requirement, analyzer });
  }

  recordCorrection(round: number, corrector: CorrectorStep): void {
    this.assertWritable();
    if (!this.open || this.open.round !== round) {
      throw new Error(`Round ${round} has no open analysis to correct`);
    }
    this.sealed.push(deepFreeze({ ...this.open, corrector }));
    this.open = null;
  }

  recordWriter(step: WriterStep): void {
    this.assertWritable();
    if (this.writer) {
      throw new Error("Writer step already recorded");
    }
    this.sealOpen();
    this.writer = deepFreeze(step);
  }

  finalize(input: { status: WorkflowStatus; completedAt: string; error?: TraceError }): Trace {
    if (this.finalized) {
      return this.finalized;
    }
    this.sealOpen();
    this.finalized = deepFreeze(
      this.build({
        status: input.status,
        completedAt: input.completedAt,
        incomplete: input.status === "failed",
        error: input.error
      })
    );
    return this.finalized;
  }

  private build(input: {
    status: WorkflowStatus;
    completedAt: string;
    incomplete: boolean;
    error?: TraceError;
  }): Trace {
    return {
      workflow_id: this.options.workflowId,
      started_at: this.options.startedAt,
      completed_at: input.completedAt,
      initial_requirement: this.options.initialRequirement,
      rounds: this.rounds,
      writer: this.writer,
      status: input.status,
      incomplete: input.incomplete,
      max_iterations: this.options.maxIterations,
      prompts: [...this.options.prompts],
      ...(input.error ? { error: input.error } : {})
    };
  }

  private sealOpen(): void {
    if (this.open) {
      this.sealed.push(this.open);
      this.open = null;
    }
  }

  private assertWritable(): void {
    if (this.finalized) {
      throw new Error("Trace is finalized");
    }
  }
}
