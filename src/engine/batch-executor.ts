export type WorkerStatusUpdate<Entry, Result> = {
  workerId: number;
  status: "busy" | "idle";
  entry: Entry;
  result?: Result;
  error?: unknown;
};

export type RunBatchWithWorkersOptions<Entry, Result> = {
  entries: ReadonlyArray<Entry>;
  workerCount: number;
  /** Checked before each entry is started; in-flight entries always finish. */
  shouldStop?: () => boolean;
  execute: (entry: Entry, index: number) => Promise<Result>;
  onWorkerStatus?: (update: WorkerStatusUpdate<Entry, Result>) => void;
};

export type BatchOutcome<Result> = {
  /** Input order; entries never started because of a stop or an earlier failure are absent. */
  results: Array<{ index: number; result: Result }>;
  stopped: boolean;
};

/**
 * Executes entries with bounded concurrency. The first failure stops new entries from
 * starting and is rethrown once the in-flight ones settle.
 */
export const runBatchWithWorkers = async <Entry, Result>(
  options: RunBatchWithWorkersOptions<Entry, Result>
): Promise<BatchOutcome<Result>> => {
  const workerCount = Math.floor(options.workerCount);
  if (!Number.isFinite(workerCount) || workerCount < 1) {
    throw new Error(`workerCount must be >= 1, got ${options.workerCount}`);
  }

  const completed: Array<{ index: number; result: Result }> = [];
  let next = 0;
  let stopped = false;
  const failures: unknown[] = [];

  const worker = async (workerId: number): Promise<void> => {
    while (next < options.entries.length && failures.length === 0) {
      if (options.shouldStop?.()) {
        stopped = true;
        return;
      }
      const index = next;
      next += 1;
      const entry = options.entries[index];
      options.onWorkerStatus?.({ workerId, status: "busy", entry });
      try {
        const result = await options.execute(entry, index);
        completed.push({ index, result });
        options.onWorkerStatus?.({ workerId, status: "idle", entry, result });
      } catch (error) {
        failures.push(error);
        options.onWorkerStatus?.({ workerId, status: "idle", entry, error });
      }
    }
  };

  const size = Math.min(workerCount, Math.max(1, options.entries.length));
  await Promise.all(Array.from({ length: size }, (_, offset) => worker(offset + 1)));

  if (failures.length > 0) {
    throw failures[0];
  }
  completed.sort((a, b) => a.index - b.index);
  return { results: completed, stopped };
};
