import { readdirSync, readFileSync } from "node:fs";
import { basename, extname, resolve } from "node:path";

import { writeJsonAtomic } from "../artifacts/io.js";
import { generateRunId } from "../artifacts/run-id.js";
import { createRunDir, DEFAULT_RUNS_DIR } from "../artifacts/run-dir.js";
import { TraceWriter, type WrittenArtifact } from "../artifacts/trace-writer.js";
import { UsageTracker, type UsageSummary } from "../artifacts/usage-tracker.js";
import { resolveConfig } from "../config/resolve-config.js";
import type { ResolvedConfig, RoleName } from "../config/types.js";
import { Dispatcher } from "../dispatch/dispatcher.js";
import { getSharedRateLimiter, type RateLimiter } from "../dispatch/rate-limiter.js";
import { runBatchWithWorkers } from "../engine/batch-executor.js";
import { Orchestrator } from "../engine/orchestrator.js";
import { EventBus } from "../events/event-bus.js";
import type { WorkflowResult } from "../ledger/types.js";
import { createDemoAdapter, demoRoleFromModel, DEMO_PROVIDER_ID } from "../providers/demo.js";
import { createProviderAdapter } from "../providers/factory.js";
import type { ProviderAdapter } from "../providers/types.js";
import { ExecutionLogger } from "../ui/execution-log.js";
import { emitReceipt } from "../ui/receipt-writer.js";
import { createConsoleWarningSink, createEventWarningSink, type WarningSink } from "../utils/warnings.js";

export type AdapterResolver = (provider: string, model: string) => ProviderAdapter;

export type RunWorkflowOptions = {
  config: ResolvedConfig;
  requirement: string;
  runsDir?: string;
  label?: string;
  quiet?: boolean;
  receiptMode?: "auto" | "writeOnly" | "skip";
  rateLimiter?: RateLimiter;
  resolveAdapter?: AdapterResolver;
  warningSink?: WarningSink;
  shouldStop?: () => boolean;
  now?: () => Date;
};

export type RunWorkflowOutcome = {
  runId: string;
  runDir: string;
  result: WorkflowResult;
  usage: UsageSummary;
  artifacts: ReadonlyArray<WrittenArtifact>;
};

const ROLE_NAMES: RoleName[] = ["analyzer", "corrector", "writer"];

/** Routes every role to the offline demo adapter; prompts and workflow settings are kept. */
export const demoConfig = (base?: ResolvedConfig): ResolvedConfig => {
  const resolved =
    base ??
    resolveConfig({
      providers: { [DEMO_PROVIDER_ID]: { type: "mock" } },
      roles: {
        analyzer: { provider: DEMO_PROVIDER_ID, model: "demo-analyzer" },
        corrector: { provider: DEMO_PROVIDER_ID, model: "demo-corrector" },
        writer: { provider: DEMO_PROVIDER_ID, model: "demo-writer" }
      },
      dispatch: { backoff_ms: 0 }
    });
  const roles = { ...resolved.roles };
  for (const role of ROLE_NAMES) {
    roles[role] = { ...roles[role], provider: DEMO_PROVIDER_ID, model: `demo-${role}` };
  }
  return {
    ...resolved,
    providers: {
      ...resolved.providers,
      [DEMO_PROVIDER_ID]: {
        id: DEMO_PROVIDER_ID,
        type: "mock",
        baseUrl: "mock://local",
        apiKey: null,
        timeoutMs: 1_000,
        rateLimits: { requests_per_minute: 0, input_tokens_per_minute: 0, output_tokens_per_minute: 0 },
        pricing: null,
        responses: [],
        headers: {}
      }
    },
    roles
  };
};

export const createAdapterResolver = (config: ResolvedConfig): AdapterResolver => (provider, model) => {
  if (provider === DEMO_PROVIDER_ID) {
    const role = demoRoleFromModel(model);
    if (role) {
      return createDemoAdapter(role);
    }
  }
  const entry = config.providers[provider];
  if (!entry) {
    throw new Error(`Unknown provider: ${provider}`);
  }
  return createProviderAdapter(entry, model);
};

/** Configures the process-wide limiter with every provider's ceilings. */
export const prepareRateLimiter = (config: ResolvedConfig, limiter?: RateLimiter): RateLimiter => {
  const rateLimiter = limiter ?? getSharedRateLimiter({ windowMs: config.dispatch.rate_window_ms });
  for (const provider of Object.values(config.providers)) {
    rateLimiter.configure(provider.id, provider.rateLimits);
  }
  return rateLimiter;
};

const registerWarningForwarder = (bus: EventBus, sink: WarningSink): (() => void) =>
  bus.subscribeSafe("warning.raised", (payload) => {
    sink.warn(payload.message, payload.source);
  });

/**
 * Runs one workflow into its own run directory: events, execution log, trace renderings,
 * result payload and receipt.
 */
export const runWorkflow = async (options: RunWorkflowOptions): Promise<RunWorkflowOutcome> => {
  const { config } = options;
  const now = options.now ?? (() => new Date());
  const runId = generateRunId(now(), { label: options.label });
  const paths = createRunDir({ outRoot: options.runsDir ?? DEFAULT_RUNS_DIR, runId });

  const bus = new EventBus();
  const warningSink = options.warningSink ?? createConsoleWarningSink();
  const stopWarningForwarder = options.quiet ? () => {} : registerWarningForwarder(bus, warningSink);
  const logger = new ExecutionLogger(paths.logPath);
  logger.attach(bus);
  const writer = new TraceWriter({ paths });
  writer.attach(bus);
  const usageTracker = new UsageTracker(
    Object.fromEntries(Object.values(config.providers).map((provider) => [provider.id, provider.pricing]))
  );
  const stopUsage = usageTracker.attach(bus);

  const dispatcher = new Dispatcher({
    resolveAdapter: options.resolveAdapter ?? createAdapterResolver(config),
    rateLimiter: prepareRateLimiter(config, options.rateLimiter),
    retry: {
      maxRetries: config.dispatch.max_retries,
      backoffMs: config.dispatch.backoff_ms,
      maxBackoffMs: config.dispatch.max_backoff_ms,
      jitter: config.dispatch.jitter
    },
    bus
  });
  const orchestrator = new Orchestrator({
    dispatcher,
    roles: config.roles,
    prompts: config.prompts,
    workflow: config.workflow,
    bus,
    warnings: createEventWarningSink(bus, now),
    now
  });

  let result: WorkflowResult;
  let usage: UsageSummary;
  try {
    result = await orchestrator.run(options.requirement, {
      workflowId: runId,
      shouldStop: options.shouldStop
    });
    usage = usageTracker.buildSummary();
    writer.writeResult(result, usage);
    await bus.flush();
  } finally {
    stopUsage();
    stopWarningForwarder();
    await writer.close();
    logger.detach();
    await logger.close();
  }

  const receiptMode = options.receiptMode ?? "auto";
  if (receiptMode !== "skip") {
    await emitReceipt(paths.runDir, paths.receiptPath, {
      quiet: options.quiet || receiptMode === "writeOnly"
    });
  }

  return { runId, runDir: paths.runDir, result, usage, artifacts: writer.artifacts };
};

export type BatchEntry = {
  path: string;
  label: string;
  requirement: string;
};

export type BatchOutcome = {
  batchDir: string;
  outcomes: Array<{ entry: BatchEntry; outcome: RunWorkflowOutcome }>;
  stopped: boolean;
};

const REQUIREMENT_EXTENSIONS = new Set([".txt", ".md"]);

export const collectBatchEntries = (dir: string): BatchEntry[] =>
  readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && REQUIREMENT_EXTENSIONS.has(extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort()
    .map((name) => {
      const path = resolve(dir, name);
      return {
        path,
        label: basename(name, extname(name)),
        requirement: readFileSync(path, "utf8").trim()
      };
    })
    .filter((entry) => entry.requirement.length > 0);

/**
 * Runs independent workflows with bounded concurrency. They share one rate limiter, so
 * provider ceilings hold across the whole batch.
 */
export const runBatch = async (options: {
  config: ResolvedConfig;
  entries: BatchEntry[];
  workers: number;
  runsDir?: string;
  rateLimiter?: RateLimiter;
  resolveAdapter?: AdapterResolver;
  warningSink?: WarningSink;
  shouldStop?: () => boolean;
  onWorkflowDone?: (entry: BatchEntry, outcome: RunWorkflowOutcome) => void;
}): Promise<BatchOutcome> => {
  const batchId = generateRunId(new Date(), { label: "batch" });
  const { runDir: batchDir } = createRunDir({ outRoot: options.runsDir ?? DEFAULT_RUNS_DIR, runId: batchId });
  const rateLimiter = prepareRateLimiter(options.config, options.rateLimiter);

  const batch = await runBatchWithWorkers({
    entries: options.entries,
    workerCount: options.workers,
    shouldStop: options.shouldStop,
    execute: async (entry) => {
      const outcome = await runWorkflow({
        config: options.config,
        requirement: entry.requirement,
        runsDir: batchDir,
        label: entry.label,
        quiet: true,
        receiptMode: "writeOnly",
        rateLimiter,
        resolveAdapter: options.resolveAdapter,
        warningSink: options.warningSink,
        shouldStop: options.shouldStop
      });
      options.onWorkflowDone?.(entry, outcome);
      return { entry, outcome };
    }
  });

  const outcomes = batch.results.map((item) => item.result);
  writeJsonAtomic(resolve(batchDir, "batch_summary.json"), {
    batch_id: batchId,
    stopped: batch.stopped,
    workflows: outcomes.map(({ entry, outcome }) => ({
      source: entry.path,
      run_dir: outcome.runDir,
      status: outcome.result.status,
      rounds: outcome.result.trace.rounds.length,
      correction_iterations: outcome.result.correction_iterations,
      ...(outcome.result.error ? { error: outcome.result.error.message } : {})
    }))
  });

  return { batchDir, outcomes, stopped: batch.stopped };
};

export const setupShutdownHandlers = (warningSink: WarningSink): {
  isRequested: () => boolean;
  dispose: () => void;
} => {
  let shutdownRequested = false;
  const requestShutdown = (signalName: string): void => {
    if (shutdownRequested) {
      return;
    }
    shutdownRequested = true;
    warningSink.warn(`${signalName} received: stopping after the current round...`, "shutdown");
  };
  const onSigint = (): void => requestShutdown("SIGINT");
  const onSigterm = (): void => requestShutdown("SIGTERM");
  process.on("SIGINT", onSigint);
  process.on("SIGTERM", onSigterm);

  return {
    isRequested: () => shutdownRequested,
    dispose: () => {
      process.removeListener("SIGINT", onSigint);
      process.removeListener("SIGTERM", onSigterm);
    }
  };
};
