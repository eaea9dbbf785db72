import { existsSync } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { ArtifactCollector } from "./artifact/collector.js";
import { canonicalPaths, parseCanonicalName } from "./artifact/naming.js";
import { readResultArtifact, type ResultArtifact } from "./artifact/schema.js";
import { buildRunRequests } from "./matrix/builder.js";
import {
  ARCHITECTURES,
  CONDITIONS,
  runKey,
  type Architecture,
  type EvaluationConfig,
  type RunRequest,
  type TierThresholds,
} from "./matrix/types.js";
import { extractMetrics, type MetricRecord, type RunIdentity } from "./metrics/extractor.js";
import { aggregate, type AggregateStat, type GroupKey } from "./robustness/aggregator.js";
import { DEFAULT_TIER_THRESHOLDS } from "./robustness/tiers.js";
import { RunExecutor, appendRunLog } from "./runner/executor.js";
import { LocalProcessRunner, type ProcessRunner } from "./runner/process.js";

export type RunState =
  | "queued"
  | "running"
  | "ok"
  | "reused"
  | "timeout"
  | "artifact_missing"
  | "process_error"
  | "cancelled";

export type TerminalRunState = Exclude<RunState, "queued" | "running">;

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  queued: ["running", "reused", "cancelled"],
  running: ["ok", "timeout", "artifact_missing", "process_error", "cancelled"],
  ok: [],
  reused: [],
  timeout: [],
  artifact_missing: [],
  process_error: [],
  cancelled: [],
};

/** Lifecycle of one run request: queued → running → terminal, or queued → reused | cancelled. */
export class RunStateMachine {
  private current: RunState = "queued";

  get state(): RunState {
    return this.current;
  }

  advance(next: RunState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal run state transition ${this.current} → ${next}`);
    }
    this.current = next;
  }
}

export interface RunReport {
  key: string;
  run: RunIdentity;
  state: TerminalRunState;
  logPath: string;
  artifactPath?: string;
  durationMs: number;
  message?: string;
  /** False when the artifact was collected but yielded no MetricRecord */
  recorded: boolean;
}

export interface CompletenessSummary {
  requested: number;
  ok: number;
  reused: number;
  timeout: number;
  artifactMissing: number;
  processError: number;
  cancelled: number;
  records: number;
  droppedRecords: number;
}

export interface PipelineResult {
  runs: RunReport[];
  records: MetricRecord[];
  aggregates: Map<GroupKey, AggregateStat>;
  summary: CompletenessSummary;
  cancelled: boolean;
}

export type PipelineEvent =
  | { type: "run:start"; request: RunRequest; index: number; total: number }
  | { type: "run:finish"; report: RunReport; index: number; total: number }
  | { type: "pacing"; ms: number }
  | { type: "warning"; message: string };

export interface PipelineDeps {
  processRunner?: ProcessRunner;
  /** Resolves after `ms`, or early once `signal` aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onEvent?: (event: PipelineEvent) => void;
}

export interface PipelineRunOptions {
  signal?: AbortSignal;
  /** Defaults to the full matrix of the config */
  requests?: RunRequest[];
}

async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (e) {
    if (!signal?.aborted) throw e;
  }
}

export class EvaluationPipeline {
  private config: EvaluationConfig;
  private executor: RunExecutor;
  private collector: ArtifactCollector;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private emit: (event: PipelineEvent) => void;

  constructor(config: EvaluationConfig, deps?: PipelineDeps) {
    this.config = config;
    this.executor = new RunExecutor(config, deps?.processRunner ?? new LocalProcessRunner());
    this.collector = new ArtifactCollector(config);
    this.sleep = deps?.sleep ?? abortableSleep;
    this.emit = deps?.onEvent ?? (() => {});
  }

  /**
   * Executes every request in order, one at a time. Per-run failures are
   * recorded and never stop the batch; an aborted signal kills the in-flight
   * run and marks the rest cancelled.
   */
  async run(options?: PipelineRunOptions): Promise<PipelineResult> {
    const signal = options?.signal;
    const requests = options?.requests ?? buildRunRequests(this.config);
    const runs: RunReport[] = [];
    const records: MetricRecord[] = [];
    let lastExecuted: Architecture | undefined;

    for (const [index, request] of requests.entries()) {
      const machine = new RunStateMachine();
      const paths = canonicalPaths(this.config.outputDir, request);
      const finish = (report: Omit<RunReport, "key" | "run" | "logPath">): void => {
        machine.advance(report.state);
        const full: RunReport = { key: runKey(request), run: identityOf(request), logPath: paths.log, ...report };
        runs.push(full);
        this.emit({ type: "run:finish", report: full, index, total: requests.length });
      };

      if (signal?.aborted) {
        finish({ state: "cancelled", durationMs: 0, recorded: false, message: "skipped after cancellation" });
        continue;
      }

      if (!this.config.force && existsSync(paths.artifact)) {
        const existing = await readResultArtifact(paths.artifact);
        if (existing.ok) {
          const record = toRecord(existing.artifact, identityOf(request), this.emit);
          if (record) records.push(record);
          finish({ state: "reused", artifactPath: paths.artifact, durationMs: 0, recorded: record !== null });
          continue;
        }
        this.emit({ type: "warning", message: `${runKey(request)}: ${existing.message}; re-executing` });
      }

      if (lastExecuted === request.architecture && this.config.pacingDelayMs > 0) {
        this.emit({ type: "pacing", ms: this.config.pacingDelayMs });
        await this.sleep(this.config.pacingDelayMs, signal);
        if (signal?.aborted) {
          finish({ state: "cancelled", durationMs: 0, recorded: false, message: "skipped after cancellation" });
          continue;
        }
      }

      machine.advance("running");
      this.emit({ type: "run:start", request, index, total: requests.length });
      lastExecuted = request.architecture;

      const before = await this.collector.snapshot(request, this.executor.resultsDir);
      const outcome = await this.executor.execute(request, signal);
      if (outcome.status !== "ok") {
        if (outcome.message) await appendRunLog(outcome.logPath, outcome.message);
        finish({ state: outcome.status, durationMs: outcome.durationMs, recorded: false, message: outcome.message });
        continue;
      }

      const collected = await this.collector.collect(request, outcome, before);
      if (!collected.ok) {
        const message = `${collected.error.reason}: ${collected.error.message}`;
        await appendRunLog(outcome.logPath, message);
        finish({ state: "artifact_missing", durationMs: outcome.durationMs, recorded: false, message });
        continue;
      }

      await appendRunLog(outcome.logPath, `collected ${collected.source} → ${collected.path}`);
      const record = toRecord(collected.artifact, identityOf(request), this.emit);
      finish({ state: "ok", artifactPath: collected.path, durationMs: outcome.durationMs, recorded: record !== null });
      if (record) records.push(record);
    }

    return finalize(runs, records, this.config.tiers, signal?.aborted ?? false);
  }
}

export interface AnalyzeOptions {
  tiers?: TierThresholds;
  onEvent?: (event: PipelineEvent) => void;
}

/**
 * Rebuilds records and statistics from the canonical artifacts already under
 * a run root, without invoking the runner.
 */
export async function analyzeRunRoot(runRoot: string, options?: AnalyzeOptions): Promise<PipelineResult> {
  const emit = options?.onEvent ?? (() => {});
  const runs: RunReport[] = [];
  const records: MetricRecord[] = [];

  for (const condition of CONDITIONS) {
    const dir = join(runRoot, condition);
    if (!existsSync(dir)) continue;

    for (const name of (await readdir(dir)).sort()) {
      const parsed = parseCanonicalName(name);
      if (!parsed) continue;
      const architecture = ARCHITECTURES.find((a) => a === parsed.architecture);
      if (!architecture) {
        emit({ type: "warning", message: `${condition}/${name}: unknown architecture, ignored` });
        continue;
      }

      const run: RunIdentity = { architecture, condition, contextSeed: parsed.contextSeed };
      const paths = canonicalPaths(runRoot, run);
      const read = await readResultArtifact(paths.artifact);
      if (!read.ok) {
        emit({ type: "warning", message: `${runKey(run)}: ${read.message}` });
        runs.push({
          key: runKey(run), run, state: "artifact_missing", logPath: paths.log,
          durationMs: 0, recorded: false, message: read.message,
        });
        continue;
      }

      const record = toRecord(read.artifact, run, emit);
      if (record) records.push(record);
      runs.push({
        key: runKey(run), run, state: "reused", logPath: paths.log,
        artifactPath: paths.artifact, durationMs: 0, recorded: record !== null,
      });
    }
  }

  return finalize(runs, records, options?.tiers ?? DEFAULT_TIER_THRESHOLDS, false);
}

function identityOf(request: RunRequest): RunIdentity {
  return {
    architecture: request.architecture,
    condition: request.condition,
    contextSeed: request.contextSeed,
  };
}

function toRecord(
  artifact: ResultArtifact,
  run: RunIdentity,
  emit: (event: PipelineEvent) => void
): MetricRecord | null {
  return extractMetrics(artifact, run, {
    warn: (message) => emit({ type: "warning", message }),
  });
}

function finalize(
  runs: RunReport[],
  records: MetricRecord[],
  tiers: TierThresholds,
  cancelled: boolean
): PipelineResult {
  const count = (state: TerminalRunState) => runs.filter((r) => r.state === state).length;
  const summary: CompletenessSummary = {
    requested: runs.length,
    ok: count("ok"),
    reused: count("reused"),
    timeout: count("timeout"),
    artifactMissing: count("artifact_missing"),
    processError: count("process_error"),
    cancelled: count("cancelled"),
    records: records.length,
    droppedRecords: runs.filter((r) => (r.state === "ok" || r.state === "reused") && !r.recorded).length,
  };

  return {
    runs,
    records,
    aggregates: aggregate(records, tiers),
    summary,
    cancelled,
  };
}
