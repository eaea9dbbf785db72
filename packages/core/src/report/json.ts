import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { CompletenessSummary, PipelineResult, TerminalRunState } from "../pipeline.js";
import type { AggregateStat } from "../robustness/aggregator.js";

export const JSON_REPORT_FILE = "robustness.json";

export interface RunFailure {
  run: string;
  state: TerminalRunState;
  message?: string;
  log: string;
}

export interface JsonReport {
  robenchVersion: string;
  createdAt: string;
  label?: string;
  model?: string;
  provider?: string;
  summary: CompletenessSummary;
  failures: RunFailure[];
  aggregates: AggregateStat[];
}

const FAILED_STATES: readonly TerminalRunState[] = ["timeout", "artifact_missing", "process_error", "cancelled"];

export function collectFailures(result: Pick<PipelineResult, "runs">): RunFailure[] {
  return result.runs
    .filter((r) => FAILED_STATES.includes(r.state))
    .map((r) => ({ run: r.key, state: r.state, message: r.message, log: r.logPath }));
}

export function generateJsonReport(
  result: PipelineResult,
  options?: { label?: string; model?: string; provider?: string; createdAt?: Date }
): string {
  const report: JsonReport = {
    robenchVersion: "0.1.0",
    createdAt: (options?.createdAt ?? new Date()).toISOString(),
    label: options?.label,
    model: options?.model,
    provider: options?.provider,
    summary: result.summary,
    failures: collectFailures(result),
    aggregates: [...result.aggregates.values()],
  };

  return JSON.stringify(report, null, 2);
}

export async function writeJsonReport(
  destination: string,
  result: PipelineResult,
  options?: { label?: string; model?: string; provider?: string }
): Promise<string> {
  await mkdir(destination, { recursive: true });
  const path = join(destination, JSON_REPORT_FILE);
  await writeFile(path, generateJsonReport(result, options), "utf-8");
  return path;
}
