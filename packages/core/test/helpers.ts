import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseEvaluationConfig, type EvaluationConfigInput } from "../src/matrix/schema.js";
import type { Architecture, Condition, EvaluationConfig, RunRequest } from "../src/matrix/types.js";
import type { MetricRecord } from "../src/metrics/extractor.js";
import type { ExecOpts, ExecResult, ProcessRunner } from "../src/runner/process.js";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "robench-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function makeConfig(root: string, overrides?: Partial<EvaluationConfigInput>): EvaluationConfig {
  return parseEvaluationConfig({
    architectures: ["react"],
    conditions: ["baseline"],
    contexts: 2,
    provider: "ollama",
    model: "llama3.1:8b",
    taskSuite: "simple",
    pacingDelayMs: 0,
    outputDir: join(root, "out"),
    runner: {
      command: "bench",
      args: ["run_benchmark.py"],
      cwd: join(root, "runner"),
      resultsDir: "results",
    },
    ...overrides,
  });
}

export function baselineRequest(architecture: Architecture = "react", contextSeed = 1): RunRequest {
  return {
    architecture,
    condition: "baseline",
    contextSeed,
    taskSuite: "simple",
    maxIterations: 15,
    timeoutMs: 1000,
  };
}

export function record(
  architecture: Architecture,
  condition: Condition,
  contextSeed: number,
  values: Partial<Pick<MetricRecord, "successRate" | "avgTime" | "avgSteps" | "avgTokens">> = {}
): MetricRecord {
  return {
    architecture,
    condition,
    contextSeed,
    successRate: values.successRate ?? 100,
    avgTime: values.avgTime ?? 1,
    avgSteps: values.avgSteps ?? 1,
    avgTokens: values.avgTokens ?? 0,
    totalTasks: 2,
  };
}

export interface TaskFixture {
  task_id?: string;
  success?: boolean;
  execution_time?: number;
  steps?: number;
  total_tokens?: number;
  metrics?: { total_tokens?: number };
}

export function artifactJson(tasks: TaskFixture[], metadata: Record<string, unknown> = {}): string {
  return JSON.stringify({ metadata, results: tasks }, null, 2);
}

export async function writeRunnerArtifact(dir: string, name: string, contents: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, name);
  await writeFile(path, contents, "utf-8");
  return path;
}

export interface ExecCall {
  command: string;
  args: readonly string[];
  opts?: ExecOpts;
}

export type ExecHandler = (call: ExecCall) => Promise<ExecResult> | ExecResult;

export function okResult(stdout = ""): ExecResult {
  return { exitCode: 0, stdout, stderr: "", timedOut: false, aborted: false };
}

/**
 * Records every call and delegates to a handler instead of spawning a process.
 * The handler's stdout and stderr are copied to `opts.output` like a real run.
 */
export class FakeProcessRunner implements ProcessRunner {
  calls: ExecCall[] = [];

  constructor(private handler: ExecHandler) {}

  async exec(command: string, args: readonly string[], opts?: ExecOpts): Promise<ExecResult> {
    const call = { command, args, opts };
    this.calls.push(call);
    const result = await this.handler(call);
    opts?.output?.write(result.stdout + result.stderr);
    return result;
  }
}

export function argValue(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}
