import { createWriteStream } from "node:fs";
import { appendFile, mkdir } from "node:fs/promises";
import { finished } from "node:stream/promises";
import { dirname, resolve } from "node:path";
import type { EvaluationConfig, RunRequest } from "../matrix/types.js";
import { canonicalPaths } from "../artifact/naming.js";
import type { ExecResult, ProcessRunner } from "./process.js";

export type ExecutionStatus = "ok" | "timeout" | "process_error" | "cancelled";

export interface RunOutcome {
  request: RunRequest;
  status: ExecutionStatus;
  logPath: string;
  /** Where the runner drops its artifact; only meaningful when status is "ok" */
  resultsDir: string;
  exitCode: number;
  startedAt: number;
  durationMs: number;
  message?: string;
}

export interface RunExecutorOptions {
  now?: () => number;
}

export class RunExecutor {
  private config: EvaluationConfig;
  private processRunner: ProcessRunner;
  private now: () => number;

  constructor(config: EvaluationConfig, processRunner: ProcessRunner, options?: RunExecutorOptions) {
    this.config = config;
    this.processRunner = processRunner;
    this.now = options?.now ?? Date.now;
  }

  get resultsDir(): string {
    return resolve(this.config.runner.cwd, this.config.runner.resultsDir);
  }

  buildArgs(request: RunRequest): string[] {
    const args = [
      ...this.config.runner.args,
      "-a", request.architecture,
      "-p", this.config.provider,
      "-m", this.config.model,
      "--task-suite", request.taskSuite,
      "--max-iterations", String(request.maxIterations),
      "--context-seed", String(request.contextSeed),
    ];
    if (request.condition === "perturbed") {
      args.push("--perturbations", "--perturbation-types", ...request.perturbationTypes);
    }
    return args;
  }

  async execute(request: RunRequest, signal?: AbortSignal): Promise<RunOutcome> {
    const { log: logPath } = canonicalPaths(this.config.outputDir, request);
    const args = this.buildArgs(request);
    const startedAt = this.now();

    await mkdir(dirname(logPath), { recursive: true });
    const transcript = createWriteStream(logPath, { encoding: "utf-8" });
    // Reported once the runner has exited
    let transcriptError: Error | undefined;
    transcript.on("error", (e) => {
      transcriptError = e;
    });
    transcript.write(
      [
        `# run: ${request.architecture} / ${request.condition} / context ${request.contextSeed}`,
        `# command: ${[this.config.runner.command, ...args].join(" ")}`,
        `# started: ${new Date(startedAt).toISOString()}`,
        "--- output ---",
        "",
      ].join("\n")
    );

    let result: ExecResult;
    try {
      result = await this.processRunner.exec(this.config.runner.command, args, {
        cwd: this.config.runner.cwd,
        timeout: request.timeoutMs,
        signal,
        output: transcript,
      });
    } catch (e) {
      transcript.destroy();
      throw e;
    }

    const finishedAt = this.now();
    let status: ExecutionStatus;
    let message: string | undefined;
    if (result.aborted) {
      status = "cancelled";
      message = "run aborted by cancellation signal";
    } else if (result.timedOut) {
      status = "timeout";
      message = `runner exceeded ${request.timeoutMs}ms and was terminated`;
    } else if (result.exitCode !== 0) {
      status = "process_error";
      message = `runner exited with code ${result.exitCode}`;
    } else {
      status = "ok";
    }

    transcript.end(
      [
        "",
        "--- end of output ---",
        `# finished: ${new Date(finishedAt).toISOString()}`,
        `# exit code: ${result.exitCode}`,
        `# status: ${status}`,
        "",
      ].join("\n")
    );
    if (transcriptError) throw transcriptError;
    await finished(transcript);

    return {
      request,
      status,
      logPath,
      resultsDir: this.resultsDir,
      exitCode: result.exitCode,
      startedAt,
      durationMs: finishedAt - startedAt,
      message,
    };
  }
}

/** Adds a pipeline-level note (collection failure, cancellation...) to a run transcript. */
export async function appendRunLog(path: string, line: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, `# pipeline: ${line}\n`, "utf-8");
}
