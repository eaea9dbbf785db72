import { spawn } from "node:child_process";
import type { Writable } from "node:stream";

export interface ExecOpts {
  cwd?: string;
  timeout?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
  /** Receives stdout and stderr as they arrive; never ended by the runner */
  output?: Writable;
}

export interface ExecResult {
  exitCode: number;
  /** Last {@link OUTPUT_TAIL_CHARS} characters of stdout */
  stdout: string;
  /** Last {@link OUTPUT_TAIL_CHARS} characters of stderr */
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
}

/** Launches the external benchmark runner. Tests substitute an in-process fake. */
export interface ProcessRunner {
  exec(command: string, args: readonly string[], opts?: ExecOpts): Promise<ExecResult>;
}

export const OUTPUT_TAIL_CHARS = 64 * 1024;

class OutputTail {
  private text = "";

  push(chunk: Buffer | string): void {
    this.text = (this.text + chunk.toString()).slice(-OUTPUT_TAIL_CHARS);
  }

  toString(): string {
    return this.text;
  }
}

/**
 * Runs the command in its own process group so a timeout or abort takes down
 * everything it spawned. Output is streamed to `opts.output`; only a bounded
 * tail is kept in memory.
 */
export class LocalProcessRunner implements ProcessRunner {
  exec(command: string, args: readonly string[], opts?: ExecOpts): Promise<ExecResult> {
    const timeout = opts?.timeout ?? 30000;
    const signal = opts?.signal;

    return new Promise((resolve) => {
      const stdout = new OutputTail();
      const stderr = new OutputTail();
      let timedOut = false;
      let aborted = false;
      let settled = false;

      const child = spawn(command, [...args], {
        cwd: opts?.cwd,
        env: opts?.env ? { ...process.env, ...opts.env } : process.env,
        detached: true,
        stdio: ["ignore", "pipe", "pipe"],
      });

      const killGroup = () => {
        if (child.pid === undefined) return;
        try {
          process.kill(-child.pid, "SIGKILL");
        } catch {
          // Group already gone, or no process groups on this platform
          child.kill("SIGKILL");
        }
      };

      const onAbort = () => {
        aborted = true;
        killGroup();
      };

      const timer = setTimeout(() => {
        timedOut = true;
        killGroup();
      }, timeout);

      const finish = (result: Omit<ExecResult, "stdout" | "stderr" | "timedOut" | "aborted">) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        resolve({
          ...result,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          timedOut: timedOut && !aborted,
          aborted,
        });
      };

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
      if (opts?.output) {
        child.stdout.pipe(opts.output, { end: false });
        child.stderr.pipe(opts.output, { end: false });
      }

      child.on("error", (e) => {
        stderr.push(e.message);
        finish({ exitCode: 1 });
      });
      child.on("close", (code) => {
        finish({ exitCode: code ?? 1 });
      });

      if (signal?.aborted) onAbort();
      else signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
