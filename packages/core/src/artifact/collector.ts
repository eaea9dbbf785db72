import { copyFile, mkdir, readdir, rename, stat, unlink } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { CollectionError } from "../errors.js";
import type { EvaluationConfig, RunRequest } from "../matrix/types.js";
import type { RunOutcome } from "../runner/executor.js";
import { canonicalPaths, runnerArtifactMatcher, runnerArtifactPattern } from "./naming.js";
import { readResultArtifact, type ResultArtifact } from "./schema.js";

/** Modification times of the matching runner artifacts present before a run. */
export type ArtifactSnapshot = ReadonlyMap<string, number>;

export type CollectResult =
  | { ok: true; artifact: ResultArtifact; path: string; source: string }
  | { ok: false; error: CollectionError };

// Coarse filesystem timestamps can trail the run start by up to a second or so.
const MTIME_TOLERANCE_MS = 2000;

export class ArtifactCollector {
  private outputDir: string;

  constructor(config: Pick<EvaluationConfig, "outputDir">) {
    this.outputDir = config.outputDir;
  }

  /** Records the runner artifacts already present so a later collect skips them. */
  async snapshot(request: RunRequest, resultsDir: string): Promise<ArtifactSnapshot> {
    const existing = new Map<string, number>();
    for (const entry of await this.listMatching(resultsDir, request)) {
      existing.set(entry.name, entry.mtimeMs);
    }
    return existing;
  }

  /**
   * Moves the newest runner artifact for the request into its canonical slot
   * and parses it. Only artifacts written since the run started, and not
   * unchanged since `before`, are eligible.
   */
  async collect(request: RunRequest, outcome: RunOutcome, before?: ArtifactSnapshot): Promise<CollectResult> {
    if (outcome.status !== "ok") {
      return {
        ok: false,
        error: { reason: "outcome_not_ok", message: `run ended with status ${outcome.status}` },
      };
    }

    const source = await this.findNewest(outcome.resultsDir, request, outcome.startedAt - MTIME_TOLERANCE_MS, before);
    if (!source) {
      const pattern = join(outcome.resultsDir, runnerArtifactPattern(request.architecture, request.taskSuite));
      return {
        ok: false,
        error: { reason: "pattern_not_found", message: `no artifact matching ${pattern}` },
      };
    }

    const { artifact: target } = canonicalPaths(this.outputDir, request);
    await moveFile(source, target);

    const read = await readResultArtifact(target);
    if (!read.ok) {
      return { ok: false, error: { reason: "invalid_artifact", message: read.message } };
    }
    return { ok: true, artifact: read.artifact, path: target, source };
  }

  private async findNewest(
    dir: string,
    request: RunRequest,
    notBefore: number,
    before?: ArtifactSnapshot
  ): Promise<string | null> {
    let newest: { path: string; mtimeMs: number } | null = null;
    for (const entry of await this.listMatching(dir, request)) {
      if (entry.mtimeMs < notBefore || before?.get(entry.name) === entry.mtimeMs) continue;
      if (!newest || entry.mtimeMs > newest.mtimeMs) {
        newest = { path: entry.path, mtimeMs: entry.mtimeMs };
      }
    }
    return newest?.path ?? null;
  }

  private async listMatching(
    dir: string,
    request: RunRequest
  ): Promise<{ name: string; path: string; mtimeMs: number }[]> {
    const matches = runnerArtifactMatcher(request.architecture, request.taskSuite);

    let names: string[];
    try {
      names = await readdir(dir);
    } catch {
      // Runner never created its output directory
      return [];
    }

    const entries: { name: string; path: string; mtimeMs: number }[] = [];
    for (const name of names.filter(matches).sort()) {
      const path = join(dir, name);
      const info = await stat(path);
      if (info.isFile()) entries.push({ name, path, mtimeMs: info.mtimeMs });
    }
    return entries;
  }
}

async function moveFile(source: string, target: string): Promise<void> {
  await mkdir(dirname(target), { recursive: true });
  try {
    await rename(source, target);
  } catch (e) {
    if (!(e instanceof Error) || !("code" in e) || e.code !== "EXDEV") throw e;
    await copyFile(source, target);
    await unlink(source);
  }
}
