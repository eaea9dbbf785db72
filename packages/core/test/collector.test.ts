import { existsSync } from "node:fs";
import { readFile, utimes, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ArtifactCollector } from "../src/artifact/collector.js";
import type { RunRequest } from "../src/matrix/types.js";
import type { RunOutcome } from "../src/runner/executor.js";
import { artifactJson, baselineRequest, makeTempDir, removeDir, writeRunnerArtifact } from "./helpers.js";

const TASKS = [{ task_id: "t1", success: true, execution_time: 1.5, steps: 3 }];

describe("ArtifactCollector", () => {
  let root: string;
  let resultsDir: string;
  let outputDir: string;
  let collector: ArtifactCollector;

  beforeEach(async () => {
    root = await makeTempDir();
    resultsDir = join(root, "results");
    outputDir = join(root, "out");
    collector = new ArtifactCollector({ outputDir });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  function outcome(request: RunRequest, overrides?: Partial<RunOutcome>): RunOutcome {
    return {
      request,
      status: "ok",
      logPath: join(outputDir, "baseline", "react_context1.log"),
      resultsDir,
      exitCode: 0,
      startedAt: Date.now(),
      durationMs: 10,
      ...overrides,
    };
  }

  it("refuses outcomes that are not ok", async () => {
    const request = baselineRequest();
    const result = await collector.collect(request, outcome(request, { status: "timeout" }));
    expect(result).toEqual({
      ok: false,
      error: { reason: "outcome_not_ok", message: "run ended with status timeout" },
    });
  });

  it("reports pattern_not_found when the runner wrote nothing", async () => {
    const request = baselineRequest();
    const result = await collector.collect(request, outcome(request));
    expect(result).toEqual({
      ok: false,
      error: {
        reason: "pattern_not_found",
        message: `no artifact matching ${join(resultsDir, "benchmark_react_*.json")}`,
      },
    });
  });

  it("moves the artifact into its canonical slot", async () => {
    const request = baselineRequest("react", 2);
    const run = outcome(request);
    const source = await writeRunnerArtifact(resultsDir, "benchmark_react_llama3_1_8b.json", artifactJson(TASKS));

    const result = await collector.collect(request, run);

    const target = join(outputDir, "baseline", "react_context2.json");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.path).toBe(target);
    expect(result.source).toBe(source);
    expect(result.artifact.results).toHaveLength(1);
    expect(existsSync(source)).toBe(false);
    expect(existsSync(target)).toBe(true);

    const again = await collector.collect(request, run);
    expect(again.ok).toBe(false);
    if (!again.ok) expect(again.error.reason).toBe("pattern_not_found");
  });

  it("overwrites an existing canonical artifact", async () => {
    const request = baselineRequest();
    const target = join(outputDir, "baseline", "react_context1.json");
    await mkdir(join(outputDir, "baseline"), { recursive: true });
    await writeFile(target, "stale", "utf-8");
    await writeRunnerArtifact(resultsDir, "benchmark_react_llama3_1_8b.json", artifactJson(TASKS));

    const result = await collector.collect(request, outcome(request));

    expect(result.ok).toBe(true);
    expect(await readFile(target, "utf-8")).toBe(artifactJson(TASKS));
  });

  it("ignores artifacts written before the run started", async () => {
    const request = baselineRequest();
    const source = await writeRunnerArtifact(resultsDir, "benchmark_react_llama3_1_8b.json", artifactJson(TASKS));
    const hourAgo = new Date(Date.now() - 3_600_000);
    await utimes(source, hourAgo, hourAgo);

    const result = await collector.collect(request, outcome(request));

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe("pattern_not_found");
    expect(existsSync(source)).toBe(true);
  });

  it("skips an artifact left unchanged since the snapshot", async () => {
    const request = baselineRequest();
    const source = await writeRunnerArtifact(resultsDir, "benchmark_react_llama3_1_8b.json", artifactJson(TASKS));
    const before = await collector.snapshot(request, resultsDir);
    expect([...before.keys()]).toEqual(["benchmark_react_llama3_1_8b.json"]);

    const result = await collector.collect(request, outcome(request), before);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe("pattern_not_found");
    expect(existsSync(source)).toBe(true);
  });

  it("collects an artifact the run rewrote after the snapshot", async () => {
    const request = baselineRequest();
    const startedAt = Date.now();
    const source = await writeRunnerArtifact(resultsDir, "benchmark_react_llama3_1_8b.json", artifactJson(TASKS));
    await utimes(source, new Date(startedAt), new Date(startedAt));
    const before = await collector.snapshot(request, resultsDir);
    await utimes(source, new Date(startedAt + 3000), new Date(startedAt + 3000));

    const result = await collector.collect(request, outcome(request, { startedAt }), before);

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.source).toBe(source);
  });

  it("takes an empty snapshot when the results directory does not exist", async () => {
    const before = await collector.snapshot(baselineRequest(), join(root, "missing"));
    expect(before.size).toBe(0);
  });

  it("prefers the newest matching artifact", async () => {
    const request = baselineRequest();
    const startedAt = Date.now();
    const older = await writeRunnerArtifact(resultsDir, "benchmark_react_a.json", artifactJson(TASKS));
    const newer = await writeRunnerArtifact(resultsDir, "benchmark_react_b.json", artifactJson([]));
    await utimes(older, new Date(startedAt + 1000), new Date(startedAt + 1000));
    await utimes(newer, new Date(startedAt + 5000), new Date(startedAt + 5000));

    const result = await collector.collect(request, outcome(request, { startedAt }));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.source).toBe(newer);
      expect(result.artifact.results).toEqual([]);
    }
    expect(existsSync(older)).toBe(true);
  });

  it("does not collect another suite's artifact", async () => {
    const request = baselineRequest();
    await writeRunnerArtifact(resultsDir, "benchmark_react_llama3_1_8b_complex.json", artifactJson(TASKS));

    const result = await collector.collect(request, outcome(request));

    expect(result.ok).toBe(false);
  });

  it("reports invalid_artifact for malformed JSON", async () => {
    const request = baselineRequest();
    await writeRunnerArtifact(resultsDir, "benchmark_react_llama3_1_8b.json", "{ not json");

    const result = await collector.collect(request, outcome(request));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe("invalid_artifact");
      expect(result.error.message.startsWith(`${join(outputDir, "baseline", "react_context1.json")} is not valid JSON`)).toBe(true);
    }
  });

  it("reports invalid_artifact when results are missing", async () => {
    const request = baselineRequest();
    await writeRunnerArtifact(resultsDir, "benchmark_react_llama3_1_8b.json", JSON.stringify({ metadata: {} }));

    const result = await collector.collect(request, outcome(request));

    expect(result).toEqual({
      ok: false,
      error: { reason: "invalid_artifact", message: "malformed result artifact (results: Required)" },
    });
  });
});
