#!/usr/bin/env node
import { Command } from "commander";
import { createRequire } from "node:module";
import { runInit } from "./commands/init.js";
import { runRun } from "./commands/run.js";
import { runAnalyze } from "./commands/analyze.js";
import { runDiff } from "./commands/diff.js";

const require = createRequire(import.meta.url);
const packageJson: { version?: string } = require("../package.json");
const packageVersion = process.env.ROBENCH_CLI_VERSION ?? packageJson.version ?? "0.0.0";

const program = new Command();

program
  .name("robench")
  .description("Benchmark orchestration and robustness analysis for agent architectures")
  .version(packageVersion);

program
  .command("init")
  .description("Create a robench.config.json template")
  .action(async () => {
    await runInit();
  });

program
  .command("run")
  .description("Execute the evaluation matrix and emit robustness datasets")
  .option("-a, --architectures <list>", "Architectures to evaluate (comma or space separated)")
  .option("-c, --conditions <list>", "Conditions: baseline,perturbed")
  .option("-n, --contexts <n>", "Context seeds per architecture and condition")
  .option("--perturbations <list>", "Perturbation types: distractors,noise,ambiguity,incomplete")
  .option("-p, --provider <name>", "Model provider passed to the runner")
  .option("-m, --model <id>", "Model identifier passed to the runner")
  .option("--task-suite <suite>", "Task suite: simple, complex, all")
  .option("--max-iterations <n>", "Per-task iteration cap")
  .option("--timeout <ms>", "Per-run timeout")
  .option("--pacing <ms>", "Pause between consecutive runs of one architecture")
  .option("--output <dir>", "Run root for canonical artifacts and reports")
  .option("--runner <command>", "Benchmark runner executable")
  .option("--runner-args <list>", "Leading arguments for the runner")
  .option("--runner-cwd <dir>", "Working directory of the runner")
  .option("--results-dir <dir>", "Where the runner writes its artifacts, relative to its cwd")
  .option("--force", "Re-execute runs whose artifacts already exist")
  .option("--dry-run", "List the run matrix without executing it")
  .option("--strict", "Exit nonzero when any run did not produce metrics")
  .option("--save", "Save aggregates to the history store (.robench/history.db)")
  .option("--label <label>", "Label for saved results")
  .action(async (options) => {
    await runRun({
      architectures: options.architectures,
      conditions: options.conditions,
      contexts: options.contexts,
      perturbations: options.perturbations,
      provider: options.provider,
      model: options.model,
      taskSuite: options.taskSuite,
      maxIterations: options.maxIterations,
      timeout: options.timeout,
      pacing: options.pacing,
      output: options.output,
      runner: options.runner,
      runnerArgs: options.runnerArgs,
      runnerCwd: options.runnerCwd,
      resultsDir: options.resultsDir,
      force: options.force,
      dryRun: options.dryRun,
      strict: options.strict,
      save: options.save,
      label: options.label,
    });
  });

program
  .command("analyze")
  .description("Recompute statistics and datasets from collected artifacts")
  .option("--output <dir>", "Run root to analyze")
  .option("--save", "Save aggregates to the history store")
  .option("--label <label>", "Label for saved results")
  .action(async (options) => {
    await runAnalyze({
      output: options.output,
      save: options.save,
      label: options.label,
    });
  });

program
  .command("diff")
  .description("Compare robustness between two saved evaluations")
  .requiredOption("--before <label>", "Base label (or 'previous')")
  .requiredOption("--after <label>", "Target label (or 'latest')")
  .option("--threshold <pp>", "Success-rate drop in percentage points counted as regression", "5")
  .option("--json", "Output diff as JSON")
  .action(async (options) => {
    await runDiff({
      before: options.before,
      after: options.after,
      threshold: options.threshold ? parseFloat(options.threshold) : undefined,
      json: options.json,
    });
  });

await program.parseAsync();
