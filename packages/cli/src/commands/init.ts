import { mkdir, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import chalk from "chalk";
import { printHeader } from "../output.js";

export const DEFAULT_CONFIG = {
  architectures: ["react", "plan-then-act", "reflexion"],
  conditions: ["baseline", "perturbed"],
  contexts: 5,
  perturbationTypes: ["distractors", "noise"],
  provider: "ollama",
  model: "llama3.1:8b",
  taskSuite: "complex",
  maxIterations: 15,
  timeoutMs: 3_600_000,
  pacingDelayMs: 2000,
  outputDir: "robench-results",
  runner: {
    command: "python",
    args: ["run_benchmark.py"],
    cwd: ".",
    resultsDir: "benchmark_results",
  },
  tiers: { excellent: 10, good: 20, moderate: 35 },
  store: { path: ".robench/history.db" },
};

export async function runInit(): Promise<void> {
  const cwd = process.cwd();

  printHeader("Initializing project");

  const configPath = join(cwd, "robench.config.json");
  if (existsSync(configPath)) {
    console.log(chalk.yellow("  robench.config.json already exists, skipping"));
  } else {
    await writeFile(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n", "utf-8");
    console.log(chalk.green("  Created robench.config.json"));
  }

  const robenchDir = join(cwd, ".robench");
  if (!existsSync(robenchDir)) {
    await mkdir(robenchDir, { recursive: true });
    console.log(chalk.green("  Created .robench/ directory"));
  }

  console.log();
  console.log(chalk.bold("  Next steps:"));
  console.log(chalk.dim("  1. Point runner.command and runner.args at your benchmark script"));
  console.log(chalk.dim("  2. Set provider and model"));
  console.log(chalk.dim("  3. Run: robench run --save --label v1"));
  console.log(chalk.dim("  4. Run: robench diff --before previous --after latest"));
  console.log();
}
