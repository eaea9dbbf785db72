import { existsSync } from "node:fs";
import { resolve } from "node:path";
import chalk from "chalk";
import { ConfigurationError, analyzeRunRoot, type TierThresholds } from "@robench/core";
import { loadConfigFile, resolveOutputDir, resolveStorePath, resolveTiers } from "../config.js";
import { exitCodeFor, printHeader, publishResult, renderEvent } from "../output.js";

export interface AnalyzeOptions {
  output?: string;
  save?: boolean;
  label?: string;
}

/** Recomputes statistics and datasets from artifacts already collected under the output dir. */
export async function runAnalyze(options: AnalyzeOptions): Promise<void> {
  printHeader("Analyzing results");

  const file = await loadConfigFile();
  const outputDir = resolveOutputDir(file, options.output);
  const runRoot = resolve(outputDir);

  let tiers: TierThresholds;
  try {
    tiers = resolveTiers(file);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      console.error(chalk.red(`  ${e.message}`));
      process.exitCode = 2;
      return;
    }
    throw e;
  }

  if (!existsSync(runRoot)) {
    console.log(chalk.yellow(`  No results found at ${runRoot}`));
    console.log(chalk.dim("  Run `robench run` first."));
    console.log();
    process.exitCode = 1;
    return;
  }

  const result = await analyzeRunRoot(runRoot, { tiers, onEvent: renderEvent });
  console.log(chalk.dim(`  Found ${result.runs.length} artifacts, ${result.records.length} usable`));
  console.log();

  await publishResult(result, {
    outputDir,
    label: options.label,
    save: options.save,
    storePath: resolveStorePath(file),
  });

  process.exitCode = exitCodeFor(result.summary, { cancelled: false });
}
