import chalk from "chalk";
import Table from "cli-table3";
import type { PipelineResult } from "../pipeline.js";
import type { MetricStat } from "../robustness/aggregator.js";
import type { RobustnessTier } from "../robustness/tiers.js";
import { collectFailures } from "./json.js";

export function printTerminalReport(result: PipelineResult): void {
  console.log();
  console.log(chalk.bold("  Robench — Robustness Results"));
  console.log(chalk.dim("  " + "─".repeat(50)));
  console.log();

  if (result.aggregates.size === 0) {
    console.log(chalk.yellow("  No metric records were collected; nothing to aggregate."));
    console.log();
  } else {
    const table = new Table({
      head: [
        chalk.bold("Architecture"),
        chalk.bold("Condition"),
        chalk.bold("n"),
        chalk.bold("Success %"),
        chalk.bold("Time (s)"),
        chalk.bold("Steps"),
        chalk.bold("Tokens"),
        chalk.bold("Overall"),
      ],
      style: { head: [], border: [] },
    });

    for (const stat of result.aggregates.values()) {
      table.push([
        stat.architecture,
        stat.condition,
        String(stat.sampleSize),
        formatStat(stat.metrics.successRate, 1),
        formatStat(stat.metrics.avgTime, 2),
        formatStat(stat.metrics.avgSteps, 1),
        formatStat(stat.metrics.avgTokens, 0),
        formatTier(stat.overall.tier),
      ]);
    }

    console.log(table.toString());
    console.log();
  }

  const failures = collectFailures(result);
  if (failures.length > 0) {
    console.log(chalk.red.bold("  Failures:"));
    console.log();
    for (const f of failures) {
      const colour = f.state === "artifact_missing" ? chalk.yellow.bold : chalk.red;
      console.log(colour(`  ✗ ${f.run} [${f.state}]`));
      if (f.message) console.log(chalk.dim(`    ${f.message}`));
      console.log(chalk.dim(`    log: ${f.log}`));
    }
    console.log();
  }

  const s = result.summary;
  const parts = [
    chalk.bold(`  ${s.requested} runs`),
    s.ok > 0 ? chalk.green(`${s.ok} ok`) : null,
    s.reused > 0 ? chalk.cyan(`${s.reused} reused`) : null,
    s.timeout > 0 ? chalk.red(`${s.timeout} timed out`) : null,
    s.artifactMissing > 0 ? chalk.yellow.bold(`${s.artifactMissing} missing artifact`) : null,
    s.processError > 0 ? chalk.red(`${s.processError} process error`) : null,
    s.cancelled > 0 ? chalk.yellow(`${s.cancelled} cancelled`) : null,
  ]
    .filter(Boolean)
    .join(chalk.dim(" · "));
  console.log(parts);
  console.log(
    chalk.dim(`  ${s.records} metric records collected`) +
      (s.droppedRecords > 0 ? chalk.yellow(` (${s.droppedRecords} artifacts dropped as unusable)`) : "")
  );
  console.log();
}

function formatStat(stat: MetricStat, digits: number): string {
  const base = `${stat.mean.toFixed(digits)} ± ${stat.std.toFixed(digits)}`;
  return `${base} ${formatTier(stat.tier)}`;
}

export function formatTier(tier: RobustnessTier): string {
  switch (tier) {
    case "excellent":
      return chalk.green("excellent");
    case "good":
      return chalk.green("good");
    case "moderate":
      return chalk.yellow("moderate");
    case "poor":
      return chalk.red("poor");
    case "insufficient-data":
      return chalk.dim("n<2");
    case "undefined":
      return chalk.dim("—");
  }
}
