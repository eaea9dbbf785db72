import { resolve } from "node:path";
import chalk from "chalk";
import Table from "cli-table3";
import {
  HistoryLookupError,
  SqliteHistoryStore,
  checkRegressions,
  formatTier,
  type CoverageChange,
  type DiffReport,
  type DiffStatus,
  type GroupDiff,
  type GroupSnapshot,
  type HistoryStore,
  type RegressionCheckResult,
} from "@robench/core";
import { loadConfigFile, resolveStorePath } from "../config.js";
import { printHeader } from "../output.js";

export interface DiffOptions {
  before: string;
  after: string;
  threshold?: number;
  json?: boolean;
}

export async function runDiff(options: DiffOptions): Promise<void> {
  printHeader("Diff");

  const file = await loadConfigFile();
  const store = new SqliteHistoryStore(resolve(resolveStorePath(file)));

  try {
    diffCommand(store, options);
  } finally {
    store.close();
  }
}

/** Compares two stored evaluations and sets the process exit code. */
export function diffCommand(store: Pick<HistoryStore, "listLabels" | "loadByLabel">, options: DiffOptions): void {
  let result: RegressionCheckResult;
  try {
    result = checkRegressions(store, options.before, options.after, {
      regressionThreshold: options.threshold,
    });
  } catch (e) {
    if (e instanceof HistoryLookupError) {
      console.error(chalk.red(`  ${e.message}`));
      console.log();
      process.exitCode = 1;
      return;
    }
    throw e;
  }

  if (options.json) {
    console.log(JSON.stringify({ ...result.diff, coverage: result.coverage }, null, 2));
  } else {
    printDiffTable(result.diff);
    printCoverage(result.coverage);
  }

  process.exitCode = result.exitCode;
}

function printCoverage(coverage: CoverageChange): void {
  const line = `  Coverage: ${coverage.before.toFixed(1)}% → ${coverage.after.toFixed(1)}%`;
  if (coverage.lost) {
    console.log(chalk.red.bold(`${line}  ⚠ fewer runs produced metrics`));
  } else {
    console.log(chalk.dim(line));
  }
  console.log();
}

function printDiffTable(diff: DiffReport): void {
  console.log(chalk.bold(`  Comparing: ${diff.beforeLabel} → ${diff.afterLabel}`));
  console.log();

  const table = new Table({
    head: [
      chalk.bold("Group"),
      chalk.bold(diff.beforeLabel),
      chalk.bold(diff.afterLabel),
      chalk.bold("Delta"),
      chalk.bold("Status"),
    ],
    style: { head: [], border: [] },
  });

  for (const g of diff.groups) {
    table.push(formatDiffRow(g));
  }

  console.log(table.toString());
  console.log();

  const parts = [
    `${diff.summary.total} groups`,
    diff.summary.stable > 0 ? chalk.dim(`${diff.summary.stable} stable`) : null,
    diff.summary.improvements > 0 ? chalk.green(`${diff.summary.improvements} improved`) : null,
    diff.summary.regressions > 0 ? chalk.red(`${diff.summary.regressions} regressed`) : null,
    diff.summary.added > 0 ? chalk.yellow(`${diff.summary.added} added`) : null,
    diff.summary.removed > 0 ? chalk.yellow(`${diff.summary.removed} removed`) : null,
  ]
    .filter(Boolean)
    .join(chalk.dim(" · "));

  console.log(`  ${parts}`);

  if (diff.hasRegressions) {
    console.log();
    console.log(chalk.red.bold(`  ⚠ ${diff.summary.regressions} regression(s) detected`));
  }
  console.log();
}

function formatSnapshot(s: GroupSnapshot | undefined): string {
  if (!s) return chalk.dim("—");
  return `${s.successMean.toFixed(1)}% ${formatTier(s.successTier)} ${chalk.dim(`n=${s.sampleSize}`)}`;
}

function formatDiffRow(g: GroupDiff): string[] {
  const deltaCol =
    g.successDelta !== undefined
      ? formatDelta(g.successDelta)
      : g.status === "added"
        ? chalk.yellow("new")
        : chalk.yellow("removed");

  return [g.group, formatSnapshot(g.before), formatSnapshot(g.after), deltaCol, formatStatus(g.status)];
}

function formatDelta(delta: number): string {
  const rounded = Math.round(delta * 10) / 10;
  if (rounded === 0) return chalk.dim("—");
  if (rounded > 0) return chalk.green(`+${rounded}pp`);
  return chalk.red(`${rounded}pp`);
}

function formatStatus(status: DiffStatus): string {
  switch (status) {
    case "regression":
      return chalk.red.bold("REGRESSED");
    case "improvement":
      return chalk.green("improved");
    case "stable":
      return chalk.dim("stable");
    case "added":
      return chalk.yellow("added");
    case "removed":
      return chalk.yellow("removed");
  }
}
