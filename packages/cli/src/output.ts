import { resolve, join } from "node:path";
import chalk from "chalk";
import {
  SqliteHistoryStore,
  emitDatasets,
  printTerminalReport,
  runKey,
  writeJsonReport,
  type CompletenessSummary,
  type PipelineEvent,
  type PipelineResult,
  type TerminalRunState,
} from "@robench/core";

export interface OutputOptions {
  outputDir: string;
  label?: string;
  model?: string;
  provider?: string;
  save?: boolean;
  storePath: string;
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold(`  Robench — ${title}`));
  console.log(chalk.dim("  " + "─".repeat(40)));
  console.log();
}

const STATE_ICONS: Record<TerminalRunState, string> = {
  ok: chalk.green("✓"),
  reused: chalk.cyan("↷"),
  timeout: chalk.yellow("⏱"),
  artifact_missing: chalk.yellow.bold("✗"),
  process_error: chalk.red("✗"),
  cancelled: chalk.dim("–"),
};

const STATE_LABELS: Record<TerminalRunState, (text: string) => string> = {
  ok: chalk.green,
  reused: chalk.cyan,
  timeout: chalk.yellow,
  artifact_missing: chalk.yellow.bold,
  process_error: chalk.red,
  cancelled: chalk.dim,
};

/** Renders pipeline progress as one line per finished run. */
export function renderEvent(event: PipelineEvent): void {
  switch (event.type) {
    case "run:start":
      console.log(chalk.dim(`  [${event.index + 1}/${event.total}] ${runKey(event.request)} ...`));
      break;
    case "run:finish": {
      const { report } = event;
      const seconds = (report.durationMs / 1000).toFixed(1);
      const detail = report.message ? chalk.dim(` (${report.message})`) : "";
      console.log(
        `  ${STATE_ICONS[report.state]} ${report.key} ` +
          `${STATE_LABELS[report.state](report.state)} ${chalk.dim(`${seconds}s`)}${detail}`
      );
      break;
    }
    case "pacing":
      console.log(chalk.dim(`  pausing ${event.ms}ms before next run`));
      break;
    case "warning":
      console.log(chalk.yellow(`  Warning: ${event.message}`));
      break;
  }
}

/**
 * Exit status for a finished evaluation: 130 when interrupted, 1 when a run
 * failed to launch (or, under strict, when any run fell short), 0 otherwise.
 */
export function exitCodeFor(summary: CompletenessSummary, options: { strict?: boolean; cancelled?: boolean }): number {
  if (options.cancelled) return 130;
  if (summary.processError > 0) return 1;
  if (options.strict && summary.timeout + summary.artifactMissing + summary.cancelled + summary.droppedRecords > 0) {
    return 1;
  }
  return 0;
}

/** Writes CSV and JSON datasets, prints the report and optionally saves to history. */
export async function publishResult(result: PipelineResult, options: OutputOptions): Promise<void> {
  const reportsDir = join(resolve(options.outputDir), "reports");
  const datasets = await emitDatasets(result.records, result.aggregates.values(), reportsDir);
  const jsonPath = await writeJsonReport(reportsDir, result, {
    label: options.label,
    model: options.model,
    provider: options.provider,
  });

  printTerminalReport(result);

  console.log(chalk.dim(`  Long table   → ${datasets.longTable}`));
  console.log(chalk.dim(`  Summary      → ${datasets.wideTable}`));
  console.log(chalk.dim(`  Robustness   → ${datasets.robustnessTable}`));
  console.log(chalk.dim(`  JSON report  → ${jsonPath}`));
  console.log();

  if (options.save) {
    const label = options.label ?? `eval-${new Date().toISOString().replace(/[:.]/g, "-")}`;
    const store = new SqliteHistoryStore(resolve(options.storePath));
    try {
      const meta = store.saveEvaluation(label, {
        aggregates: result.aggregates.values(),
        summary: result.summary,
      }, { model: options.model, provider: options.provider });
      console.log(chalk.dim(`  Saved as "${label}" (${meta.id.slice(0, 8)})`));
      console.log();
    } finally {
      store.close();
    }
  }
}
