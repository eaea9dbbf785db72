import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { MetricRecord } from "../metrics/extractor.js";
import { METRIC_NAMES, compareGroups, type AggregateStat, type MetricName } from "../robustness/aggregator.js";

export const LONG_TABLE_FILE = "datos_completos.csv";
export const WIDE_TABLE_FILE = "tabla_resumen.csv";
export const ROBUSTNESS_TABLE_FILE = "robustez.csv";

const LONG_COLUMNS = [
  "architecture",
  "condition",
  "context",
  "success_rate",
  "avg_time",
  "avg_steps",
  "avg_tokens",
] as const;

const WIDE_COLUMNS = [
  "architecture",
  "condition",
  "success_mean",
  "success_std",
  "time_mean",
  "time_std",
  "steps_mean",
  "steps_std",
  "tokens_mean",
  "tokens_std",
] as const;

const ROBUSTNESS_COLUMNS = [
  "architecture",
  "condition",
  "metric",
  "n",
  "mean",
  "std",
  "cv",
  "min",
  "max",
  "range",
  "tier",
] as const;

const METRIC_COLUMN: Record<MetricName, string> = {
  successRate: "success_rate",
  avgTime: "avg_time",
  avgSteps: "avg_steps",
  avgTokens: "avg_tokens",
};

export interface CsvOptions {
  /** Decimal places kept for numeric cells (default 4) */
  precision?: number;
}

export function formatNumber(value: number | null, precision = 4): string {
  if (value === null || !Number.isFinite(value)) return "";
  const rounded = Number(value.toFixed(precision));
  return String(rounded === 0 ? 0 : rounded);
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function toCsv(header: readonly string[], rows: string[][]): string {
  return [header, ...rows].map((row) => row.map(csvField).join(",")).join("\n") + "\n";
}

function sortedAggregates(aggregates: Iterable<AggregateStat>): AggregateStat[] {
  return [...aggregates].sort(compareGroups);
}

/** One row per MetricRecord, sorted by (architecture, condition, context). */
export function formatLongTable(records: readonly MetricRecord[], options?: CsvOptions): string {
  const p = options?.precision;
  const rows = [...records]
    .sort((a, b) => compareGroups(a, b) || a.contextSeed - b.contextSeed)
    .map((r) => [
      r.architecture,
      r.condition,
      String(r.contextSeed),
      formatNumber(r.successRate, p),
      formatNumber(r.avgTime, p),
      formatNumber(r.avgSteps, p),
      formatNumber(r.avgTokens, p),
    ]);
  return toCsv(LONG_COLUMNS, rows);
}

/** One row per (architecture, condition) with mean and std of each metric. */
export function formatWideTable(aggregates: Iterable<AggregateStat>, options?: CsvOptions): string {
  const p = options?.precision;
  const rows = sortedAggregates(aggregates).map((s) => [
    s.architecture,
    s.condition,
    ...METRIC_NAMES.flatMap((name) => [
      formatNumber(s.metrics[name].mean, p),
      formatNumber(s.metrics[name].std, p),
    ]),
  ]);
  return toCsv(WIDE_COLUMNS, rows);
}

/** One row per (architecture, condition, metric) with CV and robustness tier. */
export function formatRobustnessTable(aggregates: Iterable<AggregateStat>, options?: CsvOptions): string {
  const p = options?.precision;
  const rows = sortedAggregates(aggregates).flatMap((s) =>
    METRIC_NAMES.map((name) => {
      const m = s.metrics[name];
      return [
        s.architecture,
        s.condition,
        METRIC_COLUMN[name],
        String(s.sampleSize),
        formatNumber(m.mean, p),
        formatNumber(m.std, p),
        formatNumber(m.cv, p),
        formatNumber(m.min, p),
        formatNumber(m.max, p),
        formatNumber(m.range, p),
        m.tier,
      ];
    })
  );
  return toCsv(ROBUSTNESS_COLUMNS, rows);
}

export interface EmittedDatasets {
  longTable: string;
  wideTable: string;
  robustnessTable: string;
}

export async function emitDatasets(
  records: readonly MetricRecord[],
  aggregates: Iterable<AggregateStat>,
  destination: string,
  options?: CsvOptions
): Promise<EmittedDatasets> {
  const stats = [...aggregates];
  await mkdir(destination, { recursive: true });

  const files: EmittedDatasets = {
    longTable: join(destination, LONG_TABLE_FILE),
    wideTable: join(destination, WIDE_TABLE_FILE),
    robustnessTable: join(destination, ROBUSTNESS_TABLE_FILE),
  };

  await writeFile(files.longTable, formatLongTable(records, options), "utf-8");
  await writeFile(files.wideTable, formatWideTable(stats, options), "utf-8");
  await writeFile(files.robustnessTable, formatRobustnessTable(stats, options), "utf-8");

  return files;
}
