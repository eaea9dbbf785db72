import { AggregationError } from "../errors.js";
import type { Architecture, Condition, TierThresholds } from "../matrix/types.js";
import type { MetricRecord } from "../metrics/extractor.js";
import { coefficientOfVariation, mean, sampleStd } from "./stats.js";
import { DEFAULT_TIER_THRESHOLDS, classifyRobustness, type RobustnessTier } from "./tiers.js";

export const METRIC_NAMES = ["successRate", "avgTime", "avgSteps", "avgTokens"] as const;
export type MetricName = (typeof METRIC_NAMES)[number];

export interface MetricStat {
  mean: number;
  std: number;
  /** Percent; null when the mean is 0 */
  cv: number | null;
  min: number;
  max: number;
  range: number;
  tier: RobustnessTier;
}

export interface AggregateStat {
  architecture: Architecture;
  condition: Condition;
  sampleSize: number;
  contextSeeds: number[];
  metrics: Record<MetricName, MetricStat>;
  /** Mean CV of success rate, time and steps, tiered the same way */
  overall: { cv: number | null; tier: RobustnessTier };
}

export type GroupKey = `${Architecture}/${Condition}`;

export function groupKey(record: { architecture: Architecture; condition: Condition }): GroupKey {
  return `${record.architecture}/${record.condition}`;
}

export function compareGroups(
  a: { architecture: string; condition: string },
  b: { architecture: string; condition: string }
): number {
  if (a.architecture !== b.architecture) return a.architecture < b.architecture ? -1 : 1;
  if (a.condition !== b.condition) return a.condition < b.condition ? -1 : 1;
  return 0;
}

function summarizeMetric(values: number[], thresholds: TierThresholds): MetricStat {
  const m = mean(values);
  const std = sampleStd(values);
  const cv = coefficientOfVariation(std, m);
  const min = Math.min(...values);
  const max = Math.max(...values);
  return {
    mean: m,
    std,
    cv,
    min,
    max,
    range: max - min,
    tier: classifyRobustness(values.length, cv, thresholds),
  };
}

const OVERALL_METRICS: readonly MetricName[] = ["successRate", "avgTime", "avgSteps"];

/** Statistics for records that all share one (architecture, condition) key. */
export function summarizeGroup(
  records: readonly MetricRecord[],
  thresholds: TierThresholds = DEFAULT_TIER_THRESHOLDS
): AggregateStat {
  if (records.length === 0) {
    throw new AggregationError("cannot aggregate an empty group of metric records");
  }
  const { architecture, condition } = records[0];
  if (records.some((r) => r.architecture !== architecture || r.condition !== condition)) {
    throw new AggregationError(`records in group ${architecture}/${condition} do not share one key`);
  }

  const column = (name: MetricName) => summarizeMetric(records.map((r) => r[name]), thresholds);
  const metrics: Record<MetricName, MetricStat> = {
    successRate: column("successRate"),
    avgTime: column("avgTime"),
    avgSteps: column("avgSteps"),
    avgTokens: column("avgTokens"),
  };

  const cvs = OVERALL_METRICS.map((name) => metrics[name].cv).filter((cv): cv is number => cv !== null);
  const overallCv = cvs.length > 0 ? cvs.reduce((sum, cv) => sum + cv, 0) / cvs.length : null;

  return {
    architecture,
    condition,
    sampleSize: records.length,
    contextSeeds: records.map((r) => r.contextSeed).sort((a, b) => a - b),
    metrics,
    overall: { cv: overallCv, tier: classifyRobustness(records.length, overallCv, thresholds) },
  };
}

/**
 * Groups records by (architecture, condition) and summarizes each group.
 * Pure: the returned map iterates in (architecture, condition) order.
 */
export function aggregate(
  records: readonly MetricRecord[],
  thresholds: TierThresholds = DEFAULT_TIER_THRESHOLDS
): Map<GroupKey, AggregateStat> {
  const groups = new Map<GroupKey, MetricRecord[]>();
  for (const record of records) {
    const key = groupKey(record);
    const group = groups.get(key);
    if (group) group.push(record);
    else groups.set(key, [record]);
  }

  const stats = [...groups.values()].map((group) => summarizeGroup(group, thresholds));
  stats.sort(compareGroups);

  return new Map(stats.map((s) => [groupKey(s), s]));
}
