import { compareGroups, groupKey, type AggregateStat, type GroupKey } from "../robustness/aggregator.js";
import { isTierBetter, isTierWorse, type RobustnessTier } from "../robustness/tiers.js";

export type DiffStatus = "regression" | "improvement" | "stable" | "added" | "removed";

export interface GroupSnapshot {
  successMean: number;
  successTier: RobustnessTier;
  sampleSize: number;
}

export interface GroupDiff {
  group: GroupKey;
  architecture: string;
  condition: string;
  status: DiffStatus;
  before?: GroupSnapshot;
  after?: GroupSnapshot;
  /** Change of mean success rate, in percentage points */
  successDelta?: number;
  tierChanged?: boolean;
}

export interface DiffSummary {
  total: number;
  regressions: number;
  improvements: number;
  stable: number;
  added: number;
  removed: number;
}

export interface DiffReport {
  beforeLabel: string;
  afterLabel: string;
  groups: GroupDiff[];
  summary: DiffSummary;
  hasRegressions: boolean;
}

export interface DiffOptions {
  /** Success-rate drop, in percentage points, counted as a regression (default 5) */
  regressionThreshold?: number;
}

function snapshot(stat: AggregateStat): GroupSnapshot {
  return {
    successMean: stat.metrics.successRate.mean,
    successTier: stat.metrics.successRate.tier,
    sampleSize: stat.sampleSize,
  };
}

export function diffEvaluations(
  beforeLabel: string,
  beforeStats: readonly AggregateStat[],
  afterLabel: string,
  afterStats: readonly AggregateStat[],
  options?: DiffOptions
): DiffReport {
  const threshold = options?.regressionThreshold ?? 5;

  const beforeMap = new Map<GroupKey, AggregateStat>();
  for (const s of beforeStats) beforeMap.set(groupKey(s), s);

  const afterMap = new Map<GroupKey, AggregateStat>();
  for (const s of afterStats) afterMap.set(groupKey(s), s);

  const allGroups = new Set([...beforeMap.keys(), ...afterMap.keys()]);
  const groups: GroupDiff[] = [];

  for (const key of allGroups) {
    const before = beforeMap.get(key);
    const after = afterMap.get(key);

    if (before && after) {
      const successDelta = after.metrics.successRate.mean - before.metrics.successRate.mean;
      const beforeTier = before.metrics.successRate.tier;
      const afterTier = after.metrics.successRate.tier;

      let status: DiffStatus;
      if (successDelta < -threshold || isTierWorse(beforeTier, afterTier)) {
        status = "regression";
      } else if (successDelta > threshold || isTierBetter(beforeTier, afterTier)) {
        status = "improvement";
      } else {
        status = "stable";
      }

      groups.push({
        group: key,
        architecture: after.architecture,
        condition: after.condition,
        status,
        before: snapshot(before),
        after: snapshot(after),
        successDelta,
        tierChanged: beforeTier !== afterTier,
      });
    } else if (after) {
      groups.push({
        group: key,
        architecture: after.architecture,
        condition: after.condition,
        status: "added",
        after: snapshot(after),
      });
    } else if (before) {
      groups.push({
        group: key,
        architecture: before.architecture,
        condition: before.condition,
        status: "removed",
        before: snapshot(before),
      });
    }
  }

  const statusOrder: Record<DiffStatus, number> = {
    regression: 0,
    improvement: 1,
    stable: 2,
    added: 3,
    removed: 4,
  };
  groups.sort((a, b) => statusOrder[a.status] - statusOrder[b.status] || compareGroups(a, b));

  const summary: DiffSummary = {
    total: groups.length,
    regressions: groups.filter((g) => g.status === "regression").length,
    improvements: groups.filter((g) => g.status === "improvement").length,
    stable: groups.filter((g) => g.status === "stable").length,
    added: groups.filter((g) => g.status === "added").length,
    removed: groups.filter((g) => g.status === "removed").length,
  };

  return {
    beforeLabel,
    afterLabel,
    groups,
    summary,
    hasRegressions: summary.regressions > 0,
  };
}
