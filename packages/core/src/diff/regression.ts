import { HistoryLookupError } from "../errors.js";
import type { CompletenessSummary } from "../pipeline.js";
import type { HistoryStore, StoredEvaluation } from "../store/history.js";
import { diffEvaluations, type DiffOptions, type DiffReport } from "./engine.js";

/**
 * Maps `latest` and `previous` to the newest and second-newest stored labels.
 * Any other label is returned as given.
 */
export function resolveLabel(store: Pick<HistoryStore, "listLabels">, label: string): string {
  if (label !== "latest" && label !== "previous") return label;

  const labels = store.listLabels();
  if (label === "latest") {
    if (labels.length === 0) throw new HistoryLookupError("No evaluations stored yet.");
    return labels[0];
  }
  if (labels.length < 2) {
    throw new HistoryLookupError("Need at least 2 stored evaluations to use 'previous'.");
  }
  return labels[1];
}

export interface CoverageChange {
  /** Records produced per requested run, in percent */
  before: number;
  after: number;
  /** Percentage points */
  delta: number;
  lost: boolean;
}

export function coverageOf(summary: CompletenessSummary): number {
  return summary.requested === 0 ? 0 : (summary.records / summary.requested) * 100;
}

export function compareCoverage(before: CompletenessSummary, after: CompletenessSummary): CoverageChange {
  const b = coverageOf(before);
  const a = coverageOf(after);
  return { before: b, after: a, delta: a - b, lost: a < b };
}

export interface RegressionCheckResult {
  diff: DiffReport;
  coverage: CoverageChange;
  /** A group regressed or the later evaluation covered less of its matrix */
  hasRegressions: boolean;
  regressionSummary: string;
  exitCode: number;
}

function load(store: Pick<HistoryStore, "loadByLabel">, label: string): StoredEvaluation {
  const evaluation = store.loadByLabel(label);
  if (!evaluation) throw new HistoryLookupError(`Evaluation "${label}" not found in history store.`);
  return evaluation;
}

/**
 * Compares two stored evaluations, resolving relative labels first. Fails
 * (exit code 1) on a regressed group or on lost coverage.
 */
export function checkRegressions(
  store: Pick<HistoryStore, "listLabels" | "loadByLabel">,
  beforeLabel: string,
  afterLabel: string,
  options?: DiffOptions
): RegressionCheckResult {
  const beforeName = resolveLabel(store, beforeLabel);
  const afterName = resolveLabel(store, afterLabel);
  const before = load(store, beforeName);
  const after = load(store, afterName);

  const diff = diffEvaluations(beforeName, before.aggregates, afterName, after.aggregates, options);
  const coverage = compareCoverage(before.meta.summary, after.meta.summary);

  const problems: string[] = [];
  if (diff.hasRegressions) problems.push(`${diff.summary.regressions} group(s) regressed`);
  if (coverage.lost) {
    problems.push(`coverage fell from ${coverage.before.toFixed(1)}% to ${coverage.after.toFixed(1)}%`);
  }

  return {
    diff,
    coverage,
    hasRegressions: problems.length > 0,
    regressionSummary:
      problems.length > 0
        ? `${afterName} vs ${beforeName}: ${problems.join("; ")}`
        : `${afterName} vs ${beforeName}: no regressions`,
    exitCode: problems.length > 0 ? 1 : 0,
  };
}
