import { join } from "node:path";
import { DEFAULT_TASK_SUITE, TASK_SUITES, type Architecture, type Condition, type TaskSuite } from "../matrix/types.js";

export function sanitizeModelId(model: string): string {
  return model.replace(/[:/.]/g, "_");
}

function suiteSuffix(suite: TaskSuite): string {
  return suite === DEFAULT_TASK_SUITE ? "" : `_${suite}`;
}

/** `benchmark_{architecture}_{model_safe}{suite_suffix}.json`, as the runner writes it. */
export function runnerArtifactName(architecture: Architecture, model: string, suite: TaskSuite): string {
  return `benchmark_${architecture}_${sanitizeModelId(model)}${suiteSuffix(suite)}.json`;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Matcher for runner artifacts of (architecture, suite) with any model segment.
 * The model reported by the runner may differ from the one requested, so it is
 * left open. For the default suite, names ending in another suite's suffix are
 * rejected so a `complex` artifact is never taken for a `simple` one.
 */
export function runnerArtifactMatcher(architecture: Architecture, suite: TaskSuite): (fileName: string) => boolean {
  const pattern = new RegExp(`^benchmark_${escapeRegExp(architecture)}_(.+)${escapeRegExp(suiteSuffix(suite))}\\.json$`);
  const foreignSuffixes = suite === DEFAULT_TASK_SUITE
    ? TASK_SUITES.filter((s) => s !== DEFAULT_TASK_SUITE).map((s) => `_${s}.json`)
    : [];

  return (fileName) => pattern.test(fileName) && !foreignSuffixes.some((s) => fileName.endsWith(s));
}

/** Human-readable form of the matcher, for log lines. */
export function runnerArtifactPattern(architecture: Architecture, suite: TaskSuite): string {
  return `benchmark_${architecture}_*${suiteSuffix(suite)}.json`;
}

export interface CanonicalPaths {
  artifact: string;
  log: string;
}

export function canonicalPaths(
  runRoot: string,
  request: { architecture: Architecture; condition: Condition; contextSeed: number }
): CanonicalPaths {
  const stem = join(runRoot, request.condition, `${request.architecture}_context${request.contextSeed}`);
  return { artifact: `${stem}.json`, log: `${stem}.log` };
}

const CANONICAL_NAME = /^(.+)_context(\d+)\.json$/;

/** Inverse of {@link canonicalPaths} for a file name inside a condition directory. */
export function parseCanonicalName(fileName: string): { architecture: string; contextSeed: number } | null {
  const match = CANONICAL_NAME.exec(fileName);
  if (!match) return null;
  const contextSeed = parseInt(match[2], 10);
  if (contextSeed <= 0) return null;
  return { architecture: match[1], contextSeed };
}
