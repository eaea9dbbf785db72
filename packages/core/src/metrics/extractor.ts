import type { ResultArtifact, TaskEntry } from "../artifact/schema.js";
import type { Architecture, Condition } from "../matrix/types.js";

export interface MetricRecord {
  architecture: Architecture;
  condition: Condition;
  contextSeed: number;
  /** Percentage of successful tasks, 0-100 */
  successRate: number;
  /** Mean task execution time in seconds */
  avgTime: number;
  avgSteps: number;
  avgTokens: number;
  totalTasks: number;
}

export interface RunIdentity {
  architecture: Architecture;
  condition: Condition;
  contextSeed: number;
}

export interface ExtractOptions {
  /** Receives the reason an artifact was skipped */
  warn?: (message: string) => void;
}

function taskLabel(entry: TaskEntry, index: number): string {
  return entry.task_id ? `task ${index + 1} (${entry.task_id})` : `task ${index + 1}`;
}

function tokensOf(entry: TaskEntry): number {
  return entry.metrics?.total_tokens ?? entry.total_tokens ?? 0;
}

/**
 * Reduces an artifact's task entries to one MetricRecord.
 *
 * Step and token counts default to 0 per task when absent. A task without a
 * success flag or execution time makes the whole artifact unusable, as does an
 * artifact with no tasks; both return null.
 */
export function extractMetrics(
  artifact: ResultArtifact,
  identity: RunIdentity,
  options?: ExtractOptions
): MetricRecord | null {
  const warn = options?.warn ?? ((message: string) => console.warn(`Warning: ${message}`));
  const label = `${identity.architecture}/${identity.condition}/context${identity.contextSeed}`;
  const tasks = artifact.results;

  if (tasks.length === 0) {
    warn(`${label}: artifact has no task entries, skipping`);
    return null;
  }

  let successes = 0;
  let totalTime = 0;
  let totalSteps = 0;
  let totalTokens = 0;

  for (const [index, entry] of tasks.entries()) {
    if (entry.success === undefined) {
      warn(`${label}: ${taskLabel(entry, index)} has no success flag, skipping artifact`);
      return null;
    }
    if (entry.execution_time === undefined) {
      warn(`${label}: ${taskLabel(entry, index)} has no execution_time, skipping artifact`);
      return null;
    }

    if (entry.success) successes++;
    totalTime += entry.execution_time;
    totalSteps += entry.steps ?? 0;
    totalTokens += tokensOf(entry);
  }

  const total = tasks.length;
  return {
    ...identity,
    successRate: (successes / total) * 100,
    avgTime: totalTime / total,
    avgSteps: totalSteps / total,
    avgTokens: totalTokens / total,
    totalTasks: total,
  };
}
