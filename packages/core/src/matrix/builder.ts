import { ConfigurationError } from "../errors.js";
import type { Architecture, Condition, EvaluationConfig, PerturbationType, RunRequest } from "./types.js";

export type EvaluationMatrix = Pick<
  EvaluationConfig,
  "architectures" | "conditions" | "contexts" | "perturbationTypes" | "taskSuite" | "maxIterations" | "timeoutMs"
>;

/**
 * Expands the evaluation matrix into run requests, architecture-major, then
 * condition (in configured order), then context seed ascending from 1.
 */
export function buildRunRequests(matrix: EvaluationMatrix): RunRequest[] {
  if (matrix.architectures.length === 0) {
    throw new ConfigurationError(["at least one architecture is required"]);
  }
  if (!Number.isInteger(matrix.contexts) || matrix.contexts <= 0) {
    throw new ConfigurationError([`contexts must be a positive integer (got ${matrix.contexts})`]);
  }
  if (matrix.conditions.length === 0) {
    throw new ConfigurationError(["at least one condition is required"]);
  }
  if (matrix.conditions.includes("perturbed") && matrix.perturbationTypes.length === 0) {
    throw new ConfigurationError(["the perturbed condition needs at least one perturbation type"]);
  }

  const requests: RunRequest[] = [];
  const seen = new Set<string>();

  for (const architecture of matrix.architectures) {
    for (const condition of matrix.conditions) {
      for (let seed = 1; seed <= matrix.contexts; seed++) {
        const key = `${architecture}|${condition}|${seed}`;
        if (seen.has(key)) {
          throw new ConfigurationError([`duplicate run request ${key}`]);
        }
        seen.add(key);
        requests.push(createRequest(matrix, architecture, condition, seed));
      }
    }
  }

  return requests;
}

function createRequest(
  matrix: EvaluationMatrix,
  architecture: Architecture,
  condition: Condition,
  contextSeed: number
): RunRequest {
  const base = {
    architecture,
    contextSeed,
    taskSuite: matrix.taskSuite,
    maxIterations: matrix.maxIterations,
    timeoutMs: matrix.timeoutMs,
  };

  if (condition === "perturbed") {
    const perturbationTypes: readonly PerturbationType[] = Object.freeze([...matrix.perturbationTypes]);
    return Object.freeze({ ...base, condition, perturbationTypes });
  }
  return Object.freeze({ ...base, condition });
}
