export const ARCHITECTURES = ["react", "plan-then-act", "reflexion", "reference"] as const;
export type Architecture = (typeof ARCHITECTURES)[number];

export const CONDITIONS = ["baseline", "perturbed"] as const;
export type Condition = (typeof CONDITIONS)[number];

export const PERTURBATION_TYPES = ["distractors", "noise", "ambiguity", "incomplete"] as const;
export type PerturbationType = (typeof PERTURBATION_TYPES)[number];

export const TASK_SUITES = ["simple", "complex", "all"] as const;
export type TaskSuite = (typeof TASK_SUITES)[number];

/** The suite whose artifacts carry no suite suffix in their file name. */
export const DEFAULT_TASK_SUITE: TaskSuite = "simple";

export interface RunnerCommand {
  command: string;
  args: readonly string[];
  /** Working directory of the runner process */
  cwd: string;
  /** Directory (relative to cwd unless absolute) where the runner drops its artifacts */
  resultsDir: string;
}

export interface TierThresholds {
  excellent: number;
  good: number;
  moderate: number;
}

export interface EvaluationConfig {
  architectures: readonly Architecture[];
  conditions: readonly Condition[];
  contexts: number;
  perturbationTypes: readonly PerturbationType[];
  provider: string;
  model: string;
  taskSuite: TaskSuite;
  maxIterations: number;
  timeoutMs: number;
  pacingDelayMs: number;
  outputDir: string;
  runner: RunnerCommand;
  tiers: TierThresholds;
  force: boolean;
}

interface RunRequestBase {
  architecture: Architecture;
  contextSeed: number;
  taskSuite: TaskSuite;
  maxIterations: number;
  timeoutMs: number;
}

export interface BaselineRunRequest extends RunRequestBase {
  condition: "baseline";
}

export interface PerturbedRunRequest extends RunRequestBase {
  condition: "perturbed";
  perturbationTypes: readonly PerturbationType[];
}

export type RunRequest = Readonly<BaselineRunRequest> | Readonly<PerturbedRunRequest>;

export function runKey(request: Pick<RunRequestBase, "architecture" | "contextSeed"> & { condition: Condition }): string {
  return `${request.condition}/${request.architecture}_context${request.contextSeed}`;
}
