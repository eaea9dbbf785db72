import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import {
  ARCHITECTURES,
  CONDITIONS,
  PERTURBATION_TYPES,
  TASK_SUITES,
  type EvaluationConfig,
  type TierThresholds,
} from "./types.js";

const RunnerSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().min(1).default("."),
  resultsDir: z.string().min(1).default("benchmark_results"),
});

const TierSchema = z
  .object({
    excellent: z.number().positive().default(10),
    good: z.number().positive().default(20),
    moderate: z.number().positive().default(35),
  })
  .refine((t) => t.excellent < t.good && t.good < t.moderate, {
    message: "tier thresholds must be strictly increasing (excellent < good < moderate)",
  });

const EvaluationConfigSchema = z
  .object({
    architectures: z
      .array(z.enum(ARCHITECTURES))
      .min(1, "at least one architecture is required")
      .refine((a) => new Set(a).size === a.length, "architectures must not repeat"),
    conditions: z
      .array(z.enum(CONDITIONS))
      .min(1, "at least one condition is required")
      .refine((c) => new Set(c).size === c.length, "conditions must not repeat")
      .default(["baseline", "perturbed"]),
    contexts: z.number().int("contexts must be an integer").positive("contexts must be positive"),
    perturbationTypes: z
      .array(z.enum(PERTURBATION_TYPES))
      .refine((p) => new Set(p).size === p.length, "perturbation types must not repeat")
      .default(["distractors", "noise"]),
    provider: z.string().min(1),
    model: z.string().min(1),
    taskSuite: z.enum(TASK_SUITES).default("complex"),
    maxIterations: z.number().int().positive().default(15),
    timeoutMs: z.number().int().positive().default(3_600_000),
    pacingDelayMs: z.number().int().nonnegative().default(2000),
    outputDir: z.string().min(1),
    runner: RunnerSchema,
    tiers: TierSchema.default({}),
    force: z.boolean().default(false),
  })
  .refine((c) => !c.conditions.includes("perturbed") || c.perturbationTypes.length > 0, {
    message: "the perturbed condition needs at least one perturbation type",
    path: ["perturbationTypes"],
  });

export type EvaluationConfigInput = z.input<typeof EvaluationConfigSchema>;

/**
 * Validates a raw (file + flags) configuration and returns it deeply frozen.
 * Every schema issue is reported at once through a single ConfigurationError.
 */
export function parseEvaluationConfig(input: unknown): EvaluationConfig {
  const result = EvaluationConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return deepFreeze(result.data);
}

/** Validates CV tier thresholds on their own, for commands that never launch the runner. */
export function parseTierThresholds(input: unknown): TierThresholds {
  const result = TierSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `tiers.${issue.path.join(".")}: ${issue.message}` : `tiers: ${issue.message}`
      )
    );
  }
  return Object.freeze(result.data);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
