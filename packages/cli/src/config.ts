import { cosmiconfig } from "cosmiconfig";
import {
  parseEvaluationConfig,
  parseTierThresholds,
  type EvaluationConfig,
  type EvaluationConfigInput,
  type TierThresholds,
} from "@robench/core";

export type RobenchConfig = Partial<EvaluationConfigInput> & {
  store?: {
    path?: string;
  };
};

export function defineConfig(config: RobenchConfig): RobenchConfig {
  return config;
}

export const DEFAULT_OUTPUT_DIR = "robench-results";
export const DEFAULT_STORE_PATH = ".robench/history.db";

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads the nearest robench config file; an absent file yields an empty config. */
export async function loadConfigFile(searchFrom?: string): Promise<RawConfig> {
  const explorer = cosmiconfig("robench", {
    searchPlaces: [
      "robench.config.json",
      ".robenchrc",
      ".robenchrc.json",
      "robench.config.js",
      "robench.config.ts",
    ],
  });

  const result = searchFrom ? await explorer.search(searchFrom) : await explorer.search();
  if (!result || result.isEmpty) return {};

  const config: unknown = interpolateEnvVars(result.config);
  if (!isRecord(config)) {
    throw new Error(`${result.filepath} must export an object.`);
  }
  return config;
}

export function interpolateEnvVars(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{env\.(\w+)\}/g, (_, key: string) => {
      return process.env[key] ?? "";
    });
  }
  if (Array.isArray(value)) {
    return value.map(interpolateEnvVars);
  }
  if (isRecord(value)) {
    const result: RawConfig = {};
    for (const [key, nested] of Object.entries(value)) {
      result[key] = interpolateEnvVars(nested);
    }
    return result;
  }
  return value;
}

export interface RunFlags {
  architectures?: string;
  conditions?: string;
  contexts?: string;
  perturbations?: string;
  provider?: string;
  model?: string;
  taskSuite?: string;
  maxIterations?: string;
  timeout?: string;
  pacing?: string;
  output?: string;
  runner?: string;
  runnerArgs?: string;
  runnerCwd?: string;
  resultsDir?: string;
  force?: boolean;
}

export function splitList(value: string): string[] {
  return value
    .split(/[\s,]+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

function toInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function defined(entries: RawConfig): RawConfig {
  return Object.fromEntries(Object.entries(entries).filter(([, v]) => v !== undefined));
}

/**
 * Overlays command-line flags on the file config and validates the result.
 * Throws ConfigurationError when the merged matrix is malformed.
 */
export function resolveEvaluationConfig(file: RawConfig, flags: RunFlags): EvaluationConfig {
  const fileRunner = isRecord(file.runner) ? file.runner : {};
  const merged: RawConfig = {
    ...file,
    ...defined({
      architectures: flags.architectures !== undefined ? splitList(flags.architectures) : undefined,
      conditions: flags.conditions !== undefined ? splitList(flags.conditions) : undefined,
      contexts: toInt(flags.contexts),
      perturbationTypes: flags.perturbations !== undefined ? splitList(flags.perturbations) : undefined,
      provider: flags.provider,
      model: flags.model,
      taskSuite: flags.taskSuite,
      maxIterations: toInt(flags.maxIterations),
      timeoutMs: toInt(flags.timeout),
      pacingDelayMs: toInt(flags.pacing),
      outputDir: flags.output,
      force: flags.force,
    }),
    runner: {
      ...fileRunner,
      ...defined({
        command: flags.runner,
        args: flags.runnerArgs !== undefined ? splitList(flags.runnerArgs) : undefined,
        cwd: flags.runnerCwd,
        resultsDir: flags.resultsDir,
      }),
    },
  };
  if (merged.outputDir === undefined) merged.outputDir = DEFAULT_OUTPUT_DIR;

  return parseEvaluationConfig(merged);
}

export function resolveTiers(file: RawConfig): TierThresholds {
  return parseTierThresholds(file.tiers);
}

export function resolveStorePath(file: RawConfig): string {
  if (isRecord(file.store) && typeof file.store.path === "string") return file.store.path;
  return DEFAULT_STORE_PATH;
}

export function resolveOutputDir(file: RawConfig, flag?: string): string {
  if (flag !== undefined) return flag;
  return typeof file.outputDir === "string" ? file.outputDir : DEFAULT_OUTPUT_DIR;
}
