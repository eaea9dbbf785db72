import chalk from "chalk";
import {
  ConfigurationError,
  EvaluationPipeline,
  buildRunRequests,
  runKey,
  type EvaluationConfig,
  type RunRequest,
} from "@robench/core";
import { loadConfigFile, resolveEvaluationConfig, resolveStorePath, type RunFlags } from "../config.js";
import { exitCodeFor, printHeader, publishResult, renderEvent } from "../output.js";

export interface RunOptions extends RunFlags {
  save?: boolean;
  label?: string;
  strict?: boolean;
  dryRun?: boolean;
}

export async function runRun(options: RunOptions): Promise<void> {
  printHeader("Running evaluation");

  const file = await loadConfigFile();
  let config: EvaluationConfig;
  let requests: RunRequest[];
  try {
    config = resolveEvaluationConfig(file, options);
    requests = buildRunRequests(config);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      console.error(chalk.red(`  ${e.message}`));
      console.log();
      process.exitCode = 2;
      return;
    }
    throw e;
  }

  console.log(chalk.dim(`  Model        ${config.provider}/${config.model}`));
  console.log(chalk.dim(`  Task suite   ${config.taskSuite}`));
  console.log(chalk.dim(`  Runs         ${requests.length}`));
  console.log(chalk.dim(`  Output       ${config.outputDir}`));
  console.log();

  if (options.dryRun) {
    for (const request of requests) {
      console.log(`  ${runKey(request)}`);
    }
    console.log();
    return;
  }

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    console.log(chalk.yellow(`\n  Received ${signal}, stopping after the current run is killed...`));
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    const pipeline = new EvaluationPipeline(config, { onEvent: renderEvent });
    const result = await pipeline.run({ signal: controller.signal, requests });
    console.log();

    await publishResult(result, {
      outputDir: config.outputDir,
      label: options.label,
      model: config.model,
      provider: config.provider,
      save: options.save,
      storePath: resolveStorePath(file),
    });

    process.exitCode = exitCodeFor(result.summary, { strict: options.strict, cancelled: result.cancelled });
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}
