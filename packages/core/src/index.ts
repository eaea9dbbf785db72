// Evaluation matrix
export {
  ARCHITECTURES,
  CONDITIONS,
  PERTURBATION_TYPES,
  TASK_SUITES,
  DEFAULT_TASK_SUITE,
  runKey,
} from "./matrix/types.js";
export type {
  Architecture,
  Condition,
  PerturbationType,
  TaskSuite,
  RunnerCommand,
  TierThresholds,
  EvaluationConfig,
  RunRequest,
  BaselineRunRequest,
  PerturbedRunRequest,
} from "./matrix/types.js";
export { parseEvaluationConfig, parseTierThresholds } from "./matrix/schema.js";
export type { EvaluationConfigInput } from "./matrix/schema.js";
export { buildRunRequests } from "./matrix/builder.js";
export type { EvaluationMatrix } from "./matrix/builder.js";

// Errors
export { ConfigurationError, AggregationError, HistoryLookupError } from "./errors.js";
export type { CollectionError, CollectionErrorReason } from "./errors.js";

// Runner
export { LocalProcessRunner, OUTPUT_TAIL_CHARS } from "./runner/process.js";
export type { ProcessRunner, ExecOpts, ExecResult } from "./runner/process.js";
export { RunExecutor, appendRunLog } from "./runner/executor.js";
export type { RunOutcome, ExecutionStatus, RunExecutorOptions } from "./runner/executor.js";

// Artifacts
export {
  sanitizeModelId,
  runnerArtifactName,
  runnerArtifactMatcher,
  runnerArtifactPattern,
  canonicalPaths,
  parseCanonicalName,
} from "./artifact/naming.js";
export type { CanonicalPaths } from "./artifact/naming.js";
export { ResultArtifactSchema, parseResultArtifact, readResultArtifact } from "./artifact/schema.js";
export type { ResultArtifact, TaskEntry, ArtifactMetadata, ArtifactReadResult } from "./artifact/schema.js";
export { ArtifactCollector } from "./artifact/collector.js";
export type { ArtifactSnapshot, CollectResult } from "./artifact/collector.js";

// Metrics & robustness
export { extractMetrics } from "./metrics/extractor.js";
export type { MetricRecord, RunIdentity, ExtractOptions } from "./metrics/extractor.js";
export { mean, sampleStd, coefficientOfVariation } from "./robustness/stats.js";
export { DEFAULT_TIER_THRESHOLDS, tierForCv, classifyRobustness } from "./robustness/tiers.js";
export type { RobustnessTier, NumericTier } from "./robustness/tiers.js";
export { aggregate, summarizeGroup, groupKey, METRIC_NAMES } from "./robustness/aggregator.js";
export type { AggregateStat, MetricStat, MetricName, GroupKey } from "./robustness/aggregator.js";

// Pipeline
export { EvaluationPipeline, RunStateMachine, analyzeRunRoot } from "./pipeline.js";
export type {
  RunState,
  TerminalRunState,
  RunReport,
  CompletenessSummary,
  PipelineResult,
  PipelineEvent,
  PipelineDeps,
  PipelineRunOptions,
  AnalyzeOptions,
} from "./pipeline.js";

// Reporter
export {
  emitDatasets,
  formatLongTable,
  formatWideTable,
  formatRobustnessTable,
  formatNumber,
  LONG_TABLE_FILE,
  WIDE_TABLE_FILE,
  ROBUSTNESS_TABLE_FILE,
} from "./report/csv.js";
export type { EmittedDatasets, CsvOptions } from "./report/csv.js";
export { generateJsonReport, writeJsonReport, collectFailures, JSON_REPORT_FILE } from "./report/json.js";
export type { JsonReport, RunFailure } from "./report/json.js";
export { printTerminalReport, formatTier } from "./report/terminal.js";

// Store
export type { HistoryStore, EvaluationMeta, StoredEvaluation, SavableEvaluation } from "./store/history.js";
export { SqliteHistoryStore } from "./store/sqlite.js";

// Diff
export { diffEvaluations } from "./diff/engine.js";
export type { DiffReport, GroupDiff, GroupSnapshot, DiffStatus, DiffSummary, DiffOptions } from "./diff/engine.js";
export { checkRegressions, compareCoverage, coverageOf, resolveLabel } from "./diff/regression.js";
export type { CoverageChange, RegressionCheckResult } from "./diff/regression.js";
