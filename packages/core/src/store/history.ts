import type { CompletenessSummary } from "../pipeline.js";
import type { AggregateStat } from "../robustness/aggregator.js";

export interface EvaluationMeta {
  id: string;
  label: string;
  createdAt: string;
  groupCount: number;
  summary: CompletenessSummary;
}

export interface StoredEvaluation {
  meta: EvaluationMeta;
  aggregates: AggregateStat[];
}

export interface SavableEvaluation {
  aggregates: Iterable<AggregateStat>;
  summary: CompletenessSummary;
}

export interface HistoryStore {
  saveEvaluation(label: string, evaluation: SavableEvaluation, meta?: Record<string, unknown>): EvaluationMeta;
  loadEvaluation(id: string): StoredEvaluation | null;
  loadByLabel(label: string): StoredEvaluation | null;
  listLabels(): string[];
  close(): void;
}
