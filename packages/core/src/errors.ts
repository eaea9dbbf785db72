export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      issues.length === 1
        ? `Invalid evaluation config: ${issues[0]}`
        : `Invalid evaluation config:\n${issues.map((i) => `  - ${i}`).join("\n")}`
    );
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class AggregationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AggregationError";
  }
}

/** A diff named an evaluation the history store cannot supply. */
export class HistoryLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HistoryLookupError";
  }
}

export type CollectionErrorReason = "pattern_not_found" | "invalid_artifact" | "outcome_not_ok";

export interface CollectionError {
  reason: CollectionErrorReason;
  message: string;
}
