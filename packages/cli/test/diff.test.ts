import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SqliteHistoryStore, type CompletenessSummary } from "@robench/core";
import { diffCommand } from "../src/commands/diff.js";

const summary: CompletenessSummary = {
  requested: 2,
  ok: 2,
  reused: 0,
  timeout: 0,
  artifactMissing: 0,
  processError: 0,
  cancelled: 0,
  records: 2,
  droppedRecords: 0,
};

describe("diffCommand", () => {
  let store: SqliteHistoryStore;

  beforeEach(() => {
    store = new SqliteHistoryStore(":memory:");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("reports an unknown label without throwing", () => {
    store.saveEvaluation("v1", { aggregates: [], summary });

    expect(() => diffCommand(store, { before: "v1", after: "v9" })).not.toThrow();

    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Evaluation "v9" not found in history store.')
    );
    expect(process.exitCode).toBe(1);
  });

  it("reports previous with a single stored evaluation", () => {
    store.saveEvaluation("v1", { aggregates: [], summary });

    diffCommand(store, { before: "previous", after: "latest" });

    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining("Need at least 2 stored evaluations to use 'previous'.")
    );
    expect(process.exitCode).toBe(1);
  });

  it("succeeds when nothing changed", () => {
    store.saveEvaluation("v1", { aggregates: [], summary });
    store.saveEvaluation("v2", { aggregates: [], summary });

    diffCommand(store, { before: "previous", after: "latest" });

    expect(console.error).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(0);
  });

  it("fails on lost coverage and includes it in JSON output", () => {
    store.saveEvaluation("v1", { aggregates: [], summary });
    store.saveEvaluation("v2", { aggregates: [], summary: { ...summary, ok: 1, timeout: 1, records: 1 } });

    diffCommand(store, { before: "v1", after: "v2", json: true });

    const printed = vi.mocked(console.log).mock.calls[0][0];
    expect(JSON.parse(String(printed))).toMatchObject({
      beforeLabel: "v1",
      afterLabel: "v2",
      coverage: { before: 100, after: 50, delta: -50, lost: true },
    });
    expect(process.exitCode).toBe(1);
  });
});
