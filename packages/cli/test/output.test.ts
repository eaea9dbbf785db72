import { describe, expect, it } from "vitest";
import type { CompletenessSummary } from "@robench/core";
import { exitCodeFor } from "../src/output.js";

const clean: CompletenessSummary = {
  requested: 4,
  ok: 4,
  reused: 0,
  timeout: 0,
  artifactMissing: 0,
  processError: 0,
  cancelled: 0,
  records: 4,
  droppedRecords: 0,
};

describe("exitCodeFor", () => {
  it("succeeds when every run produced metrics", () => {
    expect(exitCodeFor(clean, {})).toBe(0);
  });

  it("fails when a run could not launch", () => {
    expect(exitCodeFor({ ...clean, ok: 3, processError: 1 }, {})).toBe(1);
  });

  it("tolerates timeouts and missing artifacts unless strict", () => {
    const partial = { ...clean, ok: 2, timeout: 1, artifactMissing: 1 };
    expect(exitCodeFor(partial, {})).toBe(0);
    expect(exitCodeFor(partial, { strict: true })).toBe(1);
  });

  it("reports cancellation", () => {
    expect(exitCodeFor({ ...clean, cancelled: 2 }, { cancelled: true })).toBe(130);
  });
});
