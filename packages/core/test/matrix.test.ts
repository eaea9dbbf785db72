import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import { buildRunRequests, type EvaluationMatrix } from "../src/matrix/builder.js";
import { parseEvaluationConfig, parseTierThresholds } from "../src/matrix/schema.js";
import { runKey } from "../src/matrix/types.js";

const matrix: EvaluationMatrix = {
  architectures: ["react", "plan-then-act", "reflexion"],
  conditions: ["baseline", "perturbed"],
  contexts: 5,
  perturbationTypes: ["distractors", "noise"],
  taskSuite: "complex",
  maxIterations: 15,
  timeoutMs: 3_600_000,
};

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError) return e.issues;
    throw e;
  }
  throw new Error("expected a ConfigurationError");
}

describe("buildRunRequests", () => {
  it("produces one request per architecture, condition and seed", () => {
    const requests = buildRunRequests(matrix);
    expect(requests).toHaveLength(3 * 2 * 5);
    expect(new Set(requests.map(runKey)).size).toBe(30);
  });

  it("orders architecture-major, then condition, then ascending seed", () => {
    const keys = buildRunRequests({ ...matrix, contexts: 2 }).map(runKey);
    expect(keys.slice(0, 5)).toEqual([
      "baseline/react_context1",
      "baseline/react_context2",
      "perturbed/react_context1",
      "perturbed/react_context2",
      "baseline/plan-then-act_context1",
    ]);
  });

  it("attaches perturbation types only to perturbed requests", () => {
    const [baseline, , , , , perturbed] = buildRunRequests(matrix);
    expect(baseline.condition).toBe("baseline");
    expect("perturbationTypes" in baseline).toBe(false);
    expect(perturbed.condition).toBe("perturbed");
    if (perturbed.condition === "perturbed") {
      expect(perturbed.perturbationTypes).toEqual(["distractors", "noise"]);
    }
  });

  it("freezes requests", () => {
    const [first] = buildRunRequests(matrix);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("rejects an empty architecture list", () => {
    expect(issuesOf(() => buildRunRequests({ ...matrix, architectures: [] }))).toEqual([
      "at least one architecture is required",
    ]);
  });

  it("rejects a non-positive context count", () => {
    expect(issuesOf(() => buildRunRequests({ ...matrix, contexts: 0 }))).toEqual([
      "contexts must be a positive integer (got 0)",
    ]);
  });

  it("rejects the perturbed condition without perturbation types", () => {
    expect(issuesOf(() => buildRunRequests({ ...matrix, perturbationTypes: [] }))).toEqual([
      "the perturbed condition needs at least one perturbation type",
    ]);
  });

  it("accepts a baseline-only matrix without perturbation types", () => {
    const requests = buildRunRequests({ ...matrix, conditions: ["baseline"], perturbationTypes: [] });
    expect(requests).toHaveLength(15);
  });
});

describe("parseEvaluationConfig", () => {
  const minimal = {
    architectures: ["react"],
    contexts: 3,
    provider: "ollama",
    model: "llama3.1:8b",
    outputDir: "out",
    runner: { command: "python" },
  };

  it("fills defaults", () => {
    const config = parseEvaluationConfig(minimal);
    expect(config.conditions).toEqual(["baseline", "perturbed"]);
    expect(config.perturbationTypes).toEqual(["distractors", "noise"]);
    expect(config.taskSuite).toBe("complex");
    expect(config.maxIterations).toBe(15);
    expect(config.timeoutMs).toBe(3_600_000);
    expect(config.pacingDelayMs).toBe(2000);
    expect(config.tiers).toEqual({ excellent: 10, good: 20, moderate: 35 });
    expect(config.runner).toEqual({ command: "python", args: [], cwd: ".", resultsDir: "benchmark_results" });
    expect(config.force).toBe(false);
  });

  it("returns a deeply frozen value", () => {
    const config = parseEvaluationConfig(minimal);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.runner)).toBe(true);
    expect(Object.isFrozen(config.architectures)).toBe(true);
  });

  it("reports every issue at once", () => {
    const issues = issuesOf(() => parseEvaluationConfig({ ...minimal, contexts: 0, provider: "" }));
    expect(issues).toHaveLength(2);
    expect(issues).toContain("contexts: contexts must be positive");
  });

  it("rejects unknown architectures", () => {
    const issues = issuesOf(() => parseEvaluationConfig({ ...minimal, architectures: ["chain-of-thought"] }));
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith("architectures.0:")).toBe(true);
  });

  it("requires perturbation types for the perturbed condition", () => {
    expect(issuesOf(() => parseEvaluationConfig({ ...minimal, perturbationTypes: [] }))).toEqual([
      "perturbationTypes: the perturbed condition needs at least one perturbation type",
    ]);
  });

  it("rejects repeated architectures", () => {
    expect(issuesOf(() => parseEvaluationConfig({ ...minimal, architectures: ["react", "react"] }))).toEqual([
      "architectures: architectures must not repeat",
    ]);
  });
});

describe("parseTierThresholds", () => {
  it("defaults missing thresholds", () => {
    expect(parseTierThresholds(undefined)).toEqual({ excellent: 10, good: 20, moderate: 35 });
    expect(parseTierThresholds({ moderate: 50 })).toEqual({ excellent: 10, good: 20, moderate: 50 });
  });

  it("requires strictly increasing thresholds", () => {
    expect(issuesOf(() => parseTierThresholds({ excellent: 20, good: 10 }))).toEqual([
      "tiers: tier thresholds must be strictly increasing (excellent < good < moderate)",
    ]);
  });
});
