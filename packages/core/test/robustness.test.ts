import { describe, expect, it } from "vitest";
import { AggregationError } from "../src/errors.js";
import { aggregate, summarizeGroup } from "../src/robustness/aggregator.js";
import { coefficientOfVariation, mean, sampleStd } from "../src/robustness/stats.js";
import { classifyRobustness, isTierBetter, isTierWorse, tierForCv } from "../src/robustness/tiers.js";
import { record } from "./helpers.js";

describe("statistics", () => {
  it("computes the sample standard deviation", () => {
    expect(mean([100, 80, 60, 100, 60])).toBe(80);
    expect(sampleStd([100, 80, 60, 100, 60])).toBe(20);
    expect(sampleStd([42])).toBe(0);
  });

  it("returns null CV for a non-positive mean", () => {
    expect(coefficientOfVariation(20, 80)).toBe(25);
    expect(coefficientOfVariation(0, 0)).toBeNull();
  });

  it("refuses the mean of nothing", () => {
    expect(() => mean([])).toThrow(RangeError);
  });
});

describe("tiers", () => {
  it("bands CV values with strict upper bounds", () => {
    expect(tierForCv(0)).toBe("excellent");
    expect(tierForCv(9.99)).toBe("excellent");
    expect(tierForCv(10)).toBe("good");
    expect(tierForCv(20)).toBe("moderate");
    expect(tierForCv(35)).toBe("poor");
  });

  it("honours custom thresholds", () => {
    expect(tierForCv(12, { excellent: 15, good: 30, moderate: 45 })).toBe("excellent");
  });

  it("reports insufficient data for a single sample even when the mean is zero", () => {
    expect(classifyRobustness(1, 0)).toBe("insufficient-data");
    expect(classifyRobustness(1, null)).toBe("insufficient-data");
    expect(classifyRobustness(2, null)).toBe("undefined");
  });

  it("compares numeric tiers only", () => {
    expect(isTierWorse("excellent", "moderate")).toBe(true);
    expect(isTierBetter("poor", "good")).toBe(true);
    expect(isTierWorse("good", "insufficient-data")).toBe(false);
    expect(isTierBetter("undefined", "excellent")).toBe(false);
  });
});

describe("summarizeGroup", () => {
  it("rates identical success rates as excellent", () => {
    const records = [1, 2, 3, 4, 5].map((seed) => record("react", "baseline", seed, { successRate: 90 }));
    const stat = summarizeGroup(records);
    expect(stat.metrics.successRate).toEqual({
      mean: 90,
      std: 0,
      cv: 0,
      min: 90,
      max: 90,
      range: 0,
      tier: "excellent",
    });
  });

  it("rates a spread of success rates as moderate", () => {
    const rates = [100, 80, 60, 100, 60];
    const records = rates.map((successRate, i) => record("plan-then-act", "perturbed", i + 1, { successRate }));
    const stat = summarizeGroup(records);
    expect(stat.metrics.successRate).toEqual({
      mean: 80,
      std: 20,
      cv: 25,
      min: 60,
      max: 100,
      range: 40,
      tier: "moderate",
    });
    expect(stat.sampleSize).toBe(5);
    expect(stat.contextSeeds).toEqual([1, 2, 3, 4, 5]);
  });

  it("marks a single record as insufficient data", () => {
    const stat = summarizeGroup([record("reflexion", "baseline", 1, { successRate: 50 })]);
    expect(stat.metrics.successRate.std).toBe(0);
    expect(stat.metrics.successRate.tier).toBe("insufficient-data");
    expect(stat.overall.tier).toBe("insufficient-data");
  });

  it("leaves CV undefined for a zero mean", () => {
    const stat = summarizeGroup([record("react", "baseline", 1), record("react", "baseline", 2)]);
    expect(stat.metrics.avgTokens.cv).toBeNull();
    expect(stat.metrics.avgTokens.tier).toBe("undefined");
  });

  it("derives the overall rating from success, time and step CVs", () => {
    const stat = summarizeGroup([
      record("react", "baseline", 1, { successRate: 100, avgTime: 10, avgSteps: 4 }),
      record("react", "baseline", 2, { successRate: 100, avgTime: 10, avgSteps: 4 }),
    ]);
    expect(stat.overall).toEqual({ cv: 0, tier: "excellent" });
  });

  it("throws on an empty group", () => {
    expect(() => summarizeGroup([])).toThrow(AggregationError);
  });

  it("throws when records belong to different groups", () => {
    expect(() => summarizeGroup([record("react", "baseline", 1), record("react", "perturbed", 1)])).toThrow(
      AggregationError
    );
  });
});

describe("aggregate", () => {
  it("groups by architecture and condition in sorted order", () => {
    const stats = aggregate([
      record("reflexion", "perturbed", 1),
      record("react", "perturbed", 1),
      record("reflexion", "baseline", 1),
      record("react", "baseline", 2),
      record("react", "baseline", 1),
    ]);

    expect([...stats.keys()]).toEqual([
      "react/baseline",
      "react/perturbed",
      "reflexion/baseline",
      "reflexion/perturbed",
    ]);
    expect(stats.get("react/baseline")?.contextSeeds).toEqual([1, 2]);
  });

  it("returns an empty map for no records", () => {
    expect(aggregate([]).size).toBe(0);
  });
});
