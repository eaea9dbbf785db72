import type { TierThresholds } from "../matrix/types.js";

export type NumericTier = "excellent" | "good" | "moderate" | "poor";
export type RobustnessTier = NumericTier | "insufficient-data" | "undefined";

export const DEFAULT_TIER_THRESHOLDS: TierThresholds = Object.freeze({
  excellent: 10,
  good: 20,
  moderate: 35,
});

export function tierForCv(cv: number, thresholds: TierThresholds = DEFAULT_TIER_THRESHOLDS): NumericTier {
  if (cv < thresholds.excellent) return "excellent";
  if (cv < thresholds.good) return "good";
  if (cv < thresholds.moderate) return "moderate";
  return "poor";
}

/**
 * A single sample cannot show variability, so n = 1 always yields
 * "insufficient-data", even when the mean is 0. Otherwise a missing CV
 * (mean 0) yields "undefined".
 */
export function classifyRobustness(
  sampleSize: number,
  cv: number | null,
  thresholds: TierThresholds = DEFAULT_TIER_THRESHOLDS
): RobustnessTier {
  if (sampleSize < 2) return "insufficient-data";
  if (cv === null) return "undefined";
  return tierForCv(cv, thresholds);
}

const TIER_RANK: Record<RobustnessTier, number> = {
  excellent: 0,
  good: 1,
  moderate: 2,
  poor: 3,
  "insufficient-data": 4,
  undefined: 5,
};

/** True when `after` is a strictly worse numeric tier than `before`. */
export function isTierWorse(before: RobustnessTier, after: RobustnessTier): boolean {
  if (TIER_RANK[before] > 3 || TIER_RANK[after] > 3) return false;
  return TIER_RANK[after] > TIER_RANK[before];
}

export function isTierBetter(before: RobustnessTier, after: RobustnessTier): boolean {
  if (TIER_RANK[before] > 3 || TIER_RANK[after] > 3) return false;
  return TIER_RANK[after] < TIER_RANK[before];
}
