/**
 * Ratio-based risk classification over glucose bucket counts
 */

import { z } from "zod";
import type { GlucoseBucket, RiskCounts, RiskLevel } from "../models/index.js";
import { parseInput } from "../parsers/validation.js";
import { TARGET } from "./glucose-stats.js";

/**
 * Share of high readings above which risk is raised
 */
export const RISK_RATIO = {
  HIGH: 0.3,
  MODERATE: 0.15,
} as const;

const countSchema = z.number().int().nonnegative();

const riskCountsSchema = z.object({
  high: countSchema,
  normal: countSchema,
  low: countSchema,
});

/**
 * Place a glucose value in exactly one bucket
 */
export function bucketGlucose(value: number): GlucoseBucket {
  if (value > TARGET.HIGH) return "high";
  if (value < TARGET.LOW) return "low";
  return "normal";
}

/**
 * Count values per bucket. The counts always sum to `values.length`.
 */
export function countRiskBuckets(values: readonly number[]): RiskCounts {
  const counts: RiskCounts = { high: 0, normal: 0, low: 0 };
  for (const value of values) {
    counts[bucketGlucose(value)]++;
  }
  return counts;
}

/**
 * Classify risk from the share of high readings
 */
export function classifyRiskFromCounts(counts: RiskCounts): RiskLevel {
  const { high, normal, low } = parseInput(riskCountsSchema, counts, "risk counts");
  const total = high + normal + low;

  if (total === 0) return "unknown";

  const highRatio = high / total;
  if (highRatio > RISK_RATIO.HIGH) return "high";
  if (highRatio > RISK_RATIO.MODERATE) return "moderate";
  return "low";
}
