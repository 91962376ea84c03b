/**
 * Glucose statistical analysis functions
 */

import type { GlucoseSummary } from "../models/index.js";

/**
 * Risk bucket boundaries (mg/dL). Normal is inclusive on both ends.
 */
export const TARGET = {
  LOW: 70,
  HIGH: 140,
} as const;

/**
 * Round to a fixed number of decimal places
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Arithmetic mean, 0 for an empty array
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Median, 0 for an empty array
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Sample standard deviation (N-1 denominator). Null with fewer than two values.
 */
export function sampleStdDev(values: readonly number[]): number | null {
  const n = values.length;
  if (n < 2) return null;

  const avg = mean(values);
  const squaredDiffs = values.map((v) => Math.pow(v - avg, 2));
  return Math.sqrt(squaredDiffs.reduce((a, b) => a + b, 0) / (n - 1));
}

/**
 * Calculate summary statistics for a non-empty set of glucose values
 */
export function summarizeGlucose(values: readonly number[]): GlucoseSummary {
  if (values.length === 0) {
    throw new RangeError("summarizeGlucose requires at least one value");
  }

  return {
    mean: mean(values),
    max: values.reduce((a, b) => Math.max(a, b)),
    min: values.reduce((a, b) => Math.min(a, b)),
    stdDev: sampleStdDev(values),
    median: median(values),
  };
}
