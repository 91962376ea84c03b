/**
 * Trend analysis over a glucose reading series
 */

import { z } from "zod";
import type { GlucoseReading, MealTypeStats, TrendReport } from "../models/index.js";
import type { ReadingInput } from "../records/reading.js";
import { readingSchema } from "../records/reading.js";
import { DEFAULT_TIMEZONE, validateTimezone } from "../parsers/timestamps.js";
import { parseInput } from "../parsers/validation.js";
import { mean, sampleStdDev, summarizeGlucose } from "./glucose-stats.js";
import { classifyRiskFromCounts, countRiskBuckets } from "./risk.js";

const MS_PER_HOUR = 60 * 60 * 1000;

export interface TrendOptions {
  /** Timezone for naive timestamp strings (default: UTC) */
  timezone?: string;
}

/**
 * Report returned when there is nothing to analyze
 */
export function createEmptyTrendReport(): TrendReport {
  return {
    isEmpty: true,
    readingCount: 0,
    summary: null,
    averageRateOfChange: null,
    mealBreakdown: null,
    riskCounts: { high: 0, normal: 0, low: 0 },
    riskLevel: "unknown",
  };
}

/**
 * Mean glucose change in mg/dL per hour across consecutive readings.
 * Pairs sharing a timestamp are skipped; null when no pair remains.
 */
export function calculateAverageRateOfChange(readings: readonly GlucoseReading[]): number | null {
  // Array.prototype.sort is stable, so equal timestamps keep input order
  const sorted = [...readings].sort((a, b) => a.timestamp - b.timestamp);

  const rates: number[] = [];
  for (let i = 1; i < sorted.length; i++) {
    const hours = (sorted[i].timestamp - sorted[i - 1].timestamp) / MS_PER_HOUR;
    if (hours === 0) continue;
    rates.push((sorted[i].glucoseMgDl - sorted[i - 1].glucoseMgDl) / hours);
  }

  return rates.length > 0 ? mean(rates) : null;
}

/**
 * Per-label statistics for labelled readings, ordered by label.
 * Null when no reading has a label.
 */
export function calculateMealBreakdown(readings: readonly GlucoseReading[]): MealTypeStats[] | null {
  const groups = new Map<string, number[]>();
  for (const reading of readings) {
    if (reading.mealType === undefined) continue;
    const existing = groups.get(reading.mealType) || [];
    existing.push(reading.glucoseMgDl);
    groups.set(reading.mealType, existing);
  }

  if (groups.size === 0) return null;

  return [...groups.keys()]
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((mealType) => {
      const values = groups.get(mealType) || [];
      return {
        mealType,
        readingCount: values.length,
        mean: mean(values),
        max: Math.max(...values),
        min: Math.min(...values),
        stdDev: sampleStdDev(values),
      };
    });
}

/**
 * Analyze a reading series.
 *
 * Throws ValidationError when a reading lacks a timestamp or a numeric value,
 * or the timezone is unknown.
 * An empty series yields the empty report rather than an error.
 */
export function analyzeTrends(
  readings: readonly ReadingInput[],
  options: TrendOptions = {}
): TrendReport {
  const timezone = validateTimezone(options.timezone ?? DEFAULT_TIMEZONE);
  const parsed: GlucoseReading[] = parseInput(z.array(readingSchema(timezone)), readings, "readings");

  if (parsed.length === 0) {
    return createEmptyTrendReport();
  }

  const values = parsed.map((r) => r.glucoseMgDl);
  const riskCounts = countRiskBuckets(values);

  return {
    isEmpty: false,
    readingCount: parsed.length,
    summary: summarizeGlucose(values),
    averageRateOfChange: calculateAverageRateOfChange(parsed),
    mealBreakdown: calculateMealBreakdown(parsed),
    riskCounts,
    riskLevel: classifyRiskFromCounts(riskCounts),
  };
}
