/**
 * Derived analysis types
 */

/**
 * Qualitative glycemic risk
 */
export type RiskLevel = "high" | "moderate" | "low" | "unknown";

/**
 * All risk levels as a const array for iteration
 */
export const RISK_LEVELS = ["high", "moderate", "low", "unknown"] as const satisfies readonly RiskLevel[];

/**
 * Reading counts per glucose bucket
 */
export interface RiskCounts {
  high: number;
  normal: number;
  low: number;
}

/**
 * Descriptive statistics over a set of glucose values
 */
export interface GlucoseSummary {
  mean: number;
  max: number;
  min: number;
  /** Sample standard deviation, null with fewer than two values */
  stdDev: number | null;
  median: number;
}

/**
 * Statistics for the readings sharing one meal label
 */
export interface MealTypeStats {
  mealType: string;
  readingCount: number;
  mean: number;
  max: number;
  min: number;
  stdDev: number | null;
}

/**
 * Result of trend analysis over a reading series
 */
export interface TrendReport {
  /** True when there were no readings to analyze */
  isEmpty: boolean;
  readingCount: number;
  /** Null for the empty report */
  summary: GlucoseSummary | null;
  /** Mean of per-step mg/dL-per-hour changes, null with fewer than two usable steps */
  averageRateOfChange: number | null;
  /** Per meal label, ordered by label; null when no reading is labelled */
  mealBreakdown: MealTypeStats[] | null;
  riskCounts: RiskCounts;
  riskLevel: RiskLevel;
}

/**
 * Rises between consecutive readings
 */
export interface SpikeMetrics {
  averageSpike: number;
  maxSpike: number;
}
