/**
 * Spike metrics: rises between consecutive readings
 *
 * The spike-magnitude risk scheme here is independent of the ratio-based
 * classifier in risk.ts and is only consumed by the recommendation engine.
 */

import type { RiskLevel, SpikeMetrics } from "../models/index.js";

/**
 * Average spike (mg/dL) at or above which risk is raised
 */
export const SPIKE_THRESHOLD = {
  HIGH: 40,
  MODERATE: 20,
} as const;

export type SpikeRiskLevel = Exclude<RiskLevel, "unknown">;

/**
 * Average and maximum of the positive consecutive differences
 */
export function calculateSpikeMetrics(values: readonly number[]): SpikeMetrics {
  if (values.length < 2) {
    return { averageSpike: 0, maxSpike: 0 };
  }

  const rises: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const diff = values[i] - values[i - 1];
    if (diff > 0) rises.push(diff);
  }

  if (rises.length === 0) {
    return { averageSpike: 0, maxSpike: 0 };
  }

  return {
    averageSpike: rises.reduce((a, b) => a + b, 0) / rises.length,
    maxSpike: Math.max(...rises),
  };
}

/**
 * Classify risk from the average spike size
 */
export function classifySpikeRisk(averageSpike: number): SpikeRiskLevel {
  if (averageSpike >= SPIKE_THRESHOLD.HIGH) return "high";
  if (averageSpike >= SPIKE_THRESHOLD.MODERATE) return "moderate";
  return "low";
}
