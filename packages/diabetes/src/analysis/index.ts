/**
 * Analysis
 *
 * Statistics, trend analysis and risk classification for glucose data
 */

// Glucose statistics
export {
  TARGET,
  roundTo,
  mean,
  median,
  sampleStdDev,
  summarizeGlucose,
} from "./glucose-stats.js";

// Ratio-based risk classification
export {
  RISK_RATIO,
  bucketGlucose,
  countRiskBuckets,
  classifyRiskFromCounts,
} from "./risk.js";

// Spike metrics
export {
  SPIKE_THRESHOLD,
  calculateSpikeMetrics,
  classifySpikeRisk,
  type SpikeRiskLevel,
} from "./spikes.js";

// Trend analysis
export {
  analyzeTrends,
  calculateAverageRateOfChange,
  calculateMealBreakdown,
  createEmptyTrendReport,
  type TrendOptions,
} from "./trend.js";
