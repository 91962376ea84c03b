/**
 * Models
 *
 * Type definitions for glucose, meal and genetic records and derived results
 */

// Base types
export type { BaseRecord } from "./base.js";

// Glucose types
export type { GlucoseReading, GlucoseBucket } from "./glucose.js";

// Meal types
export type { FoodItem, Meal } from "./nutrition.js";

// Genetic types
export type { GeneticProfile } from "./genetics.js";

// Analysis types
export type {
  RiskLevel,
  RiskCounts,
  GlucoseSummary,
  MealTypeStats,
  TrendReport,
  SpikeMetrics,
} from "./analysis.js";
export { RISK_LEVELS } from "./analysis.js";
