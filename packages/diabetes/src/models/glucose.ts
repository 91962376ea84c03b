/**
 * Glucose reading types
 */

import type { BaseRecord } from "./base.js";

/**
 * A single blood glucose measurement
 */
export interface GlucoseReading extends BaseRecord {
  /** Glucose value in mg/dL */
  readonly glucoseMgDl: number;
  /** Meal label the reading belongs to (e.g. "breakfast") */
  readonly mealType?: string;
}

/**
 * Three mutually exclusive glucose ranges used for risk counting
 */
export type GlucoseBucket = "low" | "normal" | "high";
