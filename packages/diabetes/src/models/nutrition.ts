/**
 * Meal record types
 */

import type { BaseRecord } from "./base.js";

/**
 * One food in a meal with its serving size
 */
export interface FoodItem {
  readonly name: string;
  readonly servingSize: number;
}

/**
 * A logged meal
 */
export interface Meal extends BaseRecord {
  /** Meal name/description */
  readonly name: string;
  /** Carbohydrates in grams */
  readonly carbsGrams: number;
  readonly foodItems?: readonly FoodItem[];
  /** Nutrient name to amount, e.g. `{ protein: 20 }` */
  readonly nutritionalInfo?: Readonly<Record<string, number>>;
  /** Blood glucose before the meal (mg/dL) */
  readonly bloodSugarBefore?: number;
  /** Blood glucose after the meal (mg/dL) */
  readonly bloodSugarAfter?: number;
  /** Minutes between the meal and the after reading */
  readonly durationMinutes?: number;
}
