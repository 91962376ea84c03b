/**
 * In-memory record store for meals and glucose readings
 */

import type { GlucoseReading, Meal } from "../models/index.js";
import { ValidationError } from "../errors.js";
import type { TimestampInput } from "../parsers/timestamps.js";
import { DEFAULT_TIMEZONE, toTimestamp, validateTimezone } from "../parsers/timestamps.js";
import { mean, roundTo } from "../analysis/glucose-stats.js";
import { describeHabits } from "../recommendations/advice.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import { createMeal } from "./meal.js";
import type { MealInput } from "./meal.js";

/**
 * Meals above this carbohydrate content (g) are flagged in summaries
 */
export const HIGH_CARB_MEAL_GRAMS = 50;

export const NO_DATA_MESSAGE = "No data available for reporting";

export interface RecordStoreOptions {
  /** Time source for records without a timestamp (default: system clock) */
  clock?: Clock;
  /** Timezone for naive timestamp strings (default: UTC) */
  timezone?: string;
}

export interface TrackerSummary {
  summary: {
    averageBloodSugar: number;
    highestBloodSugar: number;
    lowestBloodSugar: number;
    averageCarbIntake: number;
    totalMealsTracked: number;
    totalReadings: number;
  };
  insights: {
    highCarbMeals: Meal[];
    recommendation: string;
  };
}

/**
 * Returned instead of a summary when meals or readings are missing
 */
export interface NoDataResult {
  error: string;
}

export function isNoDataResult(result: TrackerSummary | NoDataResult): result is NoDataResult {
  return "error" in result;
}

function resolveTimestamp(value: TimestampInput, timezone: string): number {
  const ms = toTimestamp(value, timezone);
  if (ms === null) {
    const issue = `timestamp: malformed timestamp "${String(value)}"`;
    throw new ValidationError(`Invalid reading: ${issue}`, [issue]);
  }
  return ms;
}

/**
 * Create a record store. Records are appended in call order and never mutated.
 * Throws ValidationError for an unknown timezone.
 */
export function createRecordStore(options: RecordStoreOptions = {}) {
  const clock = options.clock ?? systemClock;
  const timezone = validateTimezone(options.timezone ?? DEFAULT_TIMEZONE);
  const meals: Meal[] = [];
  const readings: GlucoseReading[] = [];

  return {
    /** Log a meal; throws ValidationError for negative carbs or a malformed timestamp */
    addMeal: (name: string, carbsGrams: number, timestamp?: TimestampInput): Meal => {
      const meal = createMeal({ name, carbsGrams, timestamp: timestamp ?? clock() }, timezone);
      meals.push(meal);
      return meal;
    },

    /** Log a fully described meal */
    addMealRecord: (input: Omit<MealInput, "timestamp"> & { timestamp?: TimestampInput }): Meal => {
      const meal = createMeal({ ...input, timestamp: input.timestamp ?? clock() }, timezone);
      meals.push(meal);
      return meal;
    },

    /** Record a glucose reading. The level is stored as given. */
    recordReading: (level: number, timestamp?: TimestampInput, mealType?: string): GlucoseReading => {
      const ts = resolveTimestamp(timestamp ?? clock(), timezone);
      const reading: GlucoseReading = Object.freeze(
        mealType === undefined
          ? { timestamp: ts, glucoseMgDl: level }
          : { timestamp: ts, glucoseMgDl: level, mealType }
      );
      readings.push(reading);
      return reading;
    },

    getMeals: (): readonly Meal[] => [...meals],

    getReadings: (): readonly GlucoseReading[] => [...readings],

    /** Summary of everything tracked so far */
    generateSummary: (): TrackerSummary | NoDataResult => {
      if (meals.length === 0 || readings.length === 0) {
        return { error: NO_DATA_MESSAGE };
      }

      const levels = readings.map((r) => r.glucoseMgDl);
      const avgBloodSugar = mean(levels);
      const avgCarbs = mean(meals.map((m) => m.carbsGrams));

      return {
        summary: {
          averageBloodSugar: roundTo(avgBloodSugar, 2),
          highestBloodSugar: Math.max(...levels),
          lowestBloodSugar: Math.min(...levels),
          averageCarbIntake: roundTo(avgCarbs, 2),
          totalMealsTracked: meals.length,
          totalReadings: readings.length,
        },
        insights: {
          highCarbMeals: meals.filter((m) => m.carbsGrams > HIGH_CARB_MEAL_GRAMS),
          recommendation: describeHabits(avgBloodSugar, avgCarbs),
        },
      };
    },
  };
}

export type RecordStore = ReturnType<typeof createRecordStore>;
