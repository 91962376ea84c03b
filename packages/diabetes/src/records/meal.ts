/**
 * Meal construction and derived values
 */

import { z } from "zod";
import type { FoodItem, Meal } from "../models/index.js";
import type { TimestampInput } from "../parsers/timestamps.js";
import { DEFAULT_TIMEZONE } from "../parsers/timestamps.js";
import { parseInput } from "../parsers/validation.js";
import { nonNegativeSchema, timestampSchema } from "./schemas.js";

/**
 * Meal as supplied by a caller. `foodItems` and `servingSizes` are parallel arrays.
 */
export interface MealInput {
  timestamp: TimestampInput;
  name: string;
  carbsGrams: number;
  foodItems?: string[];
  servingSizes?: number[];
  nutritionalInfo?: Record<string, number>;
  bloodSugarBefore?: number;
  bloodSugarAfter?: number;
  durationMinutes?: number;
}

export function mealSchema(timezone: string = DEFAULT_TIMEZONE) {
  return z
    .object({
      timestamp: timestampSchema(timezone),
      name: z.string().trim().min(1),
      carbsGrams: nonNegativeSchema,
      foodItems: z.array(z.string().min(1)).optional(),
      servingSizes: z.array(nonNegativeSchema).optional(),
      nutritionalInfo: z.record(z.number().finite()).optional(),
      bloodSugarBefore: nonNegativeSchema.optional(),
      bloodSugarAfter: nonNegativeSchema.optional(),
      durationMinutes: z.number().int().nonnegative().optional(),
    })
    .superRefine((meal, ctx) => {
      if ((meal.foodItems?.length ?? 0) !== (meal.servingSizes?.length ?? 0)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["servingSizes"],
          message: "food items and serving sizes must have the same length",
        });
      }
    });
}

/**
 * Build an immutable meal, throwing ValidationError on bad input
 */
export function createMeal(input: MealInput, timezone: string = DEFAULT_TIMEZONE): Meal {
  const parsed = parseInput(mealSchema(timezone), input, "meal");

  const servingSizes = parsed.servingSizes ?? [];
  const foodItems: FoodItem[] | undefined = parsed.foodItems?.map((name, i) =>
    Object.freeze({ name, servingSize: servingSizes[i] })
  );

  return Object.freeze({
    timestamp: parsed.timestamp,
    name: parsed.name,
    carbsGrams: parsed.carbsGrams,
    ...(foodItems ? { foodItems: Object.freeze(foodItems) } : {}),
    ...(parsed.nutritionalInfo ? { nutritionalInfo: Object.freeze({ ...parsed.nutritionalInfo }) } : {}),
    ...(parsed.bloodSugarBefore !== undefined ? { bloodSugarBefore: parsed.bloodSugarBefore } : {}),
    ...(parsed.bloodSugarAfter !== undefined ? { bloodSugarAfter: parsed.bloodSugarAfter } : {}),
    ...(parsed.durationMinutes !== undefined ? { durationMinutes: parsed.durationMinutes } : {}),
  });
}

/**
 * Post-meal rise (after - before), never negative. 0 without both readings.
 */
export function getGlucoseSpike(meal: Meal): number {
  if (meal.bloodSugarBefore === undefined || meal.bloodSugarAfter === undefined) {
    return 0;
  }
  return Math.max(0, meal.bloodSugarAfter - meal.bloodSugarBefore);
}
