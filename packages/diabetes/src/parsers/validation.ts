/**
 * Input validation for glucose and meal data
 */

import type { z } from "zod";
import { ValidationError } from "../errors.js";

/**
 * Physiological limits used when importing values from files
 */
export const VALIDATION = {
  GLUCOSE_MIN: 0,
  GLUCOSE_MAX: 1000,
  CARBS_MAX: 1000,
} as const;

/**
 * Validate glucose value is a usable measurement
 */
export function isValidGlucose(value: number): boolean {
  return Number.isFinite(value) && value >= VALIDATION.GLUCOSE_MIN && value <= VALIDATION.GLUCOSE_MAX;
}

/**
 * Validate carbs value is within reasonable range
 */
export function isValidCarbs(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= VALIDATION.CARBS_MAX;
}

/**
 * Format zod issues as `path: message` strings
 */
export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "value";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Parse input against a schema, throwing ValidationError on failure
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  subject: string
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    throw new ValidationError(`Invalid ${subject}: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
