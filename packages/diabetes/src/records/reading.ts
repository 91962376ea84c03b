/**
 * Glucose reading construction
 */

import { z } from "zod";
import type { GlucoseReading } from "../models/index.js";
import type { TimestampInput } from "../parsers/timestamps.js";
import { DEFAULT_TIMEZONE } from "../parsers/timestamps.js";
import { parseInput } from "../parsers/validation.js";
import { glucoseValueSchema, timestampSchema } from "./schemas.js";

/**
 * Reading as supplied by a caller or parsed from a file
 */
export interface ReadingInput {
  timestamp: TimestampInput;
  glucoseMgDl: number;
  mealType?: string;
}

export function readingSchema(timezone: string = DEFAULT_TIMEZONE) {
  return z.object({
    timestamp: timestampSchema(timezone),
    glucoseMgDl: glucoseValueSchema,
    mealType: z.string().min(1).optional(),
  });
}

/**
 * Build an immutable reading, throwing ValidationError on bad input
 */
export function createReading(
  input: ReadingInput,
  timezone: string = DEFAULT_TIMEZONE
): GlucoseReading {
  const parsed = parseInput(readingSchema(timezone), input, "reading");
  const reading: GlucoseReading =
    parsed.mealType === undefined
      ? { timestamp: parsed.timestamp, glucoseMgDl: parsed.glucoseMgDl }
      : { timestamp: parsed.timestamp, glucoseMgDl: parsed.glucoseMgDl, mealType: parsed.mealType };
  return Object.freeze(reading);
}
