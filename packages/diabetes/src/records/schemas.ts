/**
 * zod schemas for record inputs
 */

import { z } from "zod";
import { isKnownTimezone, toTimestamp } from "../parsers/timestamps.js";

/**
 * Accepts Unix ms, a Date or a timestamp string and yields Unix ms
 */
export function timestampSchema(timezone: string) {
  return z.union([z.number(), z.string(), z.date()]).transform((value, ctx) => {
    if (!isKnownTimezone(timezone)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `unknown timezone "${timezone}"`,
      });
      return z.NEVER;
    }
    const ms = toTimestamp(value, timezone);
    if (ms === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `malformed timestamp "${String(value)}"`,
      });
      return z.NEVER;
    }
    return ms;
  });
}

export const glucoseValueSchema = z.number().finite();

export const nonNegativeSchema = z.number().finite().nonnegative();

export const riskScoreSchema = z.number().finite().min(0).max(1);
