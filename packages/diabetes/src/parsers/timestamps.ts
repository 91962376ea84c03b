/**
 * Timestamp parsing
 *
 * Everything is normalized to Unix milliseconds. Strings carrying a zone
 * designator are taken as-is; naive strings are read in the caller's timezone.
 */

import { z } from "zod";
import { parseInput } from "./validation.js";

/**
 * Timezone used for naive timestamps when none is configured
 */
export const DEFAULT_TIMEZONE = "UTC";

const knownTimezones = new Set<string>();

/**
 * Whether Intl accepts the name as an IANA timezone
 */
export function isKnownTimezone(timezone: string): boolean {
  if (knownTimezones.has(timezone)) return true;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
  } catch {
    return false;
  }
  knownTimezones.add(timezone);
  return true;
}

export const timezoneSchema = z
  .string()
  .min(1)
  .refine(isKnownTimezone, (timezone) => ({ message: `unknown timezone "${timezone}"` }));

/**
 * Check a timezone name, throwing ValidationError when Intl does not know it
 */
export function validateTimezone(timezone: string): string {
  return parseInput(timezoneSchema, timezone, "timezone");
}

/**
 * Accepted timestamp inputs
 */
export type TimestampInput = number | string | Date;

const EXPLICIT_ZONE = /[Zz]$|[+-]\d{2}:\d{2}$/;
const ISO_NAIVE = /^(\d{4})-(\d{2})-(\d{2})(?:[T\s]+(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?$/;
const US_NAIVE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

interface DateTimeParts {
  year: number;
  month: number; // 0-based
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

function isValidParts(parts: DateTimeParts): boolean {
  if (parts.month < 0 || parts.month > 11) return false;
  if (parts.hour > 23 || parts.minute > 59 || parts.second > 59) return false;
  // Rejects days past the end of the month (Date.UTC would roll them over)
  const probe = new Date(Date.UTC(parts.year, parts.month, parts.day));
  return parts.day >= 1 && probe.getUTCDate() === parts.day;
}

/**
 * Parse a naive datetime as if it's in the specified timezone
 */
export function parseLocalDateTime(parts: DateTimeParts, timezone: string = DEFAULT_TIMEZONE): number {
  const utcGuess = Date.UTC(
    parts.year,
    parts.month,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second,
    parts.millisecond
  );

  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });

  const formatted = formatter.formatToParts(new Date(utcGuess));
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(formatted.find((p) => p.type === type)?.value || "0", 10);

  const localAsUtc = Date.UTC(
    part("year"),
    part("month") - 1,
    part("day"),
    part("hour"),
    part("minute"),
    part("second"),
    parts.millisecond
  );
  const offsetMs = utcGuess - localAsUtc;

  return utcGuess + offsetMs;
}

/**
 * Parse a timestamp string into Unix milliseconds
 */
export function parseTimestamp(value: string, timezone: string = DEFAULT_TIMEZONE): number | null {
  const trimmed = value.trim();
  if (!trimmed) return null;

  const iso = trimmed.match(ISO_NAIVE);
  if (iso) {
    const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "0"] = iso;
    const parts: DateTimeParts = {
      year: parseInt(year, 10),
      month: parseInt(month, 10) - 1,
      day: parseInt(day, 10),
      hour: parseInt(hour, 10),
      minute: parseInt(minute, 10),
      second: parseInt(second, 10),
      millisecond: parseInt(fraction.padEnd(3, "0"), 10),
    };
    return isValidParts(parts) ? parseLocalDateTime(parts, timezone) : null;
  }

  // Check for explicit timezone info
  if (EXPLICIT_ZONE.test(trimmed)) {
    const date = new Date(trimmed);
    return isNaN(date.getTime()) ? null : date.getTime();
  }

  const us = trimmed.match(US_NAIVE);
  if (us) {
    const [, month, day, year, hour = "0", minute = "0", second = "0"] = us;
    const parts: DateTimeParts = {
      year: parseInt(year, 10),
      month: parseInt(month, 10) - 1,
      day: parseInt(day, 10),
      hour: parseInt(hour, 10),
      minute: parseInt(minute, 10),
      second: parseInt(second, 10),
      millisecond: 0,
    };
    return isValidParts(parts) ? parseLocalDateTime(parts, timezone) : null;
  }

  return null;
}

/**
 * Normalize any accepted timestamp input to Unix milliseconds
 */
export function toTimestamp(value: TimestampInput, timezone: string = DEFAULT_TIMEZONE): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (value instanceof Date) {
    const ms = value.getTime();
    return isNaN(ms) ? null : ms;
  }
  return parseTimestamp(value, timezone);
}
