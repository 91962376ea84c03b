/**
 * Reading and meal CSV parsers
 *
 * Columns are matched by normalized header name, so `Meal Type`, `meal_type`
 * and `mealtype` are the same column. Rows that cannot be parsed are skipped
 * and reported in `errors`, as is an unknown timezone.
 */

import type { GlucoseReading, Meal } from "../models/index.js";
import { isValidationError } from "../errors.js";
import { createMeal } from "../records/meal.js";
import { createColumnMap, getColumn, hasColumn, parseCsvLine, splitLines } from "./csv-utils.js";
import { DEFAULT_TIMEZONE, parseTimestamp, timezoneSchema } from "./timestamps.js";
import { isValidCarbs, isValidGlucose } from "./validation.js";

const TIMESTAMP_COLUMNS = ["timestamp", "datetime"];
const DATE_COLUMN = "date";
const TIME_COLUMN = "time";
const GLUCOSE_COLUMNS = ["glucose", "glucosemgdl", "level", "bloodsugar", "glucosevalue"];
const MEAL_TYPE_COLUMNS = ["mealtype", "meal"];
const MEAL_NAME_COLUMNS = ["name", "mealname"];
const CARBS_COLUMNS = ["carbs", "carbsgrams", "carbohydrates", "carbohydratecontent"];

export interface CsvParseOptions {
  /** Timezone for naive timestamps (default: UTC) */
  timezone?: string;
}

/**
 * Parse result
 */
export interface ParseResult<T> {
  records: T[];
  /** One message per skipped row, prefixed with its 1-based line number */
  errors: string[];
}

function readHeader(content: string): { lines: string[]; colMap: Map<string, number> } | null {
  const lines = splitLines(content);
  if (lines.length === 0) return null;
  return { lines, colMap: createColumnMap(parseCsvLine(lines[0])) };
}

function hasTimestampColumn(colMap: Map<string, number>): boolean {
  return hasColumn(colMap, ...TIMESTAMP_COLUMNS, DATE_COLUMN, TIME_COLUMN);
}

/**
 * Raw timestamp of a row. Separate date and time columns are joined.
 */
function readTimestamp(row: string[], colMap: Map<string, number>): string {
  const combined = getColumn(row, colMap, ...TIMESTAMP_COLUMNS);
  if (combined) return combined;

  const date = getColumn(row, colMap, DATE_COLUMN);
  const time = getColumn(row, colMap, TIME_COLUMN);
  return date && time ? `${date} ${time}` : date || time;
}

/**
 * Error for an unknown timezone, reported against the header line
 */
function checkTimezone(timezone: string): string | null {
  const result = timezoneSchema.safeParse(timezone);
  return result.success ? null : `Line 1: ${result.error.issues.map((issue) => issue.message).join("; ")}`;
}

/**
 * Parse glucose readings from CSV
 */
export function parseReadingsCsv(content: string, options: CsvParseOptions = {}): ParseResult<GlucoseReading> {
  const timezone = options.timezone ?? DEFAULT_TIMEZONE;
  const result: ParseResult<GlucoseReading> = { records: [], errors: [] };

  const timezoneError = checkTimezone(timezone);
  if (timezoneError) {
    result.errors.push(timezoneError);
    return result;
  }

  const parsed = readHeader(content);
  if (!parsed) return result;
  const { lines, colMap } = parsed;

  if (!hasTimestampColumn(colMap) || !hasColumn(colMap, ...GLUCOSE_COLUMNS)) {
    result.errors.push("Line 1: missing timestamp or glucose column");
    return result;
  }

  for (let i = 1; i < lines.length; i++) {
    const row = parseCsvLine(lines[i]);
    const rawTimestamp = readTimestamp(row, colMap);
    const timestamp = parseTimestamp(rawTimestamp, timezone);
    if (timestamp === null) {
      result.errors.push(`Line ${i + 1}: invalid timestamp "${rawTimestamp}"`);
      continue;
    }

    const rawGlucose = getColumn(row, colMap, ...GLUCOSE_COLUMNS);
    const glucose = rawGlucose === "" ? NaN : Number(rawGlucose);
    if (!isValidGlucose(glucose)) {
      result.errors.push(`Line ${i + 1}: invalid glucose value "${rawGlucose}"`);
      continue;
    }

    const mealType = getColumn(row, colMap, ...MEAL_TYPE_COLUMNS);
    result.records.push(
      Object.freeze(mealType ? { timestamp, glucoseMgDl: glucose, mealType } : { timestamp, glucoseMgDl: glucose })
    );
  }

  return result;
}

/**
 * Parse meals from CSV
 */
export function parseMealsCsv(content: string, options: CsvParseOptions = {}): ParseResult<Meal> {
  const timezone = options.timezone ?? DEFAULT_TIMEZONE;
  const result: ParseResult<Meal> = { records: [], errors: [] };

  const timezoneError = checkTimezone(timezone);
  if (timezoneError) {
    result.errors.push(timezoneError);
    return result;
  }

  const parsed = readHeader(content);
  if (!parsed) return result;
  const { lines, colMap } = parsed;

  if (!hasTimestampColumn(colMap) || !hasColumn(colMap, ...CARBS_COLUMNS)) {
    result.errors.push("Line 1: missing timestamp or carbs column");
    return result;
  }

  for (let i = 1; i < lines.length; i++) {
    const row = parseCsvLine(lines[i]);
    const rawCarbs = getColumn(row, colMap, ...CARBS_COLUMNS);
    const carbs = rawCarbs === "" ? NaN : Number(rawCarbs);
    if (!isValidCarbs(carbs)) {
      result.errors.push(`Line ${i + 1}: invalid carbs value "${rawCarbs}"`);
      continue;
    }

    try {
      result.records.push(
        createMeal(
          {
            timestamp: readTimestamp(row, colMap),
            name: getColumn(row, colMap, ...MEAL_NAME_COLUMNS) || "meal",
            carbsGrams: carbs,
          },
          timezone
        )
      );
    } catch (error) {
      if (!isValidationError(error)) throw error;
      result.errors.push(`Line ${i + 1}: ${error.issues.join("; ")}`);
    }
  }

  return result;
}
