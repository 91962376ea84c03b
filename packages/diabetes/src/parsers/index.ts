/**
 * Parsers
 *
 * Timestamp, CSV and input validation helpers
 */

// Timestamps
export {
  DEFAULT_TIMEZONE,
  isKnownTimezone,
  timezoneSchema,
  validateTimezone,
  parseLocalDateTime,
  parseTimestamp,
  toTimestamp,
  type TimestampInput,
} from "./timestamps.js";

// CSV utilities
export {
  parseCsvLine,
  splitLines,
  normalizeColumnName,
  createColumnMap,
  hasColumn,
  getColumn,
  formatCsvValue,
} from "./csv-utils.js";

// Reading and meal files
export {
  parseReadingsCsv,
  parseMealsCsv,
  type CsvParseOptions,
  type ParseResult,
} from "./records-csv.js";

// Validation utilities
export {
  VALIDATION,
  isValidGlucose,
  isValidCarbs,
  formatIssues,
  parseInput,
} from "./validation.js";
