/**
 * @glycotrend/diabetes
 *
 * Glucose trend analysis, risk classification and dietary recommendations
 *
 * @example
 * ```typescript
 * import {
 *   analyzeTrends,
 *   formatTrendReport,
 *   getRecommendations,
 * } from "@glycotrend/diabetes";
 *
 * const report = analyzeTrends([
 *   { timestamp: "2024-03-01T08:00:00Z", glucoseMgDl: 98, mealType: "breakfast" },
 *   { timestamp: "2024-03-01T09:00:00Z", glucoseMgDl: 152, mealType: "breakfast" },
 * ]);
 * console.log(formatTrendReport(report));
 * ```
 */

// Errors
export { ValidationError, isValidationError } from "./errors.js";

// Models - Type definitions
export * from "./models/index.js";

// Records - Validated value objects and the record store
export * from "./records/index.js";

// Parsers - Timestamps, CSV and validation
export * from "./parsers/index.js";

// Analysis - Statistics, trends and risk
export * from "./analysis/index.js";

// Recommendations - Advice derivation
export * from "./recommendations/index.js";

// Report - Text rendering
export * from "./report/index.js";

// IO - Genetic data import and result export
export * from "./io/index.js";
