/**
 * CLI command implementations
 *
 * Each command reads its input files and returns what the CLI prints.
 * Rows that fail to parse are reported on stderr and skipped.
 */

import { readFileSync } from "fs";
import {
  analyzeTrends,
  createRecordStore,
  exportResults,
  formatTrendReport,
  getOverallRiskScore,
  getRecommendations,
  loadGeneticData,
  mean,
  parseMealsCsv,
  parseReadingsCsv,
} from "@glycotrend/diabetes";
import type {
  GlucoseReading,
  Meal,
  NoDataResult,
  ParseResult,
  RecommendationResult,
  TrackerSummary,
} from "@glycotrend/diabetes";
import type { Settings } from "./config.js";

function reportSkipped<T>(filePath: string, result: ParseResult<T>): T[] {
  result.errors.forEach((error) => console.error(`${filePath}: ${error}`));
  return result.records;
}

export function loadReadings(filePath: string, settings: Settings): GlucoseReading[] {
  const content = readFileSync(filePath, "utf-8");
  return reportSkipped(filePath, parseReadingsCsv(content, { timezone: settings.timezone }));
}

export function loadMeals(filePath: string, settings: Settings): Meal[] {
  const content = readFileSync(filePath, "utf-8");
  return reportSkipped(filePath, parseMealsCsv(content, { timezone: settings.timezone }));
}

/**
 * Text trend report for a readings file
 */
export function runReport(readingsPath: string, settings: Settings): string {
  const readings = loadReadings(readingsPath, settings);
  return formatTrendReport(analyzeTrends(readings, { timezone: settings.timezone }));
}

export interface RecommendOptions {
  /** Genetic risk in [0, 1]; takes precedence over the genetic data file */
  geneticRisk?: number;
  mealsPath?: string;
}

/**
 * Genetic risk from the explicit value, else the configured data file, else 0
 */
export function resolveGeneticRisk(geneticRisk: number | undefined, settings: Settings): number {
  if (geneticRisk !== undefined) return geneticRisk;
  if (!settings.geneticDataPath) return 0;

  const profile = loadGeneticData(settings.geneticDataPath);
  return profile ? getOverallRiskScore(profile) : 0;
}

/**
 * Recommendations for a readings file, optionally informed by meals
 */
export function runRecommend(
  readingsPath: string,
  options: RecommendOptions,
  settings: Settings
): RecommendationResult {
  const readings = [...loadReadings(readingsPath, settings)].sort((a, b) => a.timestamp - b.timestamp);
  const levels = readings.map((r) => r.glucoseMgDl);
  const meals = options.mealsPath ? loadMeals(options.mealsPath, settings) : [];

  return getRecommendations({
    bloodSugarReadings: levels,
    geneticRiskFactor: resolveGeneticRisk(options.geneticRisk, settings),
    activityLevel: settings.activityLevel,
    averageBloodSugar: levels.length > 0 ? mean(levels) : undefined,
    averageCarbs: meals.length > 0 ? mean(meals.map((m) => m.carbsGrams)) : undefined,
  });
}

/**
 * Tracker summary over a readings file and a meals file
 */
export function runSummary(readingsPath: string, mealsPath: string, settings: Settings): TrackerSummary | NoDataResult {
  const store = createRecordStore({ timezone: settings.timezone });

  for (const meal of loadMeals(mealsPath, settings)) {
    store.addMeal(meal.name, meal.carbsGrams, meal.timestamp);
  }
  for (const reading of loadReadings(readingsPath, settings)) {
    store.recordReading(reading.glucoseMgDl, reading.timestamp, reading.mealType);
  }

  return store.generateSummary();
}

/**
 * Write the trend report for a readings file
 */
export async function runExport(
  readingsPath: string,
  outputFile: string,
  format: string,
  settings: Settings
): Promise<boolean> {
  const readings = loadReadings(readingsPath, settings);
  return exportResults(analyzeTrends(readings, { timezone: settings.timezone }), outputFile, format);
}
