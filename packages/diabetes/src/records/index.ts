/**
 * Records
 *
 * Validated construction of readings, meals and genetic profiles, and the
 * in-memory record store
 */

export { type Clock, systemClock } from "./clock.js";

export { createReading, readingSchema, type ReadingInput } from "./reading.js";

export { createMeal, mealSchema, getGlucoseSpike, type MealInput } from "./meal.js";

export {
  createGeneticProfile,
  geneticProfileSchema,
  getOverallRiskScore,
  getRiskFactor,
  type GeneticProfileInput,
} from "./genetics.js";

export {
  HIGH_CARB_MEAL_GRAMS,
  NO_DATA_MESSAGE,
  createRecordStore,
  isNoDataResult,
  type RecordStore,
  type RecordStoreOptions,
  type TrackerSummary,
  type NoDataResult,
} from "./store.js";
