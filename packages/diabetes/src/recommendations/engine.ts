/**
 * Recommendation engine
 *
 * Derives a spike-based risk level from a reading series and turns it,
 * together with genetic risk and activity, into dietary advice.
 */

import { z } from "zod";
import { calculateSpikeMetrics, classifySpikeRisk } from "../analysis/spikes.js";
import type { SpikeRiskLevel } from "../analysis/spikes.js";
import { roundTo } from "../analysis/glucose-stats.js";
import { parseInput } from "../parsers/validation.js";
import { nonNegativeSchema, riskScoreSchema } from "../records/schemas.js";
import { ACTIVITY_LEVELS } from "./activity.js";
import type { ActivityLevel } from "./activity.js";
import { buildAdvice } from "./advice.js";
import { FOOD_ADVICE } from "./food-advice.js";
import type { FoodAdvice } from "./food-advice.js";

export interface RecommendationInput {
  /** Glucose values in chronological order (mg/dL) */
  bloodSugarReadings: number[];
  /** Genetic risk factor in [0, 1] */
  geneticRiskFactor: number;
  activityLevel: ActivityLevel;
  averageCarbs?: number;
  averageBloodSugar?: number;
  /** Meal label per reading. Validated, but it does not change the advice. */
  mealTypes?: string[];
}

export interface RecommendationResult {
  riskAssessment: {
    riskLevel: SpikeRiskLevel;
    averageSpike: number;
    maxSpike: number;
    adjustedRiskFactor: number;
  };
  dietaryRecommendations: string[];
  foodAdvice: FoodAdvice;
}

const recommendationInputSchema = z.object({
  bloodSugarReadings: z.array(z.number().finite()),
  geneticRiskFactor: riskScoreSchema,
  activityLevel: z.enum(ACTIVITY_LEVELS),
  averageCarbs: nonNegativeSchema.optional(),
  averageBloodSugar: nonNegativeSchema.optional(),
  mealTypes: z.array(z.string()).optional(),
});

/**
 * Generate dietary recommendations. Throws ValidationError before computing
 * anything if a required field is missing or out of range.
 */
export function getRecommendations(input: RecommendationInput): RecommendationResult {
  const data = parseInput(recommendationInputSchema, input, "recommendation input");

  const { averageSpike, maxSpike } = calculateSpikeMetrics(data.bloodSugarReadings);
  const riskLevel = classifySpikeRisk(averageSpike);

  const advice = buildAdvice({
    riskLevel,
    geneticRisk: data.geneticRiskFactor,
    activityLevel: data.activityLevel,
    averageCarbs: data.averageCarbs,
    averageBloodSugar: data.averageBloodSugar,
  });

  return {
    riskAssessment: {
      riskLevel,
      averageSpike: roundTo(averageSpike, 2),
      maxSpike: roundTo(maxSpike, 2),
      adjustedRiskFactor: roundTo(advice.adjustedRisk ?? 0, 2),
    },
    dietaryRecommendations: advice.sentences,
    foodAdvice: FOOD_ADVICE,
  };
}
