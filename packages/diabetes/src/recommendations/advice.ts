/**
 * Rule-based advice text
 *
 * Sentences are emitted in a fixed order: risk level, activity, genetic
 * risk, then blood sugar and carbohydrate rules.
 */

import { z } from "zod";
import type { RiskLevel } from "../models/index.js";
import { RISK_LEVELS } from "../models/index.js";
import { TARGET } from "../analysis/glucose-stats.js";
import { parseInput } from "../parsers/validation.js";
import { nonNegativeSchema, riskScoreSchema } from "../records/schemas.js";
import { ACTIVITY_LEVELS, calculateAdjustedRisk } from "./activity.js";
import type { ActivityLevel } from "./activity.js";

/**
 * Adjusted genetic risk above which a provider visit is suggested
 */
export const ADJUSTED_RISK_THRESHOLD = 0.7;

/**
 * Average carbohydrate intake (g) above which more fiber is suggested
 */
export const HIGH_CARB_THRESHOLD = 60;

/**
 * Dietary advice per risk level
 */
export const RISK_LEVEL_ADVICE: Record<RiskLevel, readonly string[]> = {
  high: [
    "Consider reducing carbohydrate intake, especially refined carbs.",
    "Increase consumption of fiber-rich vegetables and lean proteins.",
  ],
  moderate: [
    "Monitor your carbohydrate intake and meal timing.",
    "Include more omega-3 rich foods like fish and nuts.",
  ],
  low: ["Maintain current healthy eating patterns."],
  unknown: [
    "Insufficient data to assess risk level.",
    "Ensure consistent data collection for accurate analysis.",
  ],
};

export const ADVICE = {
  POST_MEAL_ACTIVITY: "Incorporate light physical activity after meals to help manage blood sugar.",
  CONSULT_PROVIDER:
    "Given your genetic risk factors, consider consulting with a healthcare provider about personalized dietary strategies.",
  REDUCE_CARBS: "Consider reducing high-carb meals to help manage blood sugar levels.",
  MORE_FIBER: "Try incorporating more fiber-rich foods to slow glucose absorption.",
  GOOD_HABITS: "Your blood sugar management looks good! Continue with your current healthy habits.",
} as const;

export interface AdviceInput {
  riskLevel?: RiskLevel;
  /** Genetic risk factor in [0, 1] */
  geneticRisk?: number;
  activityLevel?: ActivityLevel;
  /** Average carbohydrate intake per meal (g) */
  averageCarbs?: number;
  /** Average blood glucose (mg/dL) */
  averageBloodSugar?: number;
}

export interface Advice {
  sentences: string[];
  /** Sentences joined with single spaces */
  text: string;
  /** Genetic risk scaled by activity, null without a genetic risk */
  adjustedRisk: number | null;
}

const adviceInputSchema = z.object({
  riskLevel: z.enum(RISK_LEVELS).optional(),
  geneticRisk: riskScoreSchema.optional(),
  activityLevel: z.enum(ACTIVITY_LEVELS).optional(),
  averageCarbs: nonNegativeSchema.optional(),
  averageBloodSugar: nonNegativeSchema.optional(),
});

/**
 * Assemble advice sentences. Throws ValidationError on out-of-range input.
 */
export function buildAdvice(input: AdviceInput): Advice {
  const { riskLevel, geneticRisk, activityLevel, averageCarbs, averageBloodSugar } = parseInput(
    adviceInputSchema,
    input,
    "advice input"
  );

  const sentences: string[] = [];

  if (riskLevel) {
    sentences.push(...RISK_LEVEL_ADVICE[riskLevel]);
  }

  if (activityLevel === "sedentary" || activityLevel === "light") {
    sentences.push(ADVICE.POST_MEAL_ACTIVITY);
  }

  let adjustedRisk: number | null = null;
  if (geneticRisk !== undefined) {
    adjustedRisk = calculateAdjustedRisk(geneticRisk, activityLevel ?? "");
    if (adjustedRisk > ADJUSTED_RISK_THRESHOLD) {
      sentences.push(ADVICE.CONSULT_PROVIDER);
    }
  }

  sentences.push(...habitSentences(averageBloodSugar, averageCarbs));

  return { sentences, text: sentences.join(" "), adjustedRisk };
}

/**
 * Blood sugar and carbohydrate rules, in that order. Unvalidated: a value
 * that is missing or not a number fires no rule.
 */
export function habitSentences(averageBloodSugar?: number, averageCarbs?: number): string[] {
  const sentences: string[] = [];

  if (averageBloodSugar !== undefined && averageBloodSugar > TARGET.HIGH) {
    sentences.push(ADVICE.REDUCE_CARBS);
  }

  if (averageCarbs !== undefined && averageCarbs > HIGH_CARB_THRESHOLD) {
    sentences.push(ADVICE.MORE_FIBER);
  }

  return sentences;
}

/**
 * Habit feedback from average blood sugar and carb intake
 */
export function describeHabits(averageBloodSugar: number, averageCarbs: number): string {
  const sentences = habitSentences(averageBloodSugar, averageCarbs);
  return sentences.length > 0 ? sentences.join(" ") : ADVICE.GOOD_HABITS;
}
