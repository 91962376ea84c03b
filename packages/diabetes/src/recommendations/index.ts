/**
 * Recommendations
 *
 * Advice derived from risk levels, activity and genetic risk
 */

export {
  ACTIVITY_LEVELS,
  ACTIVITY_MULTIPLIERS,
  isActivityLevel,
  getActivityMultiplier,
  calculateAdjustedRisk,
  type ActivityLevel,
} from "./activity.js";

export {
  ADJUSTED_RISK_THRESHOLD,
  HIGH_CARB_THRESHOLD,
  RISK_LEVEL_ADVICE,
  ADVICE,
  buildAdvice,
  describeHabits,
  habitSentences,
  type AdviceInput,
  type Advice,
} from "./advice.js";

export { FOOD_ADVICE, type FoodAdvice } from "./food-advice.js";

export {
  getRecommendations,
  type RecommendationInput,
  type RecommendationResult,
} from "./engine.js";
