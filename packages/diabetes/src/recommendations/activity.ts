/**
 * Activity level adjustments
 */

export const ACTIVITY_LEVELS = ["sedentary", "light", "moderate", "active"] as const;

export type ActivityLevel = (typeof ACTIVITY_LEVELS)[number];

/**
 * Scale applied to genetic risk. Less activity raises the adjusted risk.
 */
export const ACTIVITY_MULTIPLIERS: Record<ActivityLevel, number> = {
  sedentary: 1.2,
  light: 1.0,
  moderate: 0.8,
  active: 0.6,
};

export function isActivityLevel(value: string): value is ActivityLevel {
  return (ACTIVITY_LEVELS as readonly string[]).includes(value);
}

/**
 * Multiplier for an activity level; unrecognized levels get 1.0
 */
export function getActivityMultiplier(activityLevel: string): number {
  return isActivityLevel(activityLevel) ? ACTIVITY_MULTIPLIERS[activityLevel] : 1.0;
}

/**
 * Genetic risk scaled by activity, capped at 1
 */
export function calculateAdjustedRisk(geneticRisk: number, activityLevel: string): number {
  return Math.min(1.0, geneticRisk * getActivityMultiplier(activityLevel));
}
